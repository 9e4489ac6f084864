import { SICK_THRESHOLD } from "../constants.js";
import type { ActionNotice, PetDocument, PetPatch } from "../types.js";
import type { Transition, TransitionContext } from "./context.js";
import { cooldownEnd, resolvePendingMarkers, writeSickness } from "./markers.js";

/**
 * Steps shared by feed and walk once their own effects are computed:
 * pending markers turn into cooldowns, then a pet at or above the sickness
 * threshold gets a fresh recovery window.
 */
export function finishAction(
  pet: PetDocument,
  patch: PetPatch,
  notices: ActionNotice[],
  ctx: TransitionContext,
): Transition {
  const resolved = resolvePendingMarkers(pet, ctx);
  const merged: PetPatch = { ...patch, ...resolved.patch };
  const allNotices = [...notices, ...resolved.notices];

  const hunger = merged.hunger_scale ?? pet.hunger_scale;
  if (hunger >= SICK_THRESHOLD) {
    const until = cooldownEnd(ctx);
    Object.assign(merged, writeSickness({ kind: "cooling", until }));
    if (!allNotices.some((n) => n.type === "sickness_started")) {
      allNotices.push({ type: "sick", until });
    }
  }

  return { ok: true, patch: merged, notices: allNotices };
}
