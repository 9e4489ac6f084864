import { WALK_MISHAP_CHANCE, WALK_MISHAP_LOSS } from "../constants.js";
import { chance, randomInt } from "../random.js";
import { localHour } from "../time.js";
import type { ActionNotice, PetDocument, PetPatch } from "../types.js";
import type { Transition, TransitionContext } from "./context.js";
import { finishAction } from "./finish.js";
import { activeCooldown } from "./markers.js";
import { walkPeriodFor } from "./period.js";

export function applyWalk(pet: PetDocument, ctx: TransitionContext): Transition {
  const blockedUntil = activeCooldown(pet, ctx.now);
  if (blockedUntil) return { ok: false, until: blockedUntil };

  const field = `walk_${walkPeriodFor(localHour(ctx.now, ctx.timeZone))}` as const;
  const notices: ActionNotice[] = [];

  let experience = pet.experience + 1;
  const patch: PetPatch = { total_walks: pet.total_walks + 1 };
  patch[field] = pet[field] + 1;

  if (chance(ctx.random, WALK_MISHAP_CHANCE)) {
    const [min, max] = WALK_MISHAP_LOSS;
    const loss = randomInt(ctx.random, min, max);
    experience = Math.max(0, experience - loss);
    notices.push({ type: "walk_mishap", loss });
  }
  patch.experience = experience;

  return finishAction(pet, patch, notices, ctx);
}
