import { COOLDOWN_MS } from "../constants.js";
import { addMs, parseTimestamp, toZonedIso } from "../time.js";
import type { ActionNotice, MarkerState, PetDocument, PetPatch } from "../types.js";
import type { TransitionContext } from "./context.js";

// ---------------------------------------------------------------------------
// Reading and writing the flat flag/timestamp pairs
// ---------------------------------------------------------------------------

export function readMarker(flag: boolean, until: string | null): MarkerState {
  if (flag) return { kind: "pending" };
  if (until) return { kind: "cooling", until };
  return { kind: "clear" };
}

export function boycottMarker(pet: PetDocument): MarkerState {
  return readMarker(pet.boycott_active, pet.boycott_until);
}

export function sicknessMarker(pet: PetDocument): MarkerState {
  return readMarker(pet.sick_flag, pet.sick_until);
}

export function writeBoycott(state: MarkerState): Pick<PetPatch, "boycott_active" | "boycott_until"> {
  switch (state.kind) {
    case "pending":
      return { boycott_active: true, boycott_until: null };
    case "cooling":
      return { boycott_active: false, boycott_until: state.until };
    case "clear":
      return { boycott_active: false, boycott_until: null };
  }
}

export function writeSickness(state: MarkerState): Pick<PetPatch, "sick_flag" | "sick_until"> {
  switch (state.kind) {
    case "pending":
      return { sick_flag: true, sick_until: null };
    case "cooling":
      return { sick_flag: false, sick_until: state.until };
    case "clear":
      return { sick_flag: false, sick_until: null };
  }
}

// ---------------------------------------------------------------------------
// Gate and post-action resolution
// ---------------------------------------------------------------------------

/**
 * Returns the boycott cooldown end when it is still in the future. Sickness
 * windows never block actions. An unparsable timestamp counts as no cooldown.
 */
export function activeCooldown(pet: PetDocument, now: Date): string | null {
  const marker = boycottMarker(pet);
  if (marker.kind !== "cooling") return null;

  const until = parseTimestamp(marker.until);
  if (!until) {
    console.warn(`[engine] Ignoring malformed boycott_until for chat ${pet._id}: ${JSON.stringify(marker.until)}`);
    return null;
  }
  return now.getTime() < until.getTime() ? marker.until : null;
}

export function cooldownEnd(ctx: TransitionContext): string {
  return toZonedIso(addMs(ctx.now, COOLDOWN_MS), ctx.timeZone);
}

/** Pending markers start their cooldown window on the first action after they were set. */
export function resolvePendingMarkers(
  pet: PetDocument,
  ctx: TransitionContext,
): { patch: PetPatch; notices: ActionNotice[] } {
  const patch: PetPatch = {};
  const notices: ActionNotice[] = [];
  const until = cooldownEnd(ctx);

  if (boycottMarker(pet).kind === "pending") {
    Object.assign(patch, writeBoycott({ kind: "cooling", until }));
    notices.push({ type: "boycott_started", until });
  }
  if (sicknessMarker(pet).kind === "pending") {
    Object.assign(patch, writeSickness({ kind: "cooling", until }));
    notices.push({ type: "sickness_started", until });
  }
  return { patch, notices };
}
