import type { RandomSource } from "../random.js";
import type { ActionNotice, PetPatch } from "../types.js";

export interface TransitionContext {
  now: Date;
  timeZone: string;
  random: RandomSource;
}

export type Transition =
  | { ok: true; patch: PetPatch; notices: ActionNotice[] }
  | { ok: false; until: string };
