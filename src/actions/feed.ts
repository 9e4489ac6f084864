import {
  HUNGER_CAP_ON_OVERFEED,
  OVERFEED_AFTER,
  OVERFEED_HUNGER_GAIN,
  OVERFEED_SICKNESS_CHANCE,
  OVERFEED_XP_PENALTY,
} from "../constants.js";
import { chance } from "../random.js";
import { localHour } from "../time.js";
import type { ActionNotice, PetDocument, PetPatch } from "../types.js";
import type { Transition, TransitionContext } from "./context.js";
import { finishAction } from "./finish.js";
import { activeCooldown } from "./markers.js";
import { mealPeriodFor } from "./period.js";

export function applyFeed(pet: PetDocument, ctx: TransitionContext): Transition {
  const blockedUntil = activeCooldown(pet, ctx.now);
  if (blockedUntil) return { ok: false, until: blockedUntil };

  const field = `feed_${mealPeriodFor(localHour(ctx.now, ctx.timeZone))}` as const;
  const before = pet[field];
  const notices: ActionNotice[] = [];

  let experience = pet.experience + 1;
  const patch: PetPatch = { total_feeds: pet.total_feeds + 1 };
  patch[field] = before + 1;

  // Third and later feeds in the same period
  if (before >= OVERFEED_AFTER) {
    experience = Math.max(0, experience - OVERFEED_XP_PENALTY);
    // Reports what was actually taken once the floor applies.
    notices.push({ type: "overfed", penalty: pet.experience + 1 - experience });
    if (chance(ctx.random, OVERFEED_SICKNESS_CHANCE)) {
      patch.hunger_scale = Math.min(HUNGER_CAP_ON_OVERFEED, pet.hunger_scale + OVERFEED_HUNGER_GAIN);
      notices.push({ type: "overfeed_sickness" });
    }
  }
  patch.experience = experience;

  return finishAction(pet, patch, notices, ctx);
}
