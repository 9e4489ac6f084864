import {
  ANGER_MAX,
  ANGER_PENALTIES,
  ANGER_XP_PENALTY,
  HUNGER_PER_MISSED_SLOT,
  SICK_FEEDS_PENALTY,
  SICK_THRESHOLD,
  SICK_WALKS_PENALTY,
} from "../constants.js";
import type { RandomSource } from "../random.js";
import { randomInt } from "../random.js";
import type { PetDocument, PetPatch } from "../types.js";
import { writeBoycott, writeSickness } from "./markers.js";

export interface DailyResetContext {
  today: string; // YYYY-MM-DD
  random: RandomSource;
}

/**
 * Scores the day's feed/walk slots and returns the patch that starts the
 * next day. Penalties for each missed slot are drawn in ANGER_PENALTIES order.
 */
export function applyDailyReset(pet: PetDocument, ctx: DailyResetContext): PetPatch {
  const missed = ANGER_PENALTIES.filter(({ slot }) => pet[slot] <= 0);

  let anger: number;
  if (missed.length === ANGER_PENALTIES.length) {
    anger = ANGER_MAX;
  } else {
    anger = pet.anger;
    for (const { range } of missed) {
      anger += randomInt(ctx.random, range[0], range[1]);
    }
    anger = Math.min(ANGER_MAX, anger);
  }

  let hunger = pet.hunger_scale + missed.length * HUNGER_PER_MISSED_SLOT;
  const patch: PetPatch = {};

  // A pending marker clears any cooldown still running for it, so a boycott
  // written here lifts an older one early; the next action opens a new window.
  if (hunger >= SICK_THRESHOLD) {
    Object.assign(patch, writeSickness({ kind: "pending" }), writeBoycott({ kind: "pending" }));
    patch.total_feeds = Math.max(0, pet.total_feeds - SICK_FEEDS_PENALTY);
    patch.total_walks = Math.max(0, pet.total_walks - SICK_WALKS_PENALTY);
    hunger = Math.max(hunger, SICK_THRESHOLD);
  }

  if (anger >= ANGER_MAX) {
    patch.experience = Math.max(0, pet.experience - ANGER_XP_PENALTY);
    Object.assign(patch, writeBoycott({ kind: "pending" }));
  }

  return {
    ...patch,
    anger,
    hunger_scale: hunger,
    days_lived: pet.days_lived + 1,
    feed_morning: 0,
    feed_afternoon: 0,
    feed_evening: 0,
    walk_morning: 0,
    walk_evening: 0,
    last_reset: ctx.today,
  };
}
