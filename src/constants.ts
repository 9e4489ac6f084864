import type { MealPeriod, WalkPeriod } from "./types.js";

// Cooldown window opened by the first action after a boycott/sickness marker.
export const COOLDOWN_MS = 2 * 60 * 60 * 1000;

// Scale thresholds
export const ANGER_MAX = 100;
export const SICK_THRESHOLD = 100;
export const HUNGER_CAP_ON_OVERFEED = 200;

// Feed/walk rules
export const OVERFEED_AFTER = 2; // 3rd feed in one period overfeeds
export const OVERFEED_XP_PENALTY = 2;
export const OVERFEED_SICKNESS_CHANCE = 0.01;
export const OVERFEED_HUNGER_GAIN = 50;
export const WALK_MISHAP_CHANCE = 0.01;
export const WALK_MISHAP_LOSS: [number, number] = [1, 3];

// Daily reset penalties, inclusive ranges, in draw order.
export type DailySlot = "feed_morning" | "walk_morning" | "feed_afternoon" | "feed_evening" | "walk_evening";

export const ANGER_PENALTIES: { slot: DailySlot; range: [number, number] }[] = [
  { slot: "feed_morning", range: [28, 30] },
  { slot: "walk_morning", range: [16, 20] },
  { slot: "feed_afternoon", range: [20, 20] },
  { slot: "feed_evening", range: [32, 34] },
  { slot: "walk_evening", range: [16, 20] },
];

export const HUNGER_PER_MISSED_SLOT = 20;
export const SICK_FEEDS_PENALTY = 3;
export const SICK_WALKS_PENALTY = 2;
export const ANGER_XP_PENALTY = 5;

// Local hour boundaries (inclusive start, exclusive end)
export const MEAL_PERIODS: { period: MealPeriod; from: number; to: number }[] = [
  { period: "morning", from: 5, to: 12 },
  { period: "afternoon", from: 12, to: 17 },
];

export const WALK_PERIODS: { period: WalkPeriod; from: number; to: number }[] = [
  { period: "morning", from: 5, to: 12 },
];

export const DAILY_RESET_SCHEDULE = "0 0 * * *";
export const PET_NAME_MAX_LENGTH = 64;
