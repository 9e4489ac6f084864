import { MEAL_PERIODS, WALK_PERIODS } from "../constants.js";
import type { MealPeriod, WalkPeriod } from "../types.js";

export function mealPeriodFor(hour: number): MealPeriod {
  const match = MEAL_PERIODS.find((p) => hour >= p.from && hour < p.to);
  return match ? match.period : "evening";
}

export function walkPeriodFor(hour: number): WalkPeriod {
  const match = WALK_PERIODS.find((p) => hour >= p.from && hour < p.to);
  return match ? match.period : "evening";
}
