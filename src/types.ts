// --- Pets ---

export interface PetDocument {
  _id: number; // chat id
  owner_name: string;
  pet_name: string;

  feed_morning: number;
  feed_afternoon: number;
  feed_evening: number;
  walk_morning: number;
  walk_evening: number;

  total_feeds: number;
  total_walks: number;

  anger: number;
  hunger_scale: number;

  sick_flag: boolean;
  sick_until: string | null;
  boycott_active: boolean;
  boycott_until: string | null;

  experience: number;
  days_lived: number;
  last_reset: string | null; // YYYY-MM-DD in the pet timezone
  created_at: string;
}

export type PetPatch = Partial<Omit<PetDocument, "_id">>;

export type MealPeriod = "morning" | "afternoon" | "evening";
export type WalkPeriod = "morning" | "evening";

// --- Markers ---

/**
 * A boycott or sickness marker. The stored flag/timestamp pair is only ever
 * written through this union, so a pending flag and a cooldown window never
 * coexist.
 */
export type MarkerState =
  | { kind: "clear" }
  | { kind: "pending" }
  | { kind: "cooling"; until: string };

// --- Outcomes ---

export type ActionNotice =
  | { type: "overfed"; penalty: number }
  | { type: "overfeed_sickness" }
  | { type: "walk_mishap"; loss: number }
  | { type: "boycott_started"; until: string }
  | { type: "sickness_started"; until: string }
  | { type: "sick"; until: string };

export type ActionKind = "feed" | "walk";

export type ActionOutcome =
  | { ok: true; action: ActionKind; pet: PetDocument; notices: ActionNotice[] }
  | { ok: false; reason: "not_found" }
  | { ok: false; reason: "cooldown"; until: string; pet: PetDocument };

export type ResetOutcome =
  | { chat_id: number; status: "applied"; anger: number; hunger_scale: number }
  | { chat_id: number; status: "skipped"; last_reset: string }
  | { chat_id: number; status: "missing" }
  | { chat_id: number; status: "failed"; error: string };
