import type { PetEngine } from "../engine.js";
import type { ResetOutcome } from "../types.js";

export interface PassSummary {
  started_at: string;
  outcomes: ResetOutcome[];
  applied: number;
  skipped: number;
  failed: number;
}

/**
 * Runs the daily reset for every stored pet. A failing pet is logged and
 * recorded; the remaining pets are still processed.
 */
export async function runDailyResetPass(engine: PetEngine): Promise<PassSummary> {
  const now = engine.now();
  console.log(`[cron] Starting daily reset at ${now.toISOString()}`);

  const chatIds = await engine.chatIds();
  const outcomes: ResetOutcome[] = [];

  for (const chatId of chatIds) {
    try {
      outcomes.push(await engine.dailyReset(chatId, { skipIfDone: true }));
    } catch (err) {
      console.error(`[cron] Daily reset failed for chat ${chatId}:`, err);
      outcomes.push({
        chat_id: chatId,
        status: "failed",
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  const count = (status: ResetOutcome["status"]) => outcomes.filter((o) => o.status === status).length;
  const summary: PassSummary = {
    started_at: now.toISOString(),
    outcomes,
    applied: count("applied"),
    skipped: count("skipped"),
    failed: count("failed"),
  };

  console.log(
    `[cron] Daily reset complete. ${chatIds.length} pets: ${summary.applied} applied, ${summary.skipped} skipped, ${summary.failed} failed.`,
  );
  return summary;
}
