import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import { DAILY_RESET_SCHEDULE } from "../constants.js";
import type { PetEngine } from "../engine.js";
import { nextLocalMidnight, toZonedIso } from "../time.js";
import { runDailyResetPass } from "./pass.js";
import type { PassSummary } from "./pass.js";

/**
 * Fires the daily reset pass at local midnight in the pet timezone.
 * node-cron derives every wake-up from the current time, so a restart at
 * any hour simply waits for the next midnight.
 */
export class DailyResetScheduler {
  private engine: PetEngine;
  private timeZone: string;
  private task: ScheduledTask | null = null;

  constructor(engine: PetEngine) {
    this.engine = engine;
    this.timeZone = engine.timeZone;
  }

  start(): void {
    if (this.task) return;
    this.task = cron.schedule(
      DAILY_RESET_SCHEDULE,
      async () => {
        await this.tick();
      },
      { timezone: this.timeZone },
    );
    console.log(`[cron] Daily reset scheduled at midnight ${this.timeZone}`);
    this.logNextRun();
  }

  stop(): void {
    if (!this.task) return;
    this.task.stop();
    this.task = null;
  }

  /** One scheduled cycle. Never rejects. */
  async tick(): Promise<PassSummary | null> {
    try {
      return await runDailyResetPass(this.engine);
    } catch (err) {
      console.error("[cron] Daily reset pass failed:", err);
      return null;
    } finally {
      this.logNextRun();
    }
  }

  private logNextRun(): void {
    const now = this.engine.now();
    const next = nextLocalMidnight(now, this.timeZone);
    const waitSeconds = Math.round((next.getTime() - now.getTime()) / 1000);
    console.log(`[cron] Waiting ${waitSeconds} seconds until next daily reset at ${toZonedIso(next, this.timeZone)}`);
  }
}
