import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import cron from "node-cron";
import { DailyResetScheduler } from "../cron/scheduler.js";
import { PetEngine } from "../engine.js";
import { sequenceRandom } from "../random.js";
import { MemoryPetStore, TZ, makePet } from "./helpers/memoryStore.js";

const { schedule, stopTask } = vi.hoisted(() => ({ schedule: vi.fn(), stopTask: vi.fn() }));

vi.mock("node-cron", () => ({ default: { schedule } }));

const MIDNIGHT = new Date("2026-10-19T21:00:00.000Z");

let store: MemoryPetStore;
let scheduler: DailyResetScheduler;

beforeEach(() => {
  store = new MemoryPetStore();
  const engine = new PetEngine({ store, timeZone: TZ, random: sequenceRandom([0.5]), clock: () => MIDNIGHT });
  scheduler = new DailyResetScheduler(engine);
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  stopTask.mockReset();
  schedule.mockReset();
  schedule.mockImplementation(() => ({ stop: stopTask, start: vi.fn() }));
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("DailyResetScheduler", () => {
  it("schedules one job at local midnight", () => {
    scheduler.start();
    scheduler.start();

    expect(cron.schedule).toHaveBeenCalledTimes(1);
    expect(cron.schedule).toHaveBeenCalledWith("0 0 * * *", expect.any(Function), { timezone: "Europe/Moscow" });
  });

  it("logs the wait until the next midnight", () => {
    scheduler.start();
    expect(console.log).toHaveBeenCalledWith(
      "[cron] Waiting 86400 seconds until next daily reset at 2026-10-21T00:00:00.000+03:00",
    );
  });

  it("stops the job and can schedule it again", () => {
    scheduler.start();
    scheduler.stop();
    scheduler.stop();
    expect(stopTask).toHaveBeenCalledTimes(1);

    scheduler.start();
    expect(cron.schedule).toHaveBeenCalledTimes(2);
  });

  it("runs the reset pass when the job fires", async () => {
    store.put(makePet({}, 1));
    scheduler.start();

    const job = vi.mocked(cron.schedule).mock.calls[0][1];
    expect(typeof job).toBe("function");
    if (typeof job === "function") await job(MIDNIGHT);

    expect(store.row(1)).toMatchObject({ days_lived: 1, last_reset: "2026-10-20" });
  });

  it("survives a failing pass", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.spyOn(store, "chatIds").mockRejectedValue(new Error("connection lost"));

    await expect(scheduler.tick()).resolves.toBeNull();
    expect(error).toHaveBeenCalledWith("[cron] Daily reset pass failed:", expect.any(Error));
  });
});
