import { PetBot } from "./bot/telegram.js";
import { ConfigError, loadConfig } from "./config.js";
import type { Config } from "./config.js";
import { DailyResetScheduler } from "./cron/scheduler.js";
import { closeDb, getDb } from "./db.js";
import { PetEngine } from "./engine.js";
import { MongoPetStore } from "./store.js";

// --- Configuration ---
function readConfig(): Config {
  try {
    return loadConfig();
  } catch (err) {
    console.error(err instanceof ConfigError ? err.message : err);
    process.exit(1);
  }
}

const config = readConfig();

console.log(`[bot] Pet bot starting; webhook=${config.webhook !== null}, timezone=${config.timeZone}`);

// --- Initialize ---
try {
  await getDb(config.mongoUri);
} catch (err) {
  console.error("[db] Could not connect to MongoDB:", err);
  process.exit(1);
}

const store = new MongoPetStore();
const engine = new PetEngine({ store, timeZone: config.timeZone, petBaseName: config.petBaseName });
const scheduler = new DailyResetScheduler(engine);
const bot = new PetBot(engine, { token: config.botToken, webhook: config.webhook });

scheduler.start();
await bot.start();

// --- Graceful shutdown ---
async function shutdown(signal: string): Promise<void> {
  console.log(`${signal} received, shutting down...`);
  scheduler.stop();
  try {
    await bot.stop();
    await closeDb();
  } catch (err) {
    console.error("Error during shutdown:", err);
  }
  process.exit(0);
}

process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});

process.on("SIGINT", () => {
  void shutdown("SIGINT");
});
