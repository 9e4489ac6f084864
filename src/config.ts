import { z } from "zod";
import { isValidTimeZone } from "./time.js";

// Unset and empty variables both fall back to the default.
const blankToUndefined = (v: unknown) => (v === "" ? undefined : v);

const envSchema = z
  .object({
    TELEGRAM_BOT_TOKEN: z.string({ required_error: "TELEGRAM_BOT_TOKEN is required" }).min(1, "TELEGRAM_BOT_TOKEN is required"),
    USE_WEBHOOK: z.string().optional().transform((v) => v === "1"),
    WEBHOOK_URL: z.preprocess(blankToUndefined, z.string().url("WEBHOOK_URL must be a URL").optional()),
    PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(65535).default(8443)),
    MONGO_URI: z.preprocess(blankToUndefined, z.string().default("mongodb://localhost:27017/petbot")),
    PET_TIMEZONE: z.preprocess(
      blankToUndefined,
      z.string().default("Europe/Moscow").refine(isValidTimeZone, (tz) => ({ message: `Unknown time zone: ${tz}` })),
    ),
    PET_BASE_NAME: z.preprocess(blankToUndefined, z.string().default("Vanya")),
  })
  .superRefine((env, ctx) => {
    if (env.USE_WEBHOOK && !env.WEBHOOK_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["WEBHOOK_URL"],
        message: "WEBHOOK_URL is required when USE_WEBHOOK=1",
      });
    }
  });

export interface Config {
  botToken: string;
  webhook: { url: string; port: number } | null;
  mongoUri: string;
  timeZone: string;
  petBaseName: string;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => i.message));
  }

  const e = parsed.data;
  return {
    botToken: e.TELEGRAM_BOT_TOKEN,
    webhook: e.USE_WEBHOOK && e.WEBHOOK_URL ? { url: e.WEBHOOK_URL.replace(/\/+$/, ""), port: e.PORT } : null,
    mongoUri: e.MONGO_URI,
    timeZone: e.PET_TIMEZONE,
    petBaseName: e.PET_BASE_NAME,
  };
}
