import "dotenv/config";
import { z } from "zod";

export const MATCH_DURATION_SECONDS = 5400;
export const MAX_DESCRIPTION_LENGTH = 200;

const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const EnvSchema = z.object({
  STORAGE_PATH: z.string().min(1).default("data/storage.json"),
  LOG_LEVEL: LogLevelSchema.default("info"),
  TIMER_UPDATE_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  TIMER_ACCURACY_THRESHOLD: z.coerce.number().int().nonnegative().default(2),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;

export interface AppConfig {
  storagePath: string;
  logLevel: LogLevel;
  timerUpdateIntervalMs: number;
  /** Seconds two independent readers of the same running timer may disagree by. */
  timerAccuracyThreshold: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`CONFIG_INVALID: ${detail}`);
  }

  return {
    storagePath: parsed.data.STORAGE_PATH,
    logLevel: parsed.data.LOG_LEVEL,
    timerUpdateIntervalMs: parsed.data.TIMER_UPDATE_INTERVAL_MS,
    timerAccuracyThreshold: parsed.data.TIMER_ACCURACY_THRESHOLD,
  };
}
