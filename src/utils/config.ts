import type { LevelWithSilent } from "pino";
import { z } from "zod";
import { buildRules } from "../services/planRules/rules";
import { CoachRules } from "../services/planRules/types";

const flag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((v) => v === "true" || v === "1");

const optionalNumber = z.coerce.number().positive().optional();

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  DB_URL: z.string().trim().optional(),
  MONGO_URI: z.string().trim().optional(),
  MONGODB_URI: z.string().trim().optional(),
  STORE_DRIVER: z.enum(["mongo", "memory"]).default("mongo"),
  RESET_PURGES_WEIGHTS: flag,
  RATE_LIMIT_COACH_PER_MIN: z.coerce.number().int().positive().default(60),
  SENTRY_DSN: z.string().trim().optional(),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  FLOOR_KCAL_FEMALE: optionalNumber,
  FLOOR_KCAL_MALE: optionalNumber,
  REFERENCE_WEIGHT_KG: optionalNumber,
});

export type AppConfig = {
  port: number;
  env: "development" | "test" | "production";
  dbUrl?: string;
  storeDriver: "mongo" | "memory";
  resetPurgesWeights: boolean;
  rateLimitPerMinute: number;
  sentryDsn?: string;
  logLevel: LevelWithSilent;
  rules: CoachRules;
};

/** Parses the environment once at boot; throws with every invalid variable listed. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // blank variables count as unset
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ""));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment: ${issues}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    env: e.NODE_ENV,
    dbUrl: e.DB_URL || e.MONGO_URI || e.MONGODB_URI,
    storeDriver: e.STORE_DRIVER,
    resetPurgesWeights: e.RESET_PURGES_WEIGHTS,
    rateLimitPerMinute: e.RATE_LIMIT_COACH_PER_MIN,
    sentryDsn: e.SENTRY_DSN,
    logLevel: e.LOG_LEVEL,
    rules: buildRules({
      floorKcalFemale: e.FLOOR_KCAL_FEMALE,
      floorKcalMale: e.FLOOR_KCAL_MALE,
      referenceWeightKg: e.REFERENCE_WEIGHT_KG,
    }),
  };
}
