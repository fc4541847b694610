import { z, type ZodError } from "zod";

import { LOG_LEVELS } from "./logger";

type ProcessEnv = Record<string, string | undefined>;

export const DEFAULT_QUERY_TIMEOUT_MS = 15_000;
export const DEFAULT_EMULATED_MAX_ROWS = 10_000;

// Blank and whitespace-only values count as unset.
const trimToUndefined = (value: unknown): string | undefined => {
  if (typeof value !== "string") {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
};

const setting = <T extends z.ZodTypeAny>(inner: T) => z.preprocess(trimToUndefined, inner);

const countSetting = (fallback: number) =>
  z.preprocess(
    (value) => trimToUndefined(value) ?? fallback,
    z.coerce.number().int().positive()
  );

const envSchema = z.object({
  NODE_ENV: setting(z.string().optional()),
  LOG_LEVEL: z.preprocess(
    (value) => trimToUndefined(value)?.toLowerCase(),
    z.enum(LOG_LEVELS).optional()
  ),
  WAREHOUSE_EXECUTOR_MODE: setting(z.string().optional()),
  WAREHOUSE_EXECUTOR_FALLBACK: setting(z.string().optional()),
  DATABASE_URL: setting(z.string().optional()),
  SUPABASE_URL: setting(z.string().url().optional()),
  SUPABASE_KEY: setting(z.string().optional()),
  SUPABASE_SERVICE_KEY: setting(z.string().optional()),
  WAREHOUSE_QUERY_TIMEOUT_MS: countSetting(DEFAULT_QUERY_TIMEOUT_MS),
  EMULATED_MAX_ROWS: countSetting(DEFAULT_EMULATED_MAX_ROWS)
});

export type Env = z.infer<typeof envSchema>;

const TRACKED_KEYS = envSchema.keyof().options;

let cached: { snapshot: string; value: Env } | null = null;

const describeIssues = (error: ZodError): string => {
  return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
};

export const parseEnv = (rawEnv: ProcessEnv): Env => {
  const result = envSchema.safeParse(rawEnv);
  if (!result.success) {
    throw new Error(`[env] Invalid environment configuration: ${describeIssues(result.error)}`);
  }

  return result.data;
};

/** Parses `rawEnv`, reusing the previous result while none of the tracked keys changed. */
export const validateEnv = (rawEnv: ProcessEnv = process.env): Env => {
  const snapshot = TRACKED_KEYS.map((key) => `${key}=${rawEnv[key] ?? ""}`).join("\n");
  if (cached?.snapshot === snapshot) {
    return cached.value;
  }

  const value = parseEnv(rawEnv);
  cached = { snapshot, value };
  return value;
};
