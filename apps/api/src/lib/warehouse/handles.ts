import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { Pool, type PoolConfig } from "pg";

import { validateEnv, type Env } from "../env";
import { logger } from "../logger";
import { BackendQueryError, describeError } from "./errors";

export type LazyHandle<T> = {
  get: () => Promise<T>;
  /** Empties the slot and releases a value that was already built. */
  reset: () => Promise<void>;
};

const log = logger.child({ component: "warehouse.handles" });

/**
 * Builds a value on first use. Concurrent callers share one in-flight construction, and a
 * failed construction leaves the slot empty so the next call starts over.
 */
export const createLazyHandle = <T>(
  factory: () => Promise<T>,
  dispose?: (value: T) => Promise<void>
): LazyHandle<T> => {
  let pending: Promise<T> | null = null;

  return {
    get: () => {
      if (!pending) {
        const attempt = factory();
        pending = attempt;
        void attempt.catch(() => {
          if (pending === attempt) {
            pending = null;
          }
        });
      }

      return pending;
    },
    reset: async () => {
      const previous = pending;
      pending = null;
      if (!previous || !dispose) {
        return;
      }

      let value: T;
      try {
        value = await previous;
      } catch {
        // Never built, nothing to release.
        return;
      }

      await dispose(value);
    }
  };
};

type ConnectionEnv = Pick<Env, "DATABASE_URL" | "SUPABASE_URL" | "SUPABASE_KEY" | "SUPABASE_SERVICE_KEY">;

const resolveSupabaseProjectId = (supabaseUrl: string): string | null => {
  try {
    const [projectId] = new URL(supabaseUrl).hostname.split(".");
    return projectId && projectId.length > 0 ? projectId : null;
  } catch (error) {
    log.warn({ error: describeError(error) }, "SUPABASE_URL is not a valid URL");
    return null;
  }
};

/** Pool settings for the direct executor, or null when neither connection source is configured. */
export const resolveDirectConnectionConfig = (source: ConnectionEnv = validateEnv()): PoolConfig | null => {
  if (source.DATABASE_URL) {
    return { connectionString: source.DATABASE_URL };
  }

  if (!source.SUPABASE_URL || !source.SUPABASE_SERVICE_KEY) {
    return null;
  }

  const projectId = resolveSupabaseProjectId(source.SUPABASE_URL);
  if (!projectId) {
    return null;
  }

  return {
    host: `db.${projectId}.supabase.co`,
    port: 5432,
    database: "postgres",
    user: "postgres",
    password: source.SUPABASE_SERVICE_KEY,
    ssl: { rejectUnauthorized: false }
  };
};

export type EmulatedConnectionConfig = {
  url: string;
  key: string;
};

export const resolveEmulatedConnectionConfig = (
  source: ConnectionEnv = validateEnv()
): EmulatedConnectionConfig | null => {
  if (!source.SUPABASE_URL || !source.SUPABASE_KEY) {
    return null;
  }

  return { url: source.SUPABASE_URL, key: source.SUPABASE_KEY };
};

export type PoolLike = {
  query: (text: string) => Promise<unknown>;
  end: () => Promise<void>;
};

/** Opens a pool and proves it can reach the database before anyone else uses it. */
export const openVerifiedPool = async <P extends PoolLike>(
  config: PoolConfig,
  createPool: (config: PoolConfig) => P
): Promise<P> => {
  const pool = createPool(config);

  try {
    await pool.query("SELECT 1");
  } catch (error) {
    await pool.end().catch((endError: unknown) => {
      log.warn({ error: describeError(endError) }, "failed to close an unverified pool");
    });
    throw new BackendQueryError(`Direct connection check failed: ${describeError(error)}`, {
      backend: "direct",
      code: "connection_unavailable",
      cause: error
    });
  }

  log.info({ host: config.host ?? "connection string" }, "direct warehouse connection verified");
  return pool;
};

export const directPoolHandle = createLazyHandle<Pool>(async () => {
  const config = resolveDirectConnectionConfig();
  if (!config) {
    throw new BackendQueryError(
      "DATABASE_URL, or SUPABASE_URL with SUPABASE_SERVICE_KEY, is required for direct queries.",
      { backend: "direct", code: "connection_unavailable" }
    );
  }

  return openVerifiedPool(config, (poolConfig) => new Pool(poolConfig));
}, (pool) => pool.end());

export const supabaseClientHandle = createLazyHandle<SupabaseClient>(async () => {
  const config = resolveEmulatedConnectionConfig();
  if (!config) {
    throw new BackendQueryError("SUPABASE_URL and SUPABASE_KEY are required for emulated queries.", {
      backend: "emulated",
      code: "connection_unavailable"
    });
  }

  return createClient(config.url, config.key, {
    auth: {
      autoRefreshToken: false,
      persistSession: false
    }
  });
});
