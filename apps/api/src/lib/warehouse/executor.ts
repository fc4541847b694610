import { validateEnv, type Env } from "../env";
import { logger } from "../logger";
import { UnsupportedPlanError, isUnsupportedPlanError } from "./errors";
import { DirectQueryExecutor } from "./executors/direct";
import { EmulatedQueryExecutor } from "./executors/emulated";
import { createSupabaseTableClient } from "./executors/table_client";
import {
  directPoolHandle,
  resolveDirectConnectionConfig,
  resolveEmulatedConnectionConfig,
  supabaseClientHandle
} from "./handles";
import type { ExecutionResult } from "./normalize";
import type { QueryPlan } from "./plan";

export const EXECUTOR_MODES = ["direct", "emulated"] as const;
export type ExecutorMode = (typeof EXECUTOR_MODES)[number];

export interface QueryExecutor {
  readonly name: string;
  execute(plan: QueryPlan): Promise<ExecutionResult>;
}

type ModeEnv = Pick<
  Env,
  | "WAREHOUSE_EXECUTOR_MODE"
  | "WAREHOUSE_EXECUTOR_FALLBACK"
  | "DATABASE_URL"
  | "SUPABASE_URL"
  | "SUPABASE_KEY"
  | "SUPABASE_SERVICE_KEY"
>;

const log = logger.child({ component: "warehouse.executor" });
const loggedWarnings = new Set<string>();

let cachedExecutor: QueryExecutor | null = null;
let cachedModesKey: string | null = null;

const isExecutorMode = (value: string): value is ExecutorMode => {
  return value === "direct" || value === "emulated";
};

const logSelectionWarning = (key: string, message: string): void => {
  if (loggedWarnings.has(key)) {
    return;
  }

  loggedWarnings.add(key);
  log.warn({ key }, message);
};

const isModeConfigured = (mode: ExecutorMode, source: ModeEnv): boolean => {
  return mode === "direct"
    ? resolveDirectConnectionConfig(source) !== null
    : resolveEmulatedConnectionConfig(source) !== null;
};

const parseModeList = (value: string | undefined, setting: string): ExecutorMode[] => {
  if (!value) {
    return [];
  }

  const modes: ExecutorMode[] = [];
  value.split(",").forEach((entry) => {
    const normalized = entry.trim().toLowerCase();
    if (normalized.length === 0) {
      return;
    }

    if (!isExecutorMode(normalized)) {
      logSelectionWarning(`invalid-${setting}-${normalized}`, `Unsupported ${setting}=${normalized}; ignoring it.`);
      return;
    }

    modes.push(normalized);
  });

  return modes;
};

/**
 * Returns the executors to try, preferred first. Modes without connection settings are
 * dropped with a one-time warning.
 */
export const resolveExecutorModes = (source: ModeEnv = validateEnv()): ExecutorMode[] => {
  const [override] = parseModeList(source.WAREHOUSE_EXECUTOR_MODE, "WAREHOUSE_EXECUTOR_MODE");
  const preferred: ExecutorMode = override ?? (isModeConfigured("direct", source) ? "direct" : "emulated");

  const fallback =
    source.WAREHOUSE_EXECUTOR_FALLBACK !== undefined
      ? parseModeList(source.WAREHOUSE_EXECUTOR_FALLBACK, "WAREHOUSE_EXECUTOR_FALLBACK")
      : EXECUTOR_MODES.filter((mode) => mode !== preferred);

  const ordered: ExecutorMode[] = [];
  [preferred, ...fallback].forEach((mode) => {
    if (ordered.includes(mode)) {
      return;
    }

    if (!isModeConfigured(mode, source)) {
      if (mode === preferred || source.WAREHOUSE_EXECUTOR_FALLBACK !== undefined) {
        logSelectionWarning(
          `missing-config-${mode}`,
          `Executor mode ${mode} requested, but its connection settings are missing. Skipping it.`
        );
      }
      return;
    }

    ordered.push(mode);
  });

  return ordered;
};

/** Runs each executor in turn, moving on only when one cannot represent the plan. */
export const createRoutedExecutor = (executors: QueryExecutor[]): QueryExecutor => {
  if (executors.length === 0) {
    throw new Error("createRoutedExecutor needs at least one executor.");
  }

  return {
    name: executors.map((executor) => executor.name).join(">"),
    execute: async (plan) => {
      let unsupported: UnsupportedPlanError | null = null;

      for (const executor of executors) {
        try {
          return await executor.execute(plan);
        } catch (error) {
          if (!isUnsupportedPlanError(error)) {
            throw error;
          }

          unsupported = error;
          log.info({ template: plan.template, executor: executor.name }, "plan unsupported, trying next executor");
        }
      }

      throw unsupported ?? new UnsupportedPlanError(plan.template, "no executor accepted the plan");
    }
  };
};

const createExecutorForMode = (mode: ExecutorMode, source: Env): QueryExecutor => {
  if (mode === "direct") {
    return new DirectQueryExecutor({
      connect: () => directPoolHandle.get(),
      timeoutMs: source.WAREHOUSE_QUERY_TIMEOUT_MS
    });
  }

  return new EmulatedQueryExecutor({
    connect: async () => createSupabaseTableClient(await supabaseClientHandle.get()),
    timeoutMs: source.WAREHOUSE_QUERY_TIMEOUT_MS,
    maxRows: source.EMULATED_MAX_ROWS
  });
};

export const getWarehouseExecutor = (): QueryExecutor => {
  const source = validateEnv();
  const modes = resolveExecutorModes(source);
  if (modes.length === 0) {
    throw new Error(
      "[warehouse] No executor is configured. Set DATABASE_URL, SUPABASE_URL with SUPABASE_SERVICE_KEY, or SUPABASE_URL with SUPABASE_KEY."
    );
  }

  const modesKey = modes.join(",");
  if (cachedExecutor && cachedModesKey === modesKey) {
    return cachedExecutor;
  }

  cachedExecutor = createRoutedExecutor(modes.map((mode) => createExecutorForMode(mode, source)));
  cachedModesKey = modesKey;
  return cachedExecutor;
};

export const __resetWarehouseExecutorForTests = async (): Promise<void> => {
  cachedExecutor = null;
  cachedModesKey = null;
  loggedWarnings.clear();
  await Promise.all([directPoolHandle.reset(), supabaseClientHandle.reset()]);
};
