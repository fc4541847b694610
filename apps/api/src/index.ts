export { createLogger, logger, type Logger } from "./lib/logger";
export { validateEnv, type Env } from "./lib/env";

export {
  BackendQueryError,
  InvalidFilterError,
  UnsupportedPlanError,
  describeError,
  isBackendQueryError,
  isInvalidFilterError,
  isUnsupportedPlanError,
  type DegradedLookupWarning
} from "./lib/warehouse/errors";
export { DIMENSIONS, FACTS, getDimension, getFact, type ColumnRef, type DimensionName } from "./lib/warehouse/schema";
export {
  MAX_PAGE_SIZE,
  countPages,
  createFilterSet,
  paginationForPage,
  type FilterSet,
  type FilterSetInput
} from "./lib/warehouse/filters";
export { isTemplateName, resolveTemplate, type ScopeKind, type TemplateName } from "./lib/warehouse/templates";
export { buildQueryPlan, type QueryPlan, type QueryTemplate } from "./lib/warehouse/plan";
export { normalizeResult, type ExecutionResult, type ResultRow } from "./lib/warehouse/normalize";
export {
  createRoutedExecutor,
  getWarehouseExecutor,
  resolveExecutorModes,
  type ExecutorMode,
  type QueryExecutor
} from "./lib/warehouse/executor";
export { DirectQueryExecutor, renderStatement, type DirectClient } from "./lib/warehouse/executors/direct";
export { EmulatedQueryExecutor } from "./lib/warehouse/executors/emulated";
export {
  createMemoryTableClient,
  createSupabaseTableClient,
  type TableClient
} from "./lib/warehouse/executors/table_client";

export { createWarehouseReports, type WarehouseReports } from "./lib/reports/service";
export { parseReportParams } from "./lib/reports/types";
export type {
  BreakdownResponse,
  KpiResponse,
  PaginatedResponse,
  ReportParams,
  ReportScope,
  TrendResponse
} from "./lib/reports/types";
