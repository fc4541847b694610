import { logger } from "../logger";
import { InvalidFilterError, type DegradedLookupWarning } from "../warehouse/errors";
import type { QueryExecutor } from "../warehouse/executor";
import {
  countPages,
  createFilterSet,
  paginationForPage,
  type EqualityFilter,
  type FilterSet
} from "../warehouse/filters";
import type { ExecutionResult, ResultRow, ResultValue } from "../warehouse/normalize";
import { buildQueryPlan } from "../warehouse/plan";
import type { ColumnRef, DimensionName } from "../warehouse/schema";
import { SCOPE_FILTERS, resolveTemplate, type TemplateName } from "../warehouse/templates";
import type {
  BreakdownDimension,
  BreakdownResponse,
  KpiMetric,
  KpiResponse,
  KpiUnit,
  PageRequest,
  PaginatedResponse,
  PerformanceEntity,
  ReportParams,
  ReportScope,
  TableRow,
  TimeseriesPoint,
  TrendBreakdown,
  TrendMetric,
  TrendResponse,
  TrendSeries
} from "./types";

type FactKind = "clicks" | "visits";

type ClickFilterParam = "link_type" | "country" | "device_type" | "utm_source" | "utm_medium" | "utm_campaign";

const CLICK_FILTERS: ReadonlyArray<{ param: ClickFilterParam; dimension: DimensionName | null; column: string }> = [
  { param: "link_type", dimension: "link", column: "link_type_name" },
  { param: "country", dimension: "location", column: "country_name" },
  { param: "device_type", dimension: "device", column: "device_type" },
  { param: "utm_source", dimension: null, column: "utm_source" },
  { param: "utm_medium", dimension: null, column: "utm_medium" },
  { param: "utm_campaign", dimension: null, column: "utm_campaign" }
];

const KPI_DEFINITIONS: Record<KpiMetric, { label: string; unit: KpiUnit; facts: FactKind }> = {
  total_clicks: { label: "Total clicks", unit: "count", facts: "clicks" },
  total_atc_clicks: { label: "Add-to-cart clicks", unit: "count", facts: "clicks" },
  total_page_visits: { label: "Page visits", unit: "count", facts: "visits" },
  total_link_value: { label: "Link value", unit: "currency", facts: "clicks" },
  // Both halves share one FilterSet, so only filters the visit fact can take apply.
  page_ctr: { label: "Page CTR", unit: "percent", facts: "visits" },
  conversion_rate: { label: "Conversion rate", unit: "percent", facts: "clicks" }
};

const BREAKDOWN_COLUMNS: Record<BreakdownDimension, ColumnRef> = {
  link_type: { table: "link", column: "link_type_name" },
  country: { table: "location", column: "country_name" },
  state: { table: "location", column: "state_name" },
  device_type: { table: "device", column: "device_type" },
  browser: { table: "device", column: "browser" },
  hour_of_day: { table: "date", column: "hour_of_day" },
  day_of_week: { table: "date", column: "day_of_week" },
  utm_source: { table: "fact", column: "utm_source" },
  utm_medium: { table: "fact", column: "utm_medium" },
  utm_content: { table: "fact", column: "utm_content" },
  utm_term: { table: "fact", column: "utm_term" },
  utm_campaign: { table: "fact", column: "utm_campaign" }
};

const PERFORMANCE_TEMPLATES: Record<PerformanceEntity, { rows: TemplateName; count: TemplateName; facts: FactKind }> = {
  link: { rows: "link_performance", count: "link_count", facts: "clicks" },
  product: { rows: "product_performance", count: "product_count", facts: "clicks" },
  retailer: { rows: "retailer_performance", count: "retailer_count", facts: "clicks" },
  page: { rows: "page_visit_performance", count: "page_count", facts: "visits" }
};

const WEEKDAY_NAMES = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];

const log = logger.child({ component: "reports" });

type FilterOptions = {
  facts: FactKind;
  groupBy?: ColumnRef;
  page?: PageRequest;
  extra?: EqualityFilter[];
};

const scopeFilter = (scope: ReportScope): EqualityFilter | null => {
  if (scope.kind === "all") {
    return null;
  }

  const { dimension, column } = SCOPE_FILTERS[scope.kind];
  return { dimension, column, value: scope.key };
};

/** The scope filter always comes first so its key binds at position 1. */
const buildFilterSet = (scope: ReportScope, params: ReportParams, options: FilterOptions): FilterSet => {
  const equalityFilters: EqualityFilter[] = [];
  const scoped = scopeFilter(scope);
  if (scoped) {
    equalityFilters.push(scoped);
  }

  if (options.facts === "clicks") {
    CLICK_FILTERS.forEach((filter) => {
      const value = params[filter.param];
      if (value !== null) {
        equalityFilters.push({ dimension: filter.dimension, column: filter.column, value });
      }
    });
  }

  equalityFilters.push(...(options.extra ?? []));

  return createFilterSet({
    date_range: { start: params.start, end: params.end },
    equality_filters: equalityFilters,
    group_by: options.groupBy ?? null,
    pagination: options.page ? paginationForPage(options.page.page, options.page.size) : null
  });
};

const readNumber = (value: ResultValue | undefined): number => {
  return typeof value === "number" ? value : 0;
};

const readLabel = (value: ResultValue | undefined): string => {
  if (value === null || value === undefined) {
    return "";
  }

  return String(value);
};

const scalarOf = (result: ExecutionResult): number => {
  return result.kind === "scalar" ? result.value : 0;
};

const rowsOf = (result: ExecutionResult): ResultRow[] => {
  return result.kind === "rows" ? result.rows : [];
};

const mergeWarnings = (...results: ExecutionResult[]): DegradedLookupWarning[] => {
  return results.flatMap((result) => result.warnings);
};

const formatCategory = (dimension: BreakdownDimension, value: ResultValue | undefined): string => {
  if (dimension === "hour_of_day" && typeof value === "number") {
    return `${String(value).padStart(2, "0")}:00`;
  }

  if (dimension === "day_of_week" && typeof value === "number") {
    return WEEKDAY_NAMES[value] ?? String(value);
  }

  return readLabel(value);
};

const groupSeries = (rows: ResultRow[]): TrendSeries[] => {
  const series = new Map<string, TimeseriesPoint[]>();
  rows.forEach((row) => {
    const name = readLabel(row.name);
    const points = series.get(name) ?? [];
    points.push({ date: readLabel(row.date), value: readNumber(row.value) });
    series.set(name, points);
  });

  return [...series.entries()].map(([name, data]) => ({ name, data }));
};

const safePercent = (numerator: number, denominator: number): number => {
  return denominator === 0 ? 0 : (numerator * 100) / denominator;
};

export type WarehouseReports = {
  getKpi: (metric: KpiMetric, scope: ReportScope, params: ReportParams) => Promise<KpiResponse>;
  getTrend: (
    metric: TrendMetric,
    scope: ReportScope,
    params: ReportParams,
    options?: { breakdown?: TrendBreakdown }
  ) => Promise<TrendResponse>;
  getBreakdown: (dimension: BreakdownDimension, scope: ReportScope, params: ReportParams) => Promise<BreakdownResponse>;
  getPerformanceTable: (
    entity: PerformanceEntity,
    scope: ReportScope,
    params: ReportParams,
    page: PageRequest
  ) => Promise<PaginatedResponse>;
  listClicks: (scope: ReportScope, params: ReportParams, page: PageRequest) => Promise<PaginatedResponse>;
};

export const createWarehouseReports = (executor: QueryExecutor): WarehouseReports => {
  const run = (name: TemplateName, scope: ReportScope, filterSet: FilterSet): Promise<ExecutionResult> => {
    const plan = buildQueryPlan(resolveTemplate(name, scope.kind), filterSet);
    log.debug({ template: name, scope: scope.kind, executor: executor.name }, "running report plan");
    return executor.execute(plan);
  };

  const withPageClicks = async (
    scope: ReportScope,
    params: ReportParams,
    rows: ResultRow[]
  ): Promise<{ items: TableRow[]; result: ExecutionResult | null }> => {
    const pageKeys = rows
      .map((row) => row.page_key)
      .filter((key): key is number => typeof key === "number");
    if (pageKeys.length === 0) {
      return { items: rows, result: null };
    }

    const result = await run(
      "page_click_counts",
      scope,
      buildFilterSet(scope, params, {
        facts: "clicks",
        extra: [{ dimension: null, column: "pagekey", value: pageKeys }]
      })
    );
    const clicksByPage = new Map<ResultValue, number>();
    rowsOf(result).forEach((row) => {
      clicksByPage.set(row.page_key, readNumber(row.clicks));
    });

    return {
      items: rows.map((row) => {
        const clicks = clicksByPage.get(row.page_key) ?? 0;
        return { ...row, clicks, ctr: safePercent(clicks, readNumber(row.visits)) };
      }),
      result
    };
  };

  return {
    getKpi: async (metric, scope, params) => {
      const definition = KPI_DEFINITIONS[metric];
      const result = await run(metric, scope, buildFilterSet(scope, params, { facts: definition.facts }));

      return {
        key: metric,
        label: definition.label,
        value: scalarOf(result),
        unit: definition.unit,
        warnings: result.warnings
      };
    },

    getTrend: async (metric, scope, params, options = {}) => {
      if (options.breakdown === "link_type") {
        if (metric !== "clicks") {
          throw new InvalidFilterError("Only click trends can be broken down by link type.", "breakdown");
        }

        const result = await run("click_trend_by_link_type", scope, buildFilterSet(scope, params, { facts: "clicks" }));
        return { metric, series: groupSeries(rowsOf(result)), warnings: result.warnings };
      }

      const template: TemplateName = metric === "clicks" ? "click_trend" : "visit_trend";
      const result = await run(template, scope, buildFilterSet(scope, params, { facts: metric }));
      return {
        metric,
        data: rowsOf(result).map((row) => ({ date: readLabel(row.date), value: readNumber(row.value) })),
        warnings: result.warnings
      };
    },

    getBreakdown: async (dimension, scope, params) => {
      const groupBy = BREAKDOWN_COLUMNS[dimension];
      const template: TemplateName = groupBy.table === "date" ? "click_breakdown_by_time" : "click_breakdown";
      const result = await run(template, scope, buildFilterSet(scope, params, { facts: "clicks", groupBy }));

      return {
        dimension,
        data: rowsOf(result).map((row) => ({
          category: formatCategory(dimension, row.category),
          value: readNumber(row.value)
        })),
        warnings: result.warnings
      };
    },

    getPerformanceTable: async (entity, scope, params, page) => {
      const templates = PERFORMANCE_TEMPLATES[entity];
      const [rowsResult, countResult] = await Promise.all([
        run(templates.rows, scope, buildFilterSet(scope, params, { facts: templates.facts, page })),
        run(templates.count, scope, buildFilterSet(scope, params, { facts: templates.facts }))
      ]);

      const totalItems = scalarOf(countResult);
      let items: TableRow[] = rowsOf(rowsResult);
      const warnings = mergeWarnings(rowsResult, countResult);

      if (entity === "page") {
        const merged = await withPageClicks(scope, params, items);
        items = merged.items;
        if (merged.result) {
          warnings.push(...merged.result.warnings);
        }
      }

      return {
        total_items: totalItems,
        items,
        page: page.page,
        size: page.size,
        total_pages: countPages(totalItems, page.size),
        warnings
      };
    },

    listClicks: async (scope, params, page) => {
      const [rowsResult, countResult] = await Promise.all([
        run("click_listing", scope, buildFilterSet(scope, params, { facts: "clicks", page })),
        run("click_listing_count", scope, buildFilterSet(scope, params, { facts: "clicks" }))
      ]);
      const totalItems = scalarOf(countResult);

      return {
        total_items: totalItems,
        items: rowsOf(rowsResult),
        page: page.page,
        size: page.size,
        total_pages: countPages(totalItems, page.size),
        warnings: mergeWarnings(rowsResult, countResult)
      };
    }
  };
};
