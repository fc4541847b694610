import { z } from "zod";

import { isValidDateYYYYMMDD } from "../warehouse/dates";
import type { DegradedLookupWarning } from "../warehouse/errors";
import { MAX_PAGE_SIZE } from "../warehouse/filters";
import type { ResultValue } from "../warehouse/normalize";
import type { ScopeKind } from "../warehouse/templates";

export const DEFAULT_PAGE_SIZE = 20;
const MAX_OPTIONAL_FILTER_LENGTH = 120;

export const KPI_METRICS = [
  "total_clicks",
  "total_atc_clicks",
  "total_page_visits",
  "total_link_value",
  "page_ctr",
  "conversion_rate"
] as const;
export type KpiMetric = (typeof KPI_METRICS)[number];

export const TREND_METRICS = ["clicks", "visits"] as const;
export type TrendMetric = (typeof TREND_METRICS)[number];
export type TrendBreakdown = "link_type";

export const BREAKDOWN_DIMENSIONS = [
  "link_type",
  "country",
  "state",
  "device_type",
  "browser",
  "hour_of_day",
  "day_of_week",
  "utm_source",
  "utm_medium",
  "utm_content",
  "utm_term",
  "utm_campaign"
] as const;
export type BreakdownDimension = (typeof BREAKDOWN_DIMENSIONS)[number];

export const PERFORMANCE_ENTITIES = ["link", "product", "retailer", "page"] as const;
export type PerformanceEntity = (typeof PERFORMANCE_ENTITIES)[number];

export type ReportScope =
  | { kind: "all" }
  | { kind: Exclude<ScopeKind, "all">; key: string };

export type ReportParams = {
  start: string | null;
  end: string | null;
  link_type: string | null;
  country: string | null;
  device_type: string | null;
  utm_source: string | null;
  utm_medium: string | null;
  utm_campaign: string | null;
  page: number;
  size: number;
};

export type ReportValidationIssue = {
  field: string;
  message: string;
};

export type ReportParamsParseResult =
  | { ok: true; value: ReportParams }
  | { ok: false; errors: ReportValidationIssue[] };

export type KpiUnit = "count" | "currency" | "percent";

export type KpiResponse = {
  key: KpiMetric;
  label: string;
  value: number;
  unit: KpiUnit;
  warnings: DegradedLookupWarning[];
};

export type TimeseriesPoint = {
  date: string;
  value: number;
};

export type TrendSeries = {
  name: string;
  data: TimeseriesPoint[];
};

export type TrendResponse =
  | { metric: TrendMetric; data: TimeseriesPoint[]; warnings: DegradedLookupWarning[] }
  | { metric: TrendMetric; series: TrendSeries[]; warnings: DegradedLookupWarning[] };

export type BreakdownPoint = {
  category: string;
  value: number;
};

export type BreakdownResponse = {
  dimension: BreakdownDimension;
  data: BreakdownPoint[];
  warnings: DegradedLookupWarning[];
};

export type TableRow = Record<string, ResultValue>;

export type PaginatedResponse<Row extends TableRow = TableRow> = {
  total_items: number;
  items: Row[];
  page: number;
  size: number;
  total_pages: number;
  warnings: DegradedLookupWarning[];
};

export type PageRequest = {
  page: number;
  size: number;
};

const blankToUndefined = (value: unknown): unknown => {
  if (typeof value !== "string") {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const optionalText = () =>
  z.preprocess(
    blankToUndefined,
    z
      .string()
      .max(MAX_OPTIONAL_FILTER_LENGTH, { message: `must be ${MAX_OPTIONAL_FILTER_LENGTH} characters or fewer` })
      .optional()
  );

const optionalDate = () =>
  z.preprocess(
    blankToUndefined,
    z.string().refine((value) => isValidDateYYYYMMDD(value), { message: "must match YYYY-MM-DD" }).optional()
  );

const pageNumber = (fallback: number, max?: number) => {
  const base = z.coerce
    .number({ invalid_type_error: "must be a number" })
    .int({ message: "must be an integer" })
    .min(1, { message: "must be 1 or greater" });

  return z.preprocess(
    (value) => blankToUndefined(value) ?? String(fallback),
    max === undefined ? base : base.max(max, { message: `must be ${max} or fewer` })
  );
};

const reportParamsSchema = z
  .object({
    start: optionalDate(),
    end: optionalDate(),
    link_type: optionalText(),
    country: optionalText(),
    device_type: optionalText(),
    utm_source: optionalText(),
    utm_medium: optionalText(),
    utm_campaign: optionalText(),
    page: pageNumber(1),
    size: pageNumber(DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE)
  })
  .superRefine((value, context) => {
    if (value.start && value.end && value.start > value.end) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["params"],
        message: "start must be on or before end"
      });
    }
  });

const REPORT_PARAM_KEYS = Object.keys(reportParamsSchema.innerType().shape);

export const parseReportParams = (searchParams: URLSearchParams): ReportParamsParseResult => {
  const raw = Object.fromEntries(REPORT_PARAM_KEYS.map((key) => [key, searchParams.get(key)]));
  const parsed = reportParamsSchema.safeParse(raw);

  if (!parsed.success) {
    return {
      ok: false,
      errors: parsed.error.issues.map((issue) => ({
        field: issue.path.length > 0 ? issue.path.join(".") : "params",
        message: issue.message
      }))
    };
  }

  const value = parsed.data;
  return {
    ok: true,
    value: {
      start: value.start ?? null,
      end: value.end ?? null,
      link_type: value.link_type ?? null,
      country: value.country ?? null,
      device_type: value.device_type ?? null,
      utm_source: value.utm_source ?? null,
      utm_medium: value.utm_medium ?? null,
      utm_campaign: value.utm_campaign ?? null,
      page: value.page,
      size: value.size
    }
  };
};
