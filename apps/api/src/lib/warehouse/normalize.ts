import type { DegradedLookupWarning } from "./errors";
import type { QueryPlan } from "./plan";
import { resolveColumnType, type ColumnType } from "./schema";

export type ResultValue = string | number | boolean | null;
export type ResultRow = Record<string, ResultValue>;

export type ExecutionResult =
  | { kind: "scalar"; value: number; warnings: DegradedLookupWarning[] }
  | { kind: "rows"; rows: ResultRow[]; warnings: DegradedLookupWarning[] };

export type ResultField = {
  name: string;
  type: ColumnType | "measure";
};

export type ResultShapeSpec =
  | { kind: "scalar"; name: string }
  | { kind: "rows"; fields: ResultField[] };

export type RawResult =
  | { rows: Array<Record<string, unknown>> }
  | { scalar: unknown };

export const toNumber = (value: unknown): number => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : 0;
  }

  if (typeof value === "bigint") {
    return Number(value);
  }

  if (typeof value === "string") {
    const parsed = Number.parseFloat(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }

  return 0;
};

const toNullableNumber = (value: unknown): number | null => {
  if (value === null || value === undefined) {
    return null;
  }

  return toNumber(value);
};

export const toNullableString = (value: unknown): string | null => {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === "string") {
    return value;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  return String(value);
};

export const toDateOnlyString = (value: unknown): string | null => {
  if (value instanceof Date) {
    // pg hands DATE columns back as local midnight.
    const month = `${value.getMonth() + 1}`.padStart(2, "0");
    const day = `${value.getDate()}`.padStart(2, "0");
    return `${value.getFullYear()}-${month}-${day}`;
  }

  const normalized = toNullableString(value);
  if (!normalized) {
    return null;
  }

  if (/^\d{4}-\d{2}-\d{2}$/.test(normalized)) {
    return normalized;
  }

  const parsed = new Date(normalized);
  if (Number.isNaN(parsed.getTime())) {
    return null;
  }

  return parsed.toISOString().slice(0, 10);
};

const toNullableBoolean = (value: unknown): boolean | null => {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === "boolean") {
    return value;
  }

  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    return normalized === "t" || normalized === "true" || normalized === "1";
  }

  return Boolean(value);
};

const normalizeField = (value: unknown, type: ResultField["type"]): ResultValue => {
  switch (type) {
    case "measure":
      return toNumber(value);
    case "integer":
    case "numeric":
      return toNullableNumber(value);
    case "boolean":
      return toNullableBoolean(value);
    case "date":
      return toDateOnlyString(value);
    case "timestamp":
    case "text":
      return toNullableString(value);
  }
};

/** The fields a plan produces, in output order: selected columns first, then measures. */
export const describeResultShape = (plan: QueryPlan): ResultShapeSpec => {
  if (plan.shape === "scalar") {
    return { kind: "scalar", name: plan.measures[0]?.name ?? "value" };
  }

  const fields: ResultField[] = plan.select.map((column) => ({
    name: column.as,
    type: resolveColumnType(plan.fact, column.column) ?? "text"
  }));
  plan.measures.forEach((measure) => {
    fields.push({ name: measure.name, type: "measure" });
  });

  return { kind: "rows", fields };
};

/**
 * Converts raw backend output into the shared result shape. Absent measures become 0 and
 * absent labels become null; row order is kept as delivered.
 */
export const normalizeResult = (
  raw: RawResult,
  shape: ResultShapeSpec,
  warnings: DegradedLookupWarning[] = []
): ExecutionResult => {
  if (shape.kind === "scalar") {
    const value = "scalar" in raw ? raw.scalar : raw.rows[0]?.[shape.name];
    return { kind: "scalar", value: toNumber(value), warnings };
  }

  const rows = "rows" in raw ? raw.rows : [];
  return {
    kind: "rows",
    rows: rows.map((row) => {
      const normalized: ResultRow = {};
      shape.fields.forEach((field) => {
        normalized[field.name] = normalizeField(row[field.name], field.type);
      });
      return normalized;
    }),
    warnings
  };
};

export const emptyResult = (shape: ResultShapeSpec, warnings: DegradedLookupWarning[] = []): ExecutionResult => {
  return shape.kind === "scalar"
    ? { kind: "scalar", value: 0, warnings }
    : { kind: "rows", rows: [], warnings };
};
