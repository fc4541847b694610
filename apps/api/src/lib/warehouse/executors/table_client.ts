import type { SupabaseClient } from "@supabase/supabase-js";

import { BackendQueryError } from "../errors";
import type { ScalarFilterValue } from "../filters";

export type TableFilter =
  | { op: "eq"; column: string; value: ScalarFilterValue }
  | { op: "in"; column: string; values: ReadonlyArray<string | number> }
  | { op: "gte" | "lte"; column: string; value: string | number }
  | { op: "not_null"; column: string };

export type TableOrder = {
  column: string;
  ascending: boolean;
};

export type TableSelect = {
  table: string;
  columns: string[];
  filters: TableFilter[];
  /** Request an exact count of the filtered rows. */
  count?: boolean;
  /** Return the count only, without rows. */
  head?: boolean;
  order?: TableOrder[];
  /** Inclusive row range, applied after filtering and ordering. */
  range?: { from: number; to: number };
  signal?: AbortSignal;
};

export type TableSelectResult = {
  rows: Array<Record<string, unknown>>;
  count: number | null;
};

export type TableCapabilities = {
  ordering: boolean;
  ranges: boolean;
};

/** Single-table select/filter/count primitives; no joins, no grouping. */
export interface TableClient {
  readonly capabilities: TableCapabilities;
  select(request: TableSelect): Promise<TableSelectResult>;
}

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null && !Array.isArray(value);
};

export const createSupabaseTableClient = (client: SupabaseClient): TableClient => ({
  capabilities: { ordering: true, ranges: true },
  select: async (request) => {
    let query = client
      .from(request.table)
      .select<string, Record<string, unknown>>(
        request.columns.join(","),
        request.count ? { count: "exact", head: request.head ?? false } : undefined
      );

    for (const filter of request.filters) {
      switch (filter.op) {
        case "eq":
          query = query.eq(filter.column, filter.value);
          break;
        case "in":
          query = query.in(filter.column, [...filter.values]);
          break;
        case "gte":
          query = query.gte(filter.column, filter.value);
          break;
        case "lte":
          query = query.lte(filter.column, filter.value);
          break;
        case "not_null":
          query = query.not(filter.column, "is", null);
          break;
      }
    }

    for (const order of request.order ?? []) {
      query = query.order(order.column, { ascending: order.ascending });
    }

    if (request.range) {
      query = query.range(request.range.from, request.range.to);
    }

    if (request.signal) {
      query = query.abortSignal(request.signal);
    }

    const { data, error, count } = await query;
    if (error) {
      throw new BackendQueryError(`Select on ${request.table} failed: ${error.message}`, {
        backend: "emulated",
        cause: error
      });
    }

    return {
      rows: Array.isArray(data) ? data.filter(isRecord) : [],
      count: typeof count === "number" ? count : null
    };
  }
});

const compareNullable = (left: unknown, right: unknown, ascending: boolean): number => {
  const leftMissing = left === null || left === undefined;
  const rightMissing = right === null || right === undefined;
  if (leftMissing || rightMissing) {
    if (leftMissing && rightMissing) {
      return 0;
    }
    // NULLS LAST when ascending, NULLS FIRST when descending.
    return leftMissing === ascending ? 1 : -1;
  }

  let result = 0;
  if (typeof left === "number" && typeof right === "number") {
    result = left - right;
  } else {
    const leftText = String(left);
    const rightText = String(right);
    result = leftText < rightText ? -1 : leftText > rightText ? 1 : 0;
  }

  return ascending ? result : -result;
};

/** Stable sort with the database's default null placement. */
export const sortRows = <T extends Record<string, unknown>>(rows: T[], order: readonly TableOrder[]): T[] => {
  return [...rows].sort((left, right) => {
    for (const term of order) {
      const result = compareNullable(left[term.column], right[term.column], term.ascending);
      if (result !== 0) {
        return result;
      }
    }
    return 0;
  });
};

const compareBound = (value: unknown, bound: string | number): number | null => {
  if (typeof value === "number" && typeof bound === "number") {
    return value - bound;
  }

  if (typeof value === "string" && typeof bound === "string") {
    return value < bound ? -1 : value > bound ? 1 : 0;
  }

  return null;
};

const matchesFilter = (row: Record<string, unknown>, filter: TableFilter): boolean => {
  const value = row[filter.column];
  switch (filter.op) {
    case "eq":
      return value === filter.value;
    case "in":
      return filter.values.some((candidate) => candidate === value);
    case "gte": {
      const comparison = compareBound(value, filter.value);
      return comparison !== null && comparison >= 0;
    }
    case "lte": {
      const comparison = compareBound(value, filter.value);
      return comparison !== null && comparison <= 0;
    }
    case "not_null":
      return value !== null && value !== undefined;
  }
};

const projectRow = (row: Record<string, unknown>, columns: string[]): Record<string, unknown> => {
  if (columns.includes("*")) {
    return { ...row };
  }

  const projected: Record<string, unknown> = {};
  columns.forEach((column) => {
    projected[column] = row[column] ?? null;
  });
  return projected;
};

export type MemoryTableClientOptions = {
  capabilities?: Partial<TableCapabilities>;
  /** Returns an error to raise instead of answering the request. */
  failWith?: (request: TableSelect) => Error | null;
};

export type MemoryTableClient = TableClient & {
  readonly requests: TableSelect[];
};

/** In-process table store with the same contract as the Supabase adapter. */
export const createMemoryTableClient = (
  tables: Record<string, Array<Record<string, unknown>>>,
  options: MemoryTableClientOptions = {}
): MemoryTableClient => {
  const capabilities: TableCapabilities = {
    ordering: options.capabilities?.ordering ?? true,
    ranges: options.capabilities?.ranges ?? true
  };
  const requests: TableSelect[] = [];

  return {
    capabilities,
    requests,
    select: async (request) => {
      requests.push(request);

      const failure = options.failWith?.(request) ?? null;
      if (failure) {
        throw failure;
      }

      if ((request.order && !capabilities.ordering) || (request.range && !capabilities.ranges)) {
        throw new Error(`Table client cannot order or range ${request.table}`);
      }

      const source = tables[request.table];
      if (!source) {
        throw new BackendQueryError(`Unknown table ${request.table}`, { backend: "emulated" });
      }

      const filtered = source.filter((row) => request.filters.every((filter) => matchesFilter(row, filter)));
      const ordered = request.order ? sortRows(filtered, request.order) : filtered;
      const ranged = request.range ? ordered.slice(request.range.from, request.range.to + 1) : ordered;

      return {
        rows: request.head ? [] : ranged.map((row) => projectRow(row, request.columns)),
        count: request.count ? filtered.length : null
      };
    }
  };
};
