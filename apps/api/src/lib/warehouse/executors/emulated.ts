import { DEFAULT_EMULATED_MAX_ROWS, DEFAULT_QUERY_TIMEOUT_MS } from "../../env";
import { logger, type Logger } from "../../logger";
import {
  BackendQueryError,
  UnsupportedPlanError,
  describeError,
  isBackendQueryError,
  isUnsupportedPlanError,
  type DegradedLookupWarning
} from "../errors";
import type { QueryExecutor } from "../executor";
import {
  describeResultShape,
  emptyResult,
  normalizeResult,
  toNumber,
  type ExecutionResult
} from "../normalize";
import type { Aggregate, ParamValue, Predicate, QueryPlan, SimpleAggregate } from "../plan";
import { DIMENSIONS, type DimensionName, type DimensionRef, type FactRef } from "../schema";
import { withDeadline } from "../timeout";
import { sortRows, type TableClient, type TableFilter, type TableOrder, type TableSelect } from "./table_client";

export type EmulatedExecutorOptions = {
  connect: () => Promise<TableClient>;
  timeoutMs?: number;
  /** Upper bound on rows fetched for any client-side reduction, lookup or ordering. */
  maxRows?: number;
  /** Rows requested per round trip. */
  pageSize?: number;
  /** Longest key list sent in one membership filter. */
  maxKeysPerFilter?: number;
  logger?: Logger;
};

export const DEFAULT_PAGE_SIZE = 1000;
export const DEFAULT_MAX_KEYS_PER_FILTER = 200;

// Fact queries one plan may fan out into once long key lists are split.
const MAX_FILTER_VARIANTS = 25;

type Scope = {
  fact: FactRef;
  joins: DimensionRef[];
  predicates: Predicate[];
};

/** Filter lists over disjoint fact rows; the answer covers their union. */
type FilterVariants = TableFilter[][];

type FetchRequest = {
  table: string;
  columns: string[];
  /** Unique column giving pages a stable order. */
  key: string;
};

type RunContext = {
  client: TableClient;
  plan: QueryPlan;
  signal: AbortSignal;
  warnings: DegradedLookupWarning[];
};

const BACKEND = "emulated";

const simpleAggregatesOf = (aggregate: Aggregate): SimpleAggregate[] => {
  switch (aggregate.kind) {
    case "rate":
      return [aggregate.numerator, aggregate.denominator];
    case "ratio":
      return [aggregate.numerator.aggregate, aggregate.denominator.aggregate];
    default:
      return [aggregate];
  }
};

const scopesOf = (plan: QueryPlan): Scope[] => {
  const [first] = plan.measures;
  if (first && first.aggregate.kind === "ratio") {
    return [first.aggregate.numerator, first.aggregate.denominator];
  }

  return [{ fact: plan.fact, joins: plan.joins, predicates: plan.predicates }];
};

/**
 * Rejects every plan shape the table primitives cannot answer exactly. Runs before any
 * backend call.
 */
export const assertEmulable = (plan: QueryPlan): void => {
  const unsupported = (reason: string): never => {
    throw new UnsupportedPlanError(plan.template, reason);
  };

  if (plan.groupBy.length > 0) {
    unsupported("grouped aggregation needs server-side GROUP BY");
  }

  if (plan.shape === "rows" && plan.measures.length > 0) {
    unsupported("aggregated rows need server-side GROUP BY");
  }

  plan.select.forEach((column) => {
    if (column.column.table !== "fact") {
      unsupported(`selecting ${column.column.table}.${column.column.column} needs a join`);
    }
  });

  plan.order.forEach((term) => {
    if (!plan.select.some((column) => column.as === term.key)) {
      unsupported(`ordering by ${term.key} is not a selected fact column`);
    }
  });

  plan.measures.forEach((measure) => {
    simpleAggregatesOf(measure.aggregate).forEach((aggregate) => {
      if (aggregate.column.table !== "fact") {
        unsupported(`aggregating ${aggregate.column.table}.${aggregate.column.column} needs a join`);
      }
    });
  });

  scopesOf(plan).forEach((scope) => {
    scope.predicates.forEach((predicate) => {
      const { table, column } = predicate.column;
      if (table !== "fact" && DIMENSIONS[table].expressions?.[column]) {
        unsupported(`filtering on derived column ${table}.${column}`);
      }
    });
  });
};

const readParam = (plan: QueryPlan, predicate: Predicate): ParamValue => {
  if (predicate.paramIndex === null) {
    throw new Error(`Predicate on ${predicate.column.column} has no bound parameter.`);
  }

  return plan.params[predicate.paramIndex - 1];
};

const toTableFilter = (plan: QueryPlan, column: string, predicate: Predicate): TableFilter => {
  if (predicate.operator === "is_not_null") {
    return { op: "not_null", column };
  }

  const value = readParam(plan, predicate);
  if (Array.isArray(value)) {
    return { op: "in", column, values: value };
  }

  if (typeof value !== "string" && typeof value !== "number" && typeof value !== "boolean") {
    throw new UnsupportedPlanError(plan.template, `parameter for ${column} is not a scalar`);
  }

  if (predicate.operator === ">=" || predicate.operator === "<=") {
    if (typeof value === "boolean") {
      throw new UnsupportedPlanError(plan.template, `range bound on boolean column ${column}`);
    }
    return { op: predicate.operator === ">=" ? "gte" : "lte", column, value };
  }

  return { op: "eq", column, value };
};

const reduceRows = (rows: Array<Record<string, unknown>>, aggregate: SimpleAggregate, plan: QueryPlan): number => {
  const column = aggregate.column.column;
  const present = rows.filter((row) => row[column] !== null && row[column] !== undefined);

  switch (aggregate.kind) {
    case "sum":
      return present.reduce((total, row) => total + toNumber(row[column]), 0);
    case "avg":
      return present.length === 0
        ? 0
        : present.reduce((total, row) => total + toNumber(row[column]), 0) / present.length;
    case "count": {
      const condition = aggregate.condition;
      const matching = condition
        ? present.filter((row) => row[condition.column.column] === readParam(plan, condition))
        : present;
      if (!aggregate.distinct) {
        return matching.length;
      }
      return new Set(matching.map((row) => row[column])).size;
    }
  }
};

const chunk = <T>(values: readonly T[], size: number): T[][] => {
  const chunks: T[][] = [];
  for (let start = 0; start < values.length; start += size) {
    chunks.push(values.slice(start, start + size));
  }
  return chunks;
};

const safeRatio = (numerator: number, denominator: number, scale: number): number => {
  if (!Number.isFinite(numerator) || !Number.isFinite(denominator) || denominator === 0) {
    return 0;
  }

  return (numerator * scale) / denominator;
};

export class EmulatedQueryExecutor implements QueryExecutor {
  readonly name = BACKEND;
  private readonly timeoutMs: number;
  private readonly maxRows: number;
  private readonly pageSize: number;
  private readonly maxKeysPerFilter: number;
  private readonly log: Logger;

  constructor(private readonly options: EmulatedExecutorOptions) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_QUERY_TIMEOUT_MS;
    this.maxRows = options.maxRows ?? DEFAULT_EMULATED_MAX_ROWS;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.maxKeysPerFilter = options.maxKeysPerFilter ?? DEFAULT_MAX_KEYS_PER_FILTER;
    this.log = (options.logger ?? logger).child({ component: "warehouse.emulated" });
  }

  async execute(plan: QueryPlan): Promise<ExecutionResult> {
    assertEmulable(plan);
    const shape = describeResultShape(plan);

    try {
      return await withDeadline({ backend: BACKEND, label: plan.template, timeoutMs: this.timeoutMs }, async (signal) => {
        const context: RunContext = {
          client: await this.options.connect(),
          plan,
          signal,
          warnings: []
        };

        if (plan.shape === "rows") {
          const rows = await this.runListing(context);
          return rows === null
            ? emptyResult(shape, context.warnings)
            : normalizeResult({ rows }, shape, context.warnings);
        }

        const value = await this.runScalar(context);
        return value === null
          ? emptyResult(shape, context.warnings)
          : normalizeResult({ scalar: value }, shape, context.warnings);
      });
    } catch (error) {
      if (isUnsupportedPlanError(error)) {
        throw error;
      }

      this.log.error({ template: plan.template, error }, "emulated query failed");
      if (isBackendQueryError(error)) {
        throw error;
      }

      throw new BackendQueryError(`Emulated query "${plan.template}" failed: ${describeError(error)}`, {
        backend: BACKEND,
        cause: error
      });
    }
  }

  private async select(context: RunContext, request: Omit<TableSelect, "signal">) {
    this.log.debug(
      { template: context.plan.template, table: request.table, filters: request.filters.length, range: request.range },
      "emulated select"
    );
    return context.client.select({ ...request, signal: context.signal });
  }

  private async countRows(context: RunContext, table: string, variants: FilterVariants): Promise<number> {
    let total = 0;
    for (const filters of variants) {
      const result = await this.select(context, { table, columns: ["*"], filters, count: true, head: true });
      total += result.count ?? 0;
    }
    return total;
  }

  private assertWithinCap(context: RunContext, needed: number, purpose: string): void {
    if (needed > this.maxRows) {
      throw new UnsupportedPlanError(
        context.plan.template,
        `${purpose} needs ${needed} rows, above the ${this.maxRows} row cap`
      );
    }
  }

  /**
   * Reads every row matching any of `variants`. The first page of each variant carries an
   * exact count and later pages start after the rows actually received, so a backend that
   * returns fewer rows than asked for is still read to the end. Short reads that cannot be
   * continued raise `UnsupportedPlanError`.
   */
  private async fetchRows(
    context: RunContext,
    request: FetchRequest,
    variants: FilterVariants,
    purpose: string
  ): Promise<Array<Record<string, unknown>>> {
    const { capabilities } = context.client;
    const order: TableOrder[] = capabilities.ordering ? [{ column: request.key, ascending: true }] : [];
    const rows: Array<Record<string, unknown>> = [];
    let counted = 0;

    for (const filters of variants) {
      const readPage = (from: number, count: boolean) =>
        this.select(context, {
          table: request.table,
          columns: request.columns,
          filters,
          ...(count ? { count: true } : {}),
          ...(order.length > 0 ? { order } : {}),
          ...(capabilities.ranges ? { range: { from, to: from + this.pageSize - 1 } } : {})
        });

      const first = await readPage(0, true);
      const expected = first.count ?? first.rows.length;
      counted += expected;
      this.assertWithinCap(context, counted, purpose);

      const received = [...first.rows];
      while (capabilities.ranges && received.length < expected) {
        const next = await readPage(received.length, false);
        if (next.rows.length === 0) {
          break;
        }
        received.push(...next.rows);
      }

      if (received.length < expected) {
        throw new UnsupportedPlanError(
          context.plan.template,
          `${purpose} received ${received.length} of ${expected} rows`
        );
      }

      rows.push(...received);
    }

    return rows;
  }

  /** Surrogate keys matching a dimension's predicates, or null when the lookup failed. */
  private async lookupKeys(
    context: RunContext,
    dimension: DimensionRef,
    predicates: Predicate[]
  ): Promise<Array<string | number> | null> {
    const filters = predicates.map((predicate) => toTableFilter(context.plan, predicate.column.column, predicate));

    try {
      const rows = await this.fetchRows(
        context,
        { table: dimension.table, columns: [dimension.key], key: dimension.key },
        [filters],
        `lookup on ${dimension.table}`
      );

      const keys = new Set<string | number>();
      rows.forEach((row) => {
        const key = row[dimension.key];
        if (typeof key === "string" || typeof key === "number") {
          keys.add(key);
        }
      });
      return [...keys];
    } catch (error) {
      if (isUnsupportedPlanError(error) || context.signal.aborted) {
        throw error;
      }

      const warning: DegradedLookupWarning = {
        code: "degraded_lookup",
        dimension: dimension.name,
        table: dimension.table,
        message: `Lookup on ${dimension.table} failed and was treated as no matches: ${describeError(error)}`
      };
      context.warnings.push(warning);
      this.log.warn({ template: context.plan.template, table: dimension.table, error }, warning.message);
      return null;
    }
  }

  /**
   * Folds joined-dimension predicates into fact filters. Long key lists are split across
   * several filter variants. Returns null when a lookup comes back empty (or degraded), which
   * means no fact row can match.
   */
  private async resolveFactFilters(context: RunContext, scope: Scope): Promise<FilterVariants | null> {
    const filters: TableFilter[] = [];
    const byDimension = new Map<DimensionName, Predicate[]>();

    scope.predicates.forEach((predicate) => {
      const table = predicate.column.table;
      if (table === "fact") {
        filters.push(toTableFilter(context.plan, predicate.column.column, predicate));
        return;
      }

      byDimension.set(table, [...(byDimension.get(table) ?? []), predicate]);
    });

    let variants: FilterVariants = [filters];
    for (const dimension of scope.joins) {
      const foreignKey = scope.fact.joins[dimension.name] ?? dimension.key;
      const predicates = byDimension.get(dimension.name) ?? [];
      if (predicates.length === 0) {
        variants = variants.map((variant): TableFilter[] => [...variant, { op: "not_null", column: foreignKey }]);
        continue;
      }

      const keys = await this.lookupKeys(context, dimension, predicates);
      if (keys === null || keys.length === 0) {
        return null;
      }

      const chunks = chunk(keys, this.maxKeysPerFilter);
      variants = variants.flatMap((variant) =>
        chunks.map((values): TableFilter[] => [...variant, { op: "in", column: foreignKey, values }])
      );
      if (variants.length > MAX_FILTER_VARIANTS) {
        throw new UnsupportedPlanError(
          context.plan.template,
          `${dimension.table} keys split into ${variants.length} fact queries, above the ${MAX_FILTER_VARIANTS} query limit`
        );
      }
    }

    return variants;
  }

  private async runAggregate(
    context: RunContext,
    scope: Scope,
    variants: FilterVariants,
    aggregate: SimpleAggregate
  ): Promise<number> {
    const column = aggregate.column.column;
    if (aggregate.kind === "count" && !aggregate.distinct && !aggregate.condition) {
      const countVariants =
        column === scope.fact.primaryKey
          ? variants
          : variants.map((filters): TableFilter[] => [...filters, { op: "not_null", column }]);
      return this.countRows(context, scope.fact.table, countVariants);
    }

    const columns = [column];
    if (aggregate.kind === "count" && aggregate.condition) {
      columns.push(aggregate.condition.column.column);
    }

    const rows = await this.fetchRows(
      context,
      { table: scope.fact.table, columns, key: scope.fact.primaryKey },
      variants,
      `${aggregate.kind} over ${scope.fact.table}`
    );
    return reduceRows(rows, aggregate, context.plan);
  }

  private async runScalar(context: RunContext): Promise<number | null> {
    const [measure] = context.plan.measures;
    if (!measure) {
      throw new UnsupportedPlanError(context.plan.template, "scalar plan without a measure");
    }

    const aggregate = measure.aggregate;
    if (aggregate.kind === "ratio") {
      const numeratorVariants = await this.resolveFactFilters(context, aggregate.numerator);
      const numerator =
        numeratorVariants === null
          ? 0
          : await this.runAggregate(context, aggregate.numerator, numeratorVariants, aggregate.numerator.aggregate);

      const denominatorVariants = await this.resolveFactFilters(context, aggregate.denominator);
      const denominator =
        denominatorVariants === null
          ? 0
          : await this.runAggregate(
              context,
              aggregate.denominator,
              denominatorVariants,
              aggregate.denominator.aggregate
            );

      return safeRatio(numerator, denominator, aggregate.scale);
    }

    const scope: Scope = { fact: context.plan.fact, joins: context.plan.joins, predicates: context.plan.predicates };
    const variants = await this.resolveFactFilters(context, scope);
    if (variants === null) {
      return null;
    }

    if (aggregate.kind === "rate") {
      const numerator = await this.runAggregate(context, scope, variants, aggregate.numerator);
      const denominator = await this.runAggregate(context, scope, variants, aggregate.denominator);
      return safeRatio(numerator, denominator, aggregate.scale);
    }

    return this.runAggregate(context, scope, variants, aggregate);
  }

  private async runListing(context: RunContext): Promise<Array<Record<string, unknown>> | null> {
    const { plan, client } = context;
    const scope: Scope = { fact: plan.fact, joins: plan.joins, predicates: plan.predicates };
    const variants = await this.resolveFactFilters(context, scope);
    if (variants === null) {
      return null;
    }

    const columns = plan.select.map((column) => column.column.column);
    const order: TableOrder[] = plan.order.map((term) => {
      const selected = plan.select.find((column) => column.as === term.key);
      return { column: selected ? selected.column.column : term.key, ascending: term.direction === "asc" };
    });
    const pagination = plan.pagination;
    const [onlyVariant] = variants;
    const pushDown =
      pagination !== null &&
      variants.length === 1 &&
      client.capabilities.ranges &&
      (order.length === 0 || client.capabilities.ordering);

    let rows: Array<Record<string, unknown>>;
    if (pushDown && pagination && onlyVariant) {
      const result = await this.select(context, {
        table: plan.fact.table,
        columns,
        filters: onlyVariant,
        ...(order.length > 0 ? { order } : {}),
        range: { from: pagination.offset, to: pagination.offset + pagination.limit - 1 }
      });
      rows = result.rows;
    } else {
      const fetched = await this.fetchRows(
        context,
        { table: plan.fact.table, columns, key: plan.fact.primaryKey },
        variants,
        `listing over ${plan.fact.table}`
      );
      const ordered = order.length > 0 ? sortRows(fetched, order) : fetched;
      rows = pagination ? ordered.slice(pagination.offset, pagination.offset + pagination.limit) : ordered;
    }

    return rows.map((row) => {
      const output: Record<string, unknown> = {};
      plan.select.forEach((column) => {
        output[column.as] = row[column.column.column];
      });
      return output;
    });
  }
}
