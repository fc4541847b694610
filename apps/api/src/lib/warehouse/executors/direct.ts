import { DEFAULT_QUERY_TIMEOUT_MS } from "../../env";
import { logger, type Logger } from "../../logger";
import { BackendQueryError, describeError } from "../errors";
import type { QueryExecutor } from "../executor";
import { describeResultShape, normalizeResult, type ExecutionResult } from "../normalize";
import type { Aggregate, Predicate, QueryPlan, SimpleAggregate, SubPlan } from "../plan";
import { DIMENSIONS, getColumnExpression, type ColumnRef, type DimensionRef, type FactRef } from "../schema";
import { withDeadline } from "../timeout";

export type DirectClient = {
  query: (
    text: string,
    values?: unknown[]
  ) => Promise<{ rows: Array<Record<string, unknown>>; rowCount: number | null }>;
};

export type RenderedStatement = {
  text: string;
  values: unknown[];
};

const renderColumn = (fact: FactRef, ref: ColumnRef): string => {
  if (ref.table === "fact") {
    return `${fact.alias}.${ref.column}`;
  }

  const dimension = DIMENSIONS[ref.table];
  return getColumnExpression(dimension, ref.column) ?? `${dimension.alias}.${ref.column}`;
};

const renderJoins = (fact: FactRef, joins: DimensionRef[]): string[] => {
  return joins.map((dimension) => {
    const foreignKey = fact.joins[dimension.name] ?? dimension.key;
    return `JOIN ${dimension.table} ${dimension.alias} ON ${fact.alias}.${foreignKey} = ${dimension.alias}.${dimension.key}`;
  });
};

const renderPredicate = (fact: FactRef, predicate: Predicate): string => {
  const column = renderColumn(fact, predicate.column);
  switch (predicate.operator) {
    case "=":
    case ">=":
    case "<=":
      return `${column} ${predicate.operator} $${predicate.paramIndex}`;
    case "in":
      return `${column} = ANY($${predicate.paramIndex})`;
    case "is_not_null":
      return `${column} IS NOT NULL`;
  }
};

const renderWhere = (fact: FactRef, predicates: Predicate[]): string | null => {
  if (predicates.length === 0) {
    return null;
  }

  return `WHERE ${predicates.map((predicate) => renderPredicate(fact, predicate)).join("\n  AND ")}`;
};

const renderSimpleAggregate = (fact: FactRef, aggregate: SimpleAggregate): string => {
  const column = renderColumn(fact, aggregate.column);
  switch (aggregate.kind) {
    case "sum":
      return `SUM(${column})`;
    case "avg":
      return `AVG(${column})`;
    case "count": {
      const distinct = aggregate.distinct ? "DISTINCT " : "";
      if (!aggregate.condition) {
        return `COUNT(${distinct}${column})`;
      }

      const condition = renderPredicate(fact, aggregate.condition);
      return `COUNT(${distinct}CASE WHEN ${condition} THEN ${column} END)`;
    }
  }
};

const renderSafeRatio = (numerator: string, denominator: string, scale: number): string => {
  return `COALESCE(${numerator}::FLOAT * ${scale} / NULLIF(${denominator}, 0), 0.0)`;
};

const renderAggregate = (fact: FactRef, aggregate: Exclude<Aggregate, { kind: "ratio" }>): string => {
  if (aggregate.kind === "rate") {
    return renderSafeRatio(
      renderSimpleAggregate(fact, aggregate.numerator),
      renderSimpleAggregate(fact, aggregate.denominator),
      aggregate.scale
    );
  }

  return renderSimpleAggregate(fact, aggregate);
};

const renderSubPlan = (name: string, plan: SubPlan): string => {
  const lines = [
    `${name} AS (`,
    `  SELECT ${renderSimpleAggregate(plan.fact, plan.aggregate)} AS value`,
    `  FROM ${plan.fact.table} ${plan.fact.alias}`,
    ...renderJoins(plan.fact, plan.joins).map((line) => `  ${line}`)
  ];

  const where = renderWhere(plan.fact, plan.predicates);
  if (where) {
    lines.push(`  ${where.replace(/\n/g, "\n  ")}`);
  }

  lines.push(")");
  return lines.join("\n");
};

/**
 * Renders a plan into one parameterized statement. Plan parameters keep their positions;
 * LIMIT and OFFSET take the next two.
 */
export const renderStatement = (plan: QueryPlan): RenderedStatement => {
  const values: unknown[] = [...plan.params];
  const [first] = plan.measures;

  if (first && first.aggregate.kind === "ratio") {
    const { numerator, denominator, scale } = first.aggregate;
    const text = [
      `WITH ${renderSubPlan("numerator", numerator)},`,
      renderSubPlan("denominator", denominator),
      `SELECT ${renderSafeRatio("numerator.value", "denominator.value", scale)} AS ${first.name}`,
      "FROM numerator, denominator"
    ].join("\n");

    return { text, values };
  }

  const selectList: string[] = plan.select.map(
    (column) => `${renderColumn(plan.fact, column.column)} AS ${column.as}`
  );
  plan.measures.forEach((measure) => {
    if (measure.aggregate.kind === "ratio") {
      throw new Error(`Plan "${plan.template}" mixes a ratio with other measures.`);
    }

    selectList.push(`${renderAggregate(plan.fact, measure.aggregate)} AS ${measure.name}`);
  });

  const lines = [
    `SELECT ${selectList.join(",\n  ")}`,
    `FROM ${plan.fact.table} ${plan.fact.alias}`,
    ...renderJoins(plan.fact, plan.joins)
  ];

  const where = renderWhere(plan.fact, plan.predicates);
  if (where) {
    lines.push(where);
  }

  if (plan.groupBy.length > 0) {
    lines.push(`GROUP BY ${plan.groupBy.map((column) => renderColumn(plan.fact, column.column)).join(", ")}`);
  }

  if (plan.order.length > 0) {
    lines.push(`ORDER BY ${plan.order.map((term) => `${term.key} ${term.direction.toUpperCase()}`).join(", ")}`);
  }

  if (plan.pagination) {
    values.push(plan.pagination.limit, plan.pagination.offset);
    lines.push(`LIMIT $${values.length - 1} OFFSET $${values.length}`);
  }

  return { text: lines.join("\n"), values };
};

export type DirectExecutorOptions = {
  connect: () => Promise<DirectClient>;
  timeoutMs?: number;
  logger?: Logger;
};

export class DirectQueryExecutor implements QueryExecutor {
  readonly name = "direct";
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(private readonly options: DirectExecutorOptions) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_QUERY_TIMEOUT_MS;
    this.log = (options.logger ?? logger).child({ component: "warehouse.direct" });
  }

  async execute(plan: QueryPlan): Promise<ExecutionResult> {
    const statement = renderStatement(plan);
    const shape = describeResultShape(plan);
    this.log.debug(
      { template: plan.template, text: statement.text, params: statement.values.length },
      "direct query"
    );

    try {
      const result = await withDeadline(
        { backend: this.name, label: plan.template, timeoutMs: this.timeoutMs },
        async () => {
          const client = await this.options.connect();
          return client.query(statement.text, statement.values);
        }
      );
      return normalizeResult({ rows: result.rows }, shape);
    } catch (error) {
      this.log.error({ template: plan.template, error }, "direct query failed");
      if (error instanceof BackendQueryError) {
        throw error;
      }

      throw new BackendQueryError(`Direct query "${plan.template}" failed: ${describeError(error)}`, {
        backend: this.name,
        cause: error
      });
    }
  }
}
