import { toDateKey } from "./dates";
import { InvalidFilterError } from "./errors";
import type { EqualityFilterValue, FilterSet, Pagination } from "./filters";
import {
  DIMENSIONS,
  FACTS,
  canJoin,
  describeColumn,
  resolveColumnType,
  type ColumnRef,
  type DimensionName,
  type DimensionRef,
  type FactName,
  type FactRef
} from "./schema";

export type ResultShape = "scalar" | "rows";
export type SortDirection = "asc" | "desc";

/** A boolean condition on a fact column, bound as a parameter like any caller filter. */
export type FlagCondition = {
  column: string;
  value: boolean;
};

export type SimpleAggregateSpec =
  | { kind: "count"; column: ColumnRef; distinct?: boolean; when?: FlagCondition }
  | { kind: "sum"; column: ColumnRef }
  | { kind: "avg"; column: ColumnRef };

export type RatioSideSpec = {
  fact: FactName;
  availableJoins: readonly DimensionName[];
  fixedFlags?: readonly FlagCondition[];
  aggregate: SimpleAggregateSpec;
};

export type AggregateSpec =
  | SimpleAggregateSpec
  | { kind: "rate"; numerator: SimpleAggregateSpec; denominator: SimpleAggregateSpec; scale: number }
  | { kind: "ratio"; numerator: RatioSideSpec; denominator: RatioSideSpec; scale: number };

export type MeasureSpec = {
  name: string;
  aggregate: AggregateSpec;
};

export type SelectSpec = {
  column: ColumnRef;
  as: string;
};

export type OrderSpec = {
  key: string;
  direction: SortDirection;
};

export type RequiredFilter = {
  dimension: DimensionName | null;
  column: string;
};

export type QueryTemplate = {
  name: string;
  fact: FactName;
  shape: ResultShape;
  availableJoins: readonly DimensionName[];
  mandatoryJoins?: readonly DimensionName[];
  requiredFilters?: readonly RequiredFilter[];
  fixedFlags?: readonly FlagCondition[];
  measures?: readonly MeasureSpec[];
  /** Output columns of a listing template; grouped templates select their group columns. */
  select?: readonly SelectSpec[];
  groupBy?: readonly SelectSpec[];
  groupable?: readonly ColumnRef[];
  /** Output name of the column contributed by `FilterSet.group_by`. */
  groupAlias?: string;
  nonNullGroups?: boolean;
  order?: readonly OrderSpec[];
};

export type PredicateOperator = "=" | "in" | ">=" | "<=" | "is_not_null";

export type Predicate = {
  column: ColumnRef;
  operator: PredicateOperator;
  paramIndex: number | null;
};

export type SimpleAggregate =
  | { kind: "count"; column: ColumnRef; distinct: boolean; condition: Predicate | null }
  | { kind: "sum"; column: ColumnRef }
  | { kind: "avg"; column: ColumnRef };

export type SubPlan = {
  fact: FactRef;
  joins: DimensionRef[];
  predicates: Predicate[];
  aggregate: SimpleAggregate;
};

export type Aggregate =
  | SimpleAggregate
  | { kind: "rate"; numerator: SimpleAggregate; denominator: SimpleAggregate; scale: number }
  | { kind: "ratio"; numerator: SubPlan; denominator: SubPlan; scale: number };

export type Measure = {
  name: string;
  aggregate: Aggregate;
};

export type SelectColumn = {
  column: ColumnRef;
  as: string;
};

export type OrderTerm = {
  key: string;
  direction: SortDirection;
};

export type ParamValue = EqualityFilterValue;

export type QueryPlan = {
  template: string;
  shape: ResultShape;
  fact: FactRef;
  joins: DimensionRef[];
  predicates: Predicate[];
  measures: Measure[];
  select: SelectColumn[];
  groupBy: SelectColumn[];
  order: OrderTerm[];
  pagination: Pagination | null;
  /** `params[i]` is bound at position `i + 1`. */
  params: ParamValue[];
};

type ParamSequence = {
  bind: (value: ParamValue) => number;
  values: ParamValue[];
};

const createParamSequence = (): ParamSequence => {
  const values: ParamValue[] = [];
  return {
    values,
    bind: (value) => {
      values.push(value);
      return values.length;
    }
  };
};

type ScopeContext = {
  template: string;
  fact: FactRef;
  availableJoins: ReadonlySet<DimensionName>;
  joins: DimensionRef[];
};

const sameColumn = (left: ColumnRef, right: ColumnRef): boolean =>
  left.table === right.table && left.column === right.column;

const ensureJoin = (scope: ScopeContext, dimension: DimensionName, field: string): void => {
  if (!scope.availableJoins.has(dimension) || !canJoin(scope.fact, dimension)) {
    throw new InvalidFilterError(
      `Template "${scope.template}" cannot join dimension "${dimension}" on ${scope.fact.table}.`,
      field
    );
  }

  if (!scope.joins.some((join) => join.name === dimension)) {
    scope.joins.push(DIMENSIONS[dimension]);
  }
};

const requireColumn = (scope: ScopeContext, ref: ColumnRef, field: string): void => {
  if (ref.table !== "fact") {
    ensureJoin(scope, ref.table, field);
  }

  if (!resolveColumnType(scope.fact, ref)) {
    throw new InvalidFilterError(
      `Column ${describeColumn(ref)} is not declared for template "${scope.template}".`,
      field
    );
  }
};

const requireFlagColumn = (scope: ScopeContext, column: string, field: string): ColumnRef => {
  const ref: ColumnRef = { table: "fact", column };
  if (resolveColumnType(scope.fact, ref) !== "boolean") {
    throw new InvalidFilterError(
      `Flag filter ${column} is not a boolean column of ${scope.fact.table}.`,
      field
    );
  }

  return ref;
};

const toDateKeyOrThrow = (value: string): number => {
  const dateKey = toDateKey(value);
  if (dateKey === null) {
    throw new InvalidFilterError(`Invalid date ${value}.`, "date_range");
  }

  return dateKey;
};

/**
 * Binds every FilterSet-derived predicate for one fact scope, in the fixed order:
 * equality filters, date bounds, template flags, caller flags.
 */
const buildScopePredicates = (
  scope: ScopeContext,
  filterSet: FilterSet,
  fixedFlags: readonly FlagCondition[],
  params: ParamSequence
): Predicate[] => {
  const predicates: Predicate[] = [];

  filterSet.equality_filters.forEach((filter, index) => {
    const field = `equality_filters.${index}`;
    const column: ColumnRef = { table: filter.dimension ?? "fact", column: filter.column };
    requireColumn(scope, column, field);
    predicates.push({
      column,
      operator: Array.isArray(filter.value) ? "in" : "=",
      paramIndex: params.bind(filter.value)
    });
  });

  const dateColumn: ColumnRef = { table: "fact", column: scope.fact.dateKey };
  const range = filterSet.date_range;
  if (range?.start) {
    predicates.push({ column: dateColumn, operator: ">=", paramIndex: params.bind(toDateKeyOrThrow(range.start)) });
  }
  if (range?.end) {
    predicates.push({ column: dateColumn, operator: "<=", paramIndex: params.bind(toDateKeyOrThrow(range.end)) });
  }

  fixedFlags.forEach((flag) => {
    const column = requireFlagColumn(scope, flag.column, "template");
    predicates.push({ column, operator: "=", paramIndex: params.bind(flag.value) });
  });

  filterSet.flag_filters.forEach((flag, index) => {
    const column = requireFlagColumn(scope, flag.column, `flag_filters.${index}`);
    predicates.push({ column, operator: "=", paramIndex: params.bind(flag.value) });
  });

  return predicates;
};

const buildSimpleAggregate = (
  scope: ScopeContext,
  spec: SimpleAggregateSpec,
  params: ParamSequence
): SimpleAggregate => {
  requireColumn(scope, spec.column, "template");
  if (spec.kind !== "count") {
    return { kind: spec.kind, column: spec.column };
  }

  const condition: Predicate | null = spec.when
    ? {
        column: requireFlagColumn(scope, spec.when.column, "template"),
        operator: "=",
        paramIndex: params.bind(spec.when.value)
      }
    : null;

  return { kind: "count", column: spec.column, distinct: spec.distinct ?? false, condition };
};

const buildMeasureAggregate = (
  scope: ScopeContext,
  spec: Exclude<AggregateSpec, { kind: "ratio" }>,
  params: ParamSequence
): Aggregate => {
  if (spec.kind === "rate") {
    const numerator = buildSimpleAggregate(scope, spec.numerator, params);
    const denominator = buildSimpleAggregate(scope, spec.denominator, params);
    return { kind: "rate", numerator, denominator, scale: spec.scale };
  }

  return buildSimpleAggregate(scope, spec, params);
};

const buildRatioSide = (
  template: QueryTemplate,
  side: RatioSideSpec,
  filterSet: FilterSet,
  params: ParamSequence
): SubPlan => {
  const scope: ScopeContext = {
    template: template.name,
    fact: FACTS[side.fact],
    availableJoins: new Set(side.availableJoins),
    joins: []
  };

  (template.mandatoryJoins ?? []).forEach((dimension) => ensureJoin(scope, dimension, "template"));
  const predicates = buildScopePredicates(scope, filterSet, side.fixedFlags ?? [], params);
  const aggregate = buildSimpleAggregate(scope, side.aggregate, params);

  return { fact: scope.fact, joins: scope.joins, predicates, aggregate };
};

const checkRequiredFilters = (template: QueryTemplate, filterSet: FilterSet): void => {
  (template.requiredFilters ?? []).forEach((required) => {
    const present = filterSet.equality_filters.some(
      (filter) => filter.dimension === required.dimension && filter.column === required.column
    );
    if (!present) {
      const label = `${required.dimension ?? "fact"}.${required.column}`;
      throw new InvalidFilterError(`Template "${template.name}" requires a filter on ${label}.`, label);
    }
  });
};

const resolveGroupColumn = (template: QueryTemplate, filterSet: FilterSet): SelectColumn | null => {
  const groupBy = filterSet.group_by;
  if (!groupBy) {
    if (template.groupAlias) {
      throw new InvalidFilterError(`Template "${template.name}" requires a group_by column.`, "group_by");
    }
    return null;
  }

  const groupable = template.groupable ?? [];
  if (!groupable.some((candidate) => sameColumn(candidate, groupBy))) {
    throw new InvalidFilterError(
      `Template "${template.name}" cannot group by ${describeColumn(groupBy)}.`,
      "group_by"
    );
  }

  return { column: { ...groupBy }, as: template.groupAlias ?? groupBy.column };
};

/**
 * Combines a template with one request's FilterSet into a backend-neutral plan.
 * Every parameter position is assigned here, once, from 1 upwards.
 */
export const buildQueryPlan = (template: QueryTemplate, filterSet: FilterSet): QueryPlan => {
  checkRequiredFilters(template, filterSet);

  if (filterSet.pagination && template.shape === "scalar") {
    throw new InvalidFilterError(`Template "${template.name}" returns a scalar and cannot be paginated.`, "pagination");
  }

  const params = createParamSequence();
  const fact = FACTS[template.fact];
  const measures = template.measures ?? [];
  const ratio = measures.find((measure) => measure.aggregate.kind === "ratio");

  if (ratio && ratio.aggregate.kind === "ratio") {
    if (filterSet.group_by) {
      throw new InvalidFilterError(`Template "${template.name}" cannot group by ${describeColumn(filterSet.group_by)}.`, "group_by");
    }

    const numerator = buildRatioSide(template, ratio.aggregate.numerator, filterSet, params);
    const denominator = buildRatioSide(template, ratio.aggregate.denominator, filterSet, params);

    return {
      template: template.name,
      shape: template.shape,
      fact,
      joins: [],
      predicates: [],
      measures: [{ name: ratio.name, aggregate: { kind: "ratio", numerator, denominator, scale: ratio.aggregate.scale } }],
      select: [],
      groupBy: [],
      order: [],
      pagination: null,
      params: params.values
    };
  }

  const scope: ScopeContext = {
    template: template.name,
    fact,
    availableJoins: new Set(template.availableJoins),
    joins: []
  };

  (template.mandatoryJoins ?? []).forEach((dimension) => ensureJoin(scope, dimension, "template"));
  const predicates = buildScopePredicates(scope, filterSet, template.fixedFlags ?? [], params);

  const groupColumn = resolveGroupColumn(template, filterSet);
  const groupBy: SelectColumn[] = (template.groupBy ?? []).map((spec) => ({ column: { ...spec.column }, as: spec.as }));
  if (groupColumn) {
    groupBy.push(groupColumn);
  }
  groupBy.forEach((column) => requireColumn(scope, column.column, column === groupColumn ? "group_by" : "template"));

  const listing: SelectColumn[] = (template.select ?? []).map((spec) => ({ column: { ...spec.column }, as: spec.as }));
  listing.forEach((column) => requireColumn(scope, column.column, "template"));

  if (template.nonNullGroups) {
    groupBy.forEach((column) => {
      predicates.push({ column: column.column, operator: "is_not_null", paramIndex: null });
    });
  }

  const planMeasures: Measure[] = measures.map((measure) => {
    if (measure.aggregate.kind === "ratio") {
      throw new Error(`Template "${template.name}" mixes a ratio with other measures.`);
    }

    return { name: measure.name, aggregate: buildMeasureAggregate(scope, measure.aggregate, params) };
  });

  return {
    template: template.name,
    shape: template.shape,
    fact,
    joins: scope.joins,
    predicates,
    measures: planMeasures,
    select: groupBy.length > 0 ? [...groupBy] : listing,
    groupBy,
    order: (template.order ?? []).map((term) => ({ ...term })),
    pagination: filterSet.pagination ? { ...filterSet.pagination } : null,
    params: params.values
  };
};

/** Every position the plan binds, in the order they were assigned. */
export const collectParamIndexes = (plan: QueryPlan): number[] => {
  const indexes: number[] = [];
  const fromPredicates = (predicates: Predicate[]) => {
    predicates.forEach((predicate) => {
      if (predicate.paramIndex !== null) {
        indexes.push(predicate.paramIndex);
      }
    });
  };
  const fromSimple = (aggregate: SimpleAggregate) => {
    if (aggregate.kind === "count" && aggregate.condition?.paramIndex) {
      indexes.push(aggregate.condition.paramIndex);
    }
  };

  fromPredicates(plan.predicates);
  plan.measures.forEach((measure) => {
    const { aggregate } = measure;
    if (aggregate.kind === "ratio") {
      [aggregate.numerator, aggregate.denominator].forEach((side) => {
        fromPredicates(side.predicates);
        fromSimple(side.aggregate);
      });
    } else if (aggregate.kind === "rate") {
      fromSimple(aggregate.numerator);
      fromSimple(aggregate.denominator);
    } else {
      fromSimple(aggregate);
    }
  });

  return indexes;
};
