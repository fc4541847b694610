import { z } from "zod";

import { isValidDateYYYYMMDD } from "./dates";
import { InvalidFilterError } from "./errors";
import { DIMENSION_NAMES, type ColumnRef, type DimensionName } from "./schema";

export const MAX_PAGE_SIZE = 100;

export type DateRange = {
  start: string | null;
  end: string | null;
};

export type ScalarFilterValue = string | number | boolean;
export type EqualityFilterValue = ScalarFilterValue | ReadonlyArray<string | number>;

/** `dimension: null` addresses a column on the fact table itself. */
export type EqualityFilter = {
  dimension: DimensionName | null;
  column: string;
  value: EqualityFilterValue;
};

export type FlagFilter = {
  column: string;
  value: boolean;
};

export type Pagination = {
  offset: number;
  limit: number;
};

export type FilterSet = {
  readonly date_range: Readonly<DateRange> | null;
  readonly equality_filters: ReadonlyArray<Readonly<EqualityFilter>>;
  readonly flag_filters: ReadonlyArray<Readonly<FlagFilter>>;
  readonly group_by: Readonly<ColumnRef> | null;
  readonly pagination: Readonly<Pagination> | null;
};

export type FilterSetInput = {
  date_range?: Partial<DateRange> | null;
  equality_filters?: EqualityFilter[];
  flag_filters?: FlagFilter[];
  group_by?: ColumnRef | null;
  pagination?: Pagination | null;
};

const isoDate = z
  .string()
  .trim()
  .refine((value) => isValidDateYYYYMMDD(value), { message: "Expected a YYYY-MM-DD date" });

const columnName = z.string().trim().min(1);
const dimensionName = z.enum(DIMENSION_NAMES);

const dateRangeSchema = z
  .object({
    start: isoDate.nullish(),
    end: isoDate.nullish()
  })
  .refine((range) => !range.start || !range.end || range.start <= range.end, {
    message: "start must be on or before end",
    path: ["start"]
  });

const equalityValueSchema = z.union([
  z.string(),
  z.number().finite(),
  z.boolean(),
  z.array(z.union([z.string(), z.number().finite()])).min(1)
]);

const filterSetSchema = z
  .object({
    date_range: dateRangeSchema.nullish(),
    equality_filters: z
      .array(
        z.object({
          dimension: dimensionName.nullable(),
          column: columnName,
          value: equalityValueSchema
        })
      )
      .default([]),
    flag_filters: z
      .array(
        z.object({
          column: columnName,
          value: z.boolean()
        })
      )
      .default([]),
    group_by: z
      .object({
        table: z.union([z.literal("fact"), dimensionName]),
        column: columnName
      })
      .nullish(),
    pagination: z
      .object({
        offset: z.number().int().min(0),
        limit: z.number().int().min(1).max(MAX_PAGE_SIZE)
      })
      .nullish()
  })
  .superRefine((value, context) => {
    const seen = new Set<string>();
    value.flag_filters.forEach((flag, index) => {
      if (seen.has(flag.column)) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate flag filter on ${flag.column}`,
          path: ["flag_filters", index, "column"]
        });
      }
      seen.add(flag.column);
    });
  });

const freezeValue = (value: EqualityFilterValue): EqualityFilterValue => {
  return Array.isArray(value) ? Object.freeze([...value]) : value;
};

/**
 * Validates caller-supplied primitives and returns an immutable FilterSet.
 * Column and dimension existence is checked later against the template, not here.
 */
export const createFilterSet = (input: FilterSetInput = {}): FilterSet => {
  const parsed = filterSetSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.length > 0 ? issue.path.join(".") : null;
    throw new InvalidFilterError(
      field ? `Invalid filter ${field}: ${issue.message}` : `Invalid filter: ${issue.message}`,
      field
    );
  }

  const { data } = parsed;
  const start = data.date_range?.start ?? null;
  const end = data.date_range?.end ?? null;

  return Object.freeze({
    date_range: start || end ? Object.freeze({ start, end }) : null,
    equality_filters: Object.freeze(
      data.equality_filters.map((filter) =>
        Object.freeze({
          dimension: filter.dimension,
          column: filter.column,
          value: freezeValue(filter.value)
        })
      )
    ),
    flag_filters: Object.freeze(data.flag_filters.map((flag) => Object.freeze({ ...flag }))),
    group_by: data.group_by ? Object.freeze({ ...data.group_by }) : null,
    pagination: data.pagination ? Object.freeze({ ...data.pagination }) : null
  });
};

export const paginationForPage = (page: number, size: number): Pagination => ({
  offset: (page - 1) * size,
  limit: size
});

export const countPages = (totalItems: number, size: number): number => {
  if (totalItems <= 0 || size <= 0) {
    return 0;
  }

  return Math.ceil(totalItems / size);
};
