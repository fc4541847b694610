import { describe, expect, it } from "vitest";

import { InvalidFilterError } from "./errors";
import { createFilterSet, type EqualityFilter, type FilterSetInput } from "./filters";
import { buildQueryPlan, collectParamIndexes } from "./plan";
import { resolveTemplate } from "./templates";

const CAMPAIGN_FILTER: EqualityFilter = {
  dimension: "campaign",
  column: "campaign_natural_key",
  value: "spring-launch"
};

const captureError = (run: () => unknown): unknown => {
  try {
    run();
  } catch (error) {
    return error;
  }

  return null;
};

const range = (count: number): number[] => Array.from({ length: count }, (_, index) => index + 1);

describe("buildQueryPlan", () => {
  it("binds the scope filter first and then both date bounds", () => {
    const plan = buildQueryPlan(
      resolveTemplate("total_clicks", "campaign"),
      createFilterSet({
        equality_filters: [CAMPAIGN_FILTER],
        date_range: { start: "2026-02-01", end: "2026-02-07" }
      })
    );

    expect(plan.joins.map((join) => join.name)).toEqual(["campaign"]);
    expect(plan.predicates).toEqual([
      { column: { table: "campaign", column: "campaign_natural_key" }, operator: "=", paramIndex: 1 },
      { column: { table: "fact", column: "datekey" }, operator: ">=", paramIndex: 2 },
      { column: { table: "fact", column: "datekey" }, operator: "<=", paramIndex: 3 }
    ]);
    expect(plan.params).toEqual(["spring-launch", 20260201, 20260207]);
  });

  it("keeps an end-only date range as a one-sided bound", () => {
    const plan = buildQueryPlan(
      resolveTemplate("total_clicks"),
      createFilterSet({ date_range: { end: "2026-02-07" } })
    );

    expect(plan.predicates).toEqual([
      { column: { table: "fact", column: "datekey" }, operator: "<=", paramIndex: 1 }
    ]);
    expect(plan.params).toEqual([20260207]);
  });

  it("keeps a start-only date range as a one-sided bound", () => {
    const plan = buildQueryPlan(
      resolveTemplate("total_page_visits"),
      createFilterSet({ date_range: { start: "2026-02-01" } })
    );

    expect(plan.predicates).toEqual([
      { column: { table: "fact", column: "datekey" }, operator: ">=", paramIndex: 1 }
    ]);
    expect(plan.params).toEqual([20260201]);
  });

  it("assigns contiguous positions for every combination of optional filters", () => {
    const optional: Array<(input: FilterSetInput) => void> = [
      (input) => {
        input.equality_filters = [...(input.equality_filters ?? []), { dimension: "link", column: "link_type_name", value: "affiliate" }];
      },
      (input) => {
        input.equality_filters = [...(input.equality_filters ?? []), { dimension: null, column: "utm_source", value: "newsletter" }];
      },
      (input) => {
        input.date_range = { ...input.date_range, start: "2026-01-01" };
      },
      (input) => {
        input.date_range = { ...input.date_range, end: "2026-01-31" };
      },
      (input) => {
        input.flag_filters = [{ column: "is_atc_click", value: false }];
      }
    ];

    for (let mask = 0; mask < 1 << optional.length; mask += 1) {
      const input: FilterSetInput = {};
      let present = 0;
      optional.forEach((apply, bit) => {
        if (mask & (1 << bit)) {
          apply(input);
          present += 1;
        }
      });

      const plan = buildQueryPlan(resolveTemplate("link_performance"), createFilterSet(input));
      // atc_clicks and the conversion-rate numerator each embed one conditional flag.
      const expected = range(present + 2);

      expect(collectParamIndexes(plan)).toEqual(expected);
      expect(plan.params).toHaveLength(expected.length);
    }
  });

  it("binds a ratio's shared filters at independent positions, numerator first", () => {
    const plan = buildQueryPlan(
      resolveTemplate("conversion_rate", "campaign"),
      createFilterSet({
        equality_filters: [CAMPAIGN_FILTER],
        date_range: { start: "2026-02-01", end: "2026-02-07" }
      })
    );

    const measure = plan.measures[0].aggregate;
    if (measure.kind !== "ratio") {
      throw new Error("expected a ratio measure");
    }

    expect(measure.numerator.predicates.map((predicate) => predicate.paramIndex)).toEqual([1, 2, 3, 4]);
    expect(measure.numerator.predicates[3].column).toEqual({ table: "fact", column: "is_atc_click" });
    expect(measure.denominator.predicates.map((predicate) => predicate.paramIndex)).toEqual([5, 6, 7]);
    expect(plan.params).toEqual([
      "spring-launch",
      20260201,
      20260207,
      true,
      "spring-launch",
      20260201,
      20260207
    ]);
    expect(collectParamIndexes(plan)).toEqual(range(7));
  });

  it("renders list values as membership predicates", () => {
    const plan = buildQueryPlan(
      resolveTemplate("page_click_counts"),
      createFilterSet({ equality_filters: [{ dimension: null, column: "pagekey", value: [4, 9] }] })
    );

    expect(plan.joins).toEqual([]);
    expect(plan.predicates).toEqual([
      { column: { table: "fact", column: "pagekey" }, operator: "in", paramIndex: 1 }
    ]);
    expect(plan.params).toEqual([[4, 9]]);
  });

  it("adds the caller's group column with an unbound not-null predicate", () => {
    const plan = buildQueryPlan(
      resolveTemplate("click_breakdown"),
      createFilterSet({ group_by: { table: "location", column: "country_name" } })
    );

    expect(plan.joins.map((join) => join.name)).toEqual(["location"]);
    expect(plan.groupBy).toEqual([{ column: { table: "location", column: "country_name" }, as: "category" }]);
    expect(plan.select).toEqual(plan.groupBy);
    expect(plan.predicates).toEqual([
      { column: { table: "location", column: "country_name" }, operator: "is_not_null", paramIndex: null }
    ]);
    expect(plan.params).toEqual([]);
  });

  it("rejects an undeclared column", () => {
    const error = captureError(() =>
      buildQueryPlan(
        resolveTemplate("total_clicks"),
        createFilterSet({ equality_filters: [{ dimension: "campaign", column: "budget", value: "x" }] })
      )
    );

    expect(error).toBeInstanceOf(InvalidFilterError);
    expect(error).toMatchObject({
      message: 'Column campaign.budget is not declared for template "total_clicks".',
      field: "equality_filters.0"
    });
  });

  it("rejects a dimension the fact cannot join", () => {
    const error = captureError(() =>
      buildQueryPlan(
        resolveTemplate("total_page_visits"),
        createFilterSet({ equality_filters: [{ dimension: "link", column: "link_type_name", value: "affiliate" }] })
      )
    );

    expect(error).toMatchObject({
      message: 'Template "total_page_visits" cannot join dimension "link" on factpagevisits.'
    });
  });

  it("rejects a filter that only one half of a ratio can apply", () => {
    const error = captureError(() =>
      buildQueryPlan(
        resolveTemplate("page_ctr"),
        createFilterSet({ equality_filters: [{ dimension: "link", column: "link_type_name", value: "affiliate" }] })
      )
    );

    expect(error).toBeInstanceOf(InvalidFilterError);
  });

  it("rejects a group column the template does not offer", () => {
    const error = captureError(() =>
      buildQueryPlan(
        resolveTemplate("click_breakdown"),
        createFilterSet({ group_by: { table: "page", column: "page_url" } })
      )
    );

    expect(error).toMatchObject({ field: "group_by" });
  });

  it("requires the scope filter of a scoped template", () => {
    const error = captureError(() => buildQueryPlan(resolveTemplate("total_clicks", "link"), createFilterSet()));

    expect(error).toMatchObject({
      message: 'Template "total_clicks" requires a filter on link.link_natural_key.'
    });
  });

  it("rejects pagination on a scalar template", () => {
    const error = captureError(() =>
      buildQueryPlan(
        resolveTemplate("total_clicks"),
        createFilterSet({ pagination: { offset: 0, limit: 20 } })
      )
    );

    expect(error).toMatchObject({ field: "pagination" });
  });

  it("rejects a flag on a non-boolean column", () => {
    const error = captureError(() =>
      buildQueryPlan(
        resolveTemplate("total_clicks"),
        createFilterSet({ flag_filters: [{ column: "click_value", value: true }] })
      )
    );

    expect(error).toMatchObject({ field: "flag_filters.0" });
  });
});
