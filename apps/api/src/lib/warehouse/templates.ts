import type { MeasureSpec, QueryTemplate, RequiredFilter, SelectSpec, SimpleAggregateSpec } from "./plan";
import type { ColumnRef, DimensionName } from "./schema";

export const SCOPE_KINDS = ["all", "campaign", "link", "page", "product", "retailer"] as const;
export type ScopeKind = (typeof SCOPE_KINDS)[number];

/** The natural-key filter that narrows a report to one entity. */
export const SCOPE_FILTERS: Readonly<Record<Exclude<ScopeKind, "all">, RequiredFilter & { dimension: DimensionName }>> =
  Object.freeze({
    campaign: { dimension: "campaign", column: "campaign_natural_key" },
    link: { dimension: "link", column: "link_natural_key" },
    page: { dimension: "page", column: "page_natural_key" },
    product: { dimension: "product", column: "product_id" },
    retailer: { dimension: "retailer", column: "retailer_name" }
  });

const CLICK_JOINS: readonly DimensionName[] = [
  "campaign",
  "link",
  "page",
  "product",
  "retailer",
  "location",
  "device",
  "date"
];
const VISIT_JOINS: readonly DimensionName[] = ["campaign", "page", "date"];

const IS_ATC = { column: "is_atc_click", value: true } as const;

const fact = (column: string): ColumnRef => ({ table: "fact", column });
const col = (table: DimensionName, column: string): ColumnRef => ({ table, column });
const select = (column: ColumnRef, as: string = column.column): SelectSpec => ({ column, as });

const countClicks: SimpleAggregateSpec = { kind: "count", column: fact("clickfactkey") };
const countAtcClicks: SimpleAggregateSpec = { kind: "count", column: fact("clickfactkey"), when: IS_ATC };
const countVisits: SimpleAggregateSpec = { kind: "count", column: fact("pagevisitfactkey") };
const sumClickValue: SimpleAggregateSpec = { kind: "sum", column: fact("click_value") };

const conversionRate: MeasureSpec["aggregate"] = {
  kind: "rate",
  numerator: countAtcClicks,
  denominator: countClicks,
  scale: 100
};

const distinctCount = (name: string, factName: QueryTemplate["fact"], column: string): QueryTemplate => ({
  name,
  fact: factName,
  shape: "scalar",
  availableJoins: factName === "link_clicks" ? CLICK_JOINS : VISIT_JOINS,
  measures: [{ name: "value", aggregate: { kind: "count", column: fact(column), distinct: true } }]
});

export const BREAKDOWN_COLUMNS: readonly ColumnRef[] = [
  col("link", "link_type_name"),
  col("location", "country_name"),
  col("location", "state_name"),
  col("device", "device_type"),
  col("device", "browser"),
  fact("utm_source"),
  fact("utm_medium"),
  fact("utm_content"),
  fact("utm_term"),
  fact("utm_campaign")
];

export const TIME_BREAKDOWN_COLUMNS: readonly ColumnRef[] = [
  col("date", "hour_of_day"),
  col("date", "day_of_week")
];

const TEMPLATES = {
  total_clicks: {
    name: "total_clicks",
    fact: "link_clicks",
    shape: "scalar",
    availableJoins: CLICK_JOINS,
    measures: [{ name: "value", aggregate: countClicks }]
  },
  total_atc_clicks: {
    name: "total_atc_clicks",
    fact: "link_clicks",
    shape: "scalar",
    availableJoins: CLICK_JOINS,
    fixedFlags: [IS_ATC],
    measures: [{ name: "value", aggregate: countClicks }]
  },
  total_page_visits: {
    name: "total_page_visits",
    fact: "page_visits",
    shape: "scalar",
    availableJoins: VISIT_JOINS,
    measures: [{ name: "value", aggregate: countVisits }]
  },
  total_link_value: {
    name: "total_link_value",
    fact: "link_clicks",
    shape: "scalar",
    availableJoins: CLICK_JOINS,
    measures: [{ name: "value", aggregate: sumClickValue }]
  },
  page_ctr: {
    name: "page_ctr",
    fact: "link_clicks",
    shape: "scalar",
    availableJoins: VISIT_JOINS,
    measures: [
      {
        name: "value",
        aggregate: {
          kind: "ratio",
          numerator: { fact: "link_clicks", availableJoins: CLICK_JOINS, aggregate: countClicks },
          denominator: { fact: "page_visits", availableJoins: VISIT_JOINS, aggregate: countVisits },
          scale: 100
        }
      }
    ]
  },
  conversion_rate: {
    name: "conversion_rate",
    fact: "link_clicks",
    shape: "scalar",
    availableJoins: CLICK_JOINS,
    measures: [
      {
        name: "value",
        aggregate: {
          kind: "ratio",
          numerator: { fact: "link_clicks", availableJoins: CLICK_JOINS, fixedFlags: [IS_ATC], aggregate: countClicks },
          denominator: { fact: "link_clicks", availableJoins: CLICK_JOINS, aggregate: countClicks },
          scale: 100
        }
      }
    ]
  },
  click_trend: {
    name: "click_trend",
    fact: "link_clicks",
    shape: "rows",
    availableJoins: CLICK_JOINS,
    groupBy: [select(col("date", "fulldate"), "date")],
    measures: [{ name: "value", aggregate: countClicks }],
    order: [{ key: "date", direction: "asc" }]
  },
  click_trend_by_link_type: {
    name: "click_trend_by_link_type",
    fact: "link_clicks",
    shape: "rows",
    availableJoins: CLICK_JOINS,
    groupBy: [select(col("date", "fulldate"), "date"), select(col("link", "link_type_name"), "name")],
    nonNullGroups: true,
    measures: [{ name: "value", aggregate: countClicks }],
    order: [
      { key: "name", direction: "asc" },
      { key: "date", direction: "asc" }
    ]
  },
  visit_trend: {
    name: "visit_trend",
    fact: "page_visits",
    shape: "rows",
    availableJoins: VISIT_JOINS,
    groupBy: [select(col("date", "fulldate"), "date")],
    measures: [{ name: "value", aggregate: countVisits }],
    order: [{ key: "date", direction: "asc" }]
  },
  click_breakdown: {
    name: "click_breakdown",
    fact: "link_clicks",
    shape: "rows",
    availableJoins: CLICK_JOINS,
    groupable: BREAKDOWN_COLUMNS,
    groupAlias: "category",
    nonNullGroups: true,
    measures: [{ name: "value", aggregate: countClicks }],
    order: [
      { key: "value", direction: "desc" },
      { key: "category", direction: "asc" }
    ]
  },
  click_breakdown_by_time: {
    name: "click_breakdown_by_time",
    fact: "link_clicks",
    shape: "rows",
    availableJoins: CLICK_JOINS,
    groupable: TIME_BREAKDOWN_COLUMNS,
    groupAlias: "category",
    nonNullGroups: true,
    measures: [{ name: "value", aggregate: countClicks }],
    order: [{ key: "category", direction: "asc" }]
  },
  link_performance: {
    name: "link_performance",
    fact: "link_clicks",
    shape: "rows",
    availableJoins: CLICK_JOINS,
    groupBy: [
      select(col("link", "linkkey"), "link_key"),
      select(col("link", "link_name")),
      select(col("link", "short_link_url")),
      select(col("link", "link_type_name"), "link_type")
    ],
    measures: [
      { name: "total_clicks", aggregate: countClicks },
      { name: "atc_clicks", aggregate: countAtcClicks },
      { name: "total_link_value", aggregate: sumClickValue },
      { name: "conversion_rate", aggregate: conversionRate }
    ],
    order: [
      { key: "total_clicks", direction: "desc" },
      { key: "link_key", direction: "asc" }
    ]
  },
  link_count: distinctCount("link_count", "link_clicks", "linkkey"),
  product_performance: {
    name: "product_performance",
    fact: "link_clicks",
    shape: "rows",
    availableJoins: CLICK_JOINS,
    groupBy: [
      select(col("product", "productkey"), "product_key"),
      select(col("product", "product_name")),
      select(col("product", "product_id"))
    ],
    measures: [
      { name: "clicks", aggregate: countClicks },
      { name: "atc_clicks", aggregate: countAtcClicks },
      { name: "conversion_rate", aggregate: conversionRate },
      { name: "estimated_value", aggregate: sumClickValue }
    ],
    order: [
      { key: "clicks", direction: "desc" },
      { key: "product_key", direction: "asc" }
    ]
  },
  product_count: distinctCount("product_count", "link_clicks", "productkey"),
  retailer_performance: {
    name: "retailer_performance",
    fact: "link_clicks",
    shape: "rows",
    availableJoins: CLICK_JOINS,
    groupBy: [select(col("retailer", "retailerkey"), "retailer_key"), select(col("retailer", "retailer_name"))],
    measures: [
      { name: "clicks", aggregate: countClicks },
      { name: "atc_clicks", aggregate: countAtcClicks },
      { name: "conversion_rate", aggregate: conversionRate },
      { name: "estimated_value", aggregate: sumClickValue }
    ],
    order: [
      { key: "clicks", direction: "desc" },
      { key: "retailer_key", direction: "asc" }
    ]
  },
  retailer_count: distinctCount("retailer_count", "link_clicks", "retailerkey"),
  page_visit_performance: {
    name: "page_visit_performance",
    fact: "page_visits",
    shape: "rows",
    availableJoins: VISIT_JOINS,
    groupBy: [
      select(col("page", "pagekey"), "page_key"),
      select(col("page", "page_url")),
      select(col("page", "page_title"))
    ],
    measures: [
      { name: "visits", aggregate: countVisits },
      { name: "avg_time_on_page", aggregate: { kind: "avg", column: fact("time_on_page") } }
    ],
    order: [
      { key: "visits", direction: "desc" },
      { key: "page_key", direction: "asc" }
    ]
  },
  page_click_counts: {
    name: "page_click_counts",
    fact: "link_clicks",
    shape: "rows",
    availableJoins: CLICK_JOINS,
    groupBy: [select(fact("pagekey"), "page_key")],
    measures: [{ name: "clicks", aggregate: countClicks }],
    order: [{ key: "page_key", direction: "asc" }]
  },
  page_count: distinctCount("page_count", "page_visits", "pagekey"),
  click_listing: {
    name: "click_listing",
    fact: "link_clicks",
    shape: "rows",
    availableJoins: CLICK_JOINS,
    select: [
      select(fact("clickfactkey")),
      select(fact("datekey")),
      select(fact("is_atc_click")),
      select(fact("click_value")),
      select(fact("utm_source"))
    ],
    order: [
      { key: "datekey", direction: "desc" },
      { key: "clickfactkey", direction: "desc" }
    ]
  },
  click_listing_count: {
    name: "click_listing_count",
    fact: "link_clicks",
    shape: "scalar",
    availableJoins: CLICK_JOINS,
    measures: [{ name: "value", aggregate: countClicks }]
  }
} satisfies Record<string, QueryTemplate>;

export type TemplateName = keyof typeof TEMPLATES;

export const isTemplateName = (value: string): value is TemplateName => {
  return Object.prototype.hasOwnProperty.call(TEMPLATES, value);
};

/**
 * Returns the named template narrowed to a scope. A scoped template joins the scope's
 * dimension and refuses to build without the scope's natural-key filter.
 */
export const resolveTemplate = (name: TemplateName, scope: ScopeKind = "all"): QueryTemplate => {
  const template: QueryTemplate = TEMPLATES[name];
  if (scope === "all") {
    return template;
  }

  const required = SCOPE_FILTERS[scope];
  return {
    ...template,
    mandatoryJoins: [...(template.mandatoryJoins ?? []), required.dimension],
    requiredFilters: [...(template.requiredFilters ?? []), required]
  };
};
