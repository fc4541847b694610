export type ColumnType = "text" | "integer" | "numeric" | "boolean" | "date" | "timestamp";

export const DIMENSION_NAMES = [
  "campaign",
  "link",
  "page",
  "product",
  "retailer",
  "location",
  "device",
  "date"
] as const;

export type DimensionName = (typeof DIMENSION_NAMES)[number];
export type FactName = "link_clicks" | "page_visits";

export type DimensionRef = {
  readonly name: DimensionName;
  readonly table: string;
  readonly alias: string;
  readonly key: string;
  readonly naturalKey: string;
  readonly columns: Readonly<Record<string, ColumnType>>;
  /** Columns computed from other columns; the renderer substitutes the expression for `alias.column`. */
  readonly expressions?: Readonly<Record<string, (alias: string) => string>>;
};

export type FactRef = {
  readonly name: FactName;
  readonly table: string;
  readonly alias: string;
  readonly primaryKey: string;
  readonly dateKey: string;
  readonly columns: Readonly<Record<string, ColumnType>>;
  readonly joins: Readonly<Partial<Record<DimensionName, string>>>;
};

/** `table: "fact"` addresses the plan's fact table; anything else names a dimension. */
export type ColumnRef = {
  table: "fact" | DimensionName;
  column: string;
};

const defineDimension = (dimension: DimensionRef): DimensionRef =>
  Object.freeze({
    ...dimension,
    columns: Object.freeze({ ...dimension.columns }),
    expressions: Object.freeze({ ...dimension.expressions })
  });

const defineFact = (fact: FactRef): FactRef =>
  Object.freeze({
    ...fact,
    columns: Object.freeze({ ...fact.columns }),
    joins: Object.freeze({ ...fact.joins })
  });

export const DIMENSIONS: Readonly<Record<DimensionName, DimensionRef>> = Object.freeze({
  campaign: defineDimension({
    name: "campaign",
    table: "dimcampaign",
    alias: "dc",
    key: "campaignkey",
    naturalKey: "campaign_natural_key",
    columns: {
      campaignkey: "integer",
      campaign_natural_key: "text",
      campaign_name: "text"
    }
  }),
  link: defineDimension({
    name: "link",
    table: "dimlink",
    alias: "dl",
    key: "linkkey",
    naturalKey: "link_natural_key",
    columns: {
      linkkey: "integer",
      link_natural_key: "text",
      link_name: "text",
      short_link_url: "text",
      link_type_name: "text"
    }
  }),
  page: defineDimension({
    name: "page",
    table: "dimpage",
    alias: "dp",
    key: "pagekey",
    naturalKey: "page_natural_key",
    columns: {
      pagekey: "integer",
      page_natural_key: "text",
      page_url: "text",
      page_title: "text"
    }
  }),
  product: defineDimension({
    name: "product",
    table: "dimproduct",
    alias: "dpr",
    key: "productkey",
    naturalKey: "product_id",
    columns: {
      productkey: "integer",
      product_id: "text",
      product_name: "text"
    }
  }),
  retailer: defineDimension({
    name: "retailer",
    table: "dimretailer",
    alias: "dr",
    key: "retailerkey",
    naturalKey: "retailer_name",
    columns: {
      retailerkey: "integer",
      retailer_name: "text"
    }
  }),
  location: defineDimension({
    name: "location",
    table: "dimlocation",
    alias: "dloc",
    key: "locationkey",
    naturalKey: "country_name",
    columns: {
      locationkey: "integer",
      country_name: "text",
      state_name: "text"
    }
  }),
  device: defineDimension({
    name: "device",
    table: "dimdevice",
    alias: "ddev",
    key: "devicekey",
    naturalKey: "device_type",
    columns: {
      devicekey: "integer",
      device_type: "text",
      browser: "text"
    }
  }),
  date: defineDimension({
    name: "date",
    table: "dimdate",
    alias: "dd",
    key: "datekey",
    naturalKey: "fulldate",
    columns: {
      datekey: "integer",
      fulldate: "date",
      datetime: "timestamp",
      hour_of_day: "integer",
      day_of_week: "integer"
    },
    expressions: {
      hour_of_day: (alias) => `EXTRACT(HOUR FROM ${alias}.datetime)::INT`,
      day_of_week: (alias) => `EXTRACT(DOW FROM ${alias}.datetime)::INT`
    }
  })
});

export const FACTS: Readonly<Record<FactName, FactRef>> = Object.freeze({
  link_clicks: defineFact({
    name: "link_clicks",
    table: "factlinkclicks",
    alias: "ffc",
    primaryKey: "clickfactkey",
    dateKey: "datekey",
    columns: {
      clickfactkey: "integer",
      datekey: "integer",
      campaignkey: "integer",
      linkkey: "integer",
      pagekey: "integer",
      productkey: "integer",
      retailerkey: "integer",
      locationkey: "integer",
      devicekey: "integer",
      is_atc_click: "boolean",
      click_value: "numeric",
      utm_source: "text",
      utm_medium: "text",
      utm_content: "text",
      utm_term: "text",
      utm_campaign: "text"
    },
    joins: {
      campaign: "campaignkey",
      link: "linkkey",
      page: "pagekey",
      product: "productkey",
      retailer: "retailerkey",
      location: "locationkey",
      device: "devicekey",
      date: "datekey"
    }
  }),
  page_visits: defineFact({
    name: "page_visits",
    table: "factpagevisits",
    alias: "fpv",
    primaryKey: "pagevisitfactkey",
    dateKey: "datekey",
    columns: {
      pagevisitfactkey: "integer",
      datekey: "integer",
      campaignkey: "integer",
      pagekey: "integer",
      time_on_page: "numeric"
    },
    joins: {
      campaign: "campaignkey",
      page: "pagekey",
      date: "datekey"
    }
  })
});

const DIMENSION_NAME_SET = new Set<string>(DIMENSION_NAMES);

export const isDimensionName = (value: string): value is DimensionName => {
  return DIMENSION_NAME_SET.has(value);
};

export const getDimension = (name: DimensionName): DimensionRef => DIMENSIONS[name];

export const getFact = (name: FactName): FactRef => FACTS[name];

export const canJoin = (fact: FactRef, dimension: DimensionName): boolean => {
  return typeof fact.joins[dimension] === "string";
};

/** Resolves the declared type of a column, or null when the schema does not declare it. */
export const resolveColumnType = (fact: FactRef, ref: ColumnRef): ColumnType | null => {
  const columns = ref.table === "fact" ? fact.columns : DIMENSIONS[ref.table].columns;
  return Object.prototype.hasOwnProperty.call(columns, ref.column) ? columns[ref.column] : null;
};

export const getColumnExpression = (dimension: DimensionRef, column: string): string | null => {
  const expression = dimension.expressions?.[column];
  return expression ? expression(dimension.alias) : null;
};

export const describeColumn = (ref: ColumnRef): string => `${ref.table}.${ref.column}`;
