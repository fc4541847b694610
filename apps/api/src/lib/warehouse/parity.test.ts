import { newDb } from "pg-mem";
import { beforeAll, describe, expect, it } from "vitest";

import { DirectQueryExecutor, type DirectClient } from "./executors/direct";
import { EmulatedQueryExecutor } from "./executors/emulated";
import { createMemoryTableClient } from "./executors/table_client";
import { countPages, createFilterSet, paginationForPage, type FilterSetInput } from "./filters";
import type { QueryExecutor } from "./executor";
import { buildQueryPlan } from "./plan";
import { resolveTemplate, type ScopeKind, type TemplateName } from "./templates";

const CAMPAIGNS = [1, 2, 3].map((campaignkey) => ({
  campaignkey,
  campaign_natural_key: `campaign-${campaignkey}`,
  campaign_name: `Campaign ${campaignkey}`
}));

const CLICKS = Array.from({ length: 25 }, (_, index) => {
  const key = index + 1;
  return {
    clickfactkey: key,
    datekey: 20260201 + (key % 7),
    campaignkey: (key % 3) + 1,
    linkkey: 10 + (key % 2),
    is_atc_click: key % 4 === 0,
    click_value: key,
    utm_source: key % 2 === 1 ? "newsletter" : "social"
  };
});

const sqlLiteral = (value: string | number | boolean): string => {
  return typeof value === "string" ? `'${value.replace(/'/g, "''")}'` : String(value);
};

const createDirectClient = (): DirectClient => {
  const db = newDb();
  db.public.none(`
    CREATE TABLE dimcampaign (campaignkey integer PRIMARY KEY, campaign_natural_key text, campaign_name text);
    CREATE TABLE factlinkclicks (
      clickfactkey integer PRIMARY KEY,
      datekey integer,
      campaignkey integer,
      linkkey integer,
      is_atc_click boolean,
      click_value integer,
      utm_source text
    );
  `);

  CAMPAIGNS.forEach((row) => {
    db.public.none(`INSERT INTO dimcampaign VALUES (${Object.values(row).map(sqlLiteral).join(", ")})`);
  });
  CLICKS.forEach((row) => {
    db.public.none(`INSERT INTO factlinkclicks VALUES (${Object.values(row).map(sqlLiteral).join(", ")})`);
  });

  const { Pool } = db.adapters.createPg();
  return new Pool();
};

describe("direct and emulated executors", () => {
  let direct: QueryExecutor;
  let emulated: QueryExecutor;

  beforeAll(() => {
    const directClient = createDirectClient();
    const tableClient = createMemoryTableClient({ dimcampaign: CAMPAIGNS, factlinkclicks: CLICKS });
    direct = new DirectQueryExecutor({ connect: async () => directClient });
    emulated = new EmulatedQueryExecutor({ connect: async () => tableClient });
  });

  const runBoth = async (name: TemplateName, input: FilterSetInput, scope: ScopeKind = "all") => {
    const plan = buildQueryPlan(resolveTemplate(name, scope), createFilterSet(input));
    return Promise.all([direct.execute(plan), emulated.execute(plan)]);
  };

  it("agree on a scoped, date-bounded count", async () => {
    const [fromDirect, fromEmulated] = await runBoth(
      "total_clicks",
      {
        equality_filters: [{ dimension: "campaign", column: "campaign_natural_key", value: "campaign-2" }],
        date_range: { start: "2026-02-02", end: "2026-02-05" }
      },
      "campaign"
    );

    expect(fromDirect).toEqual({ kind: "scalar", value: 6, warnings: [] });
    expect(fromEmulated).toEqual(fromDirect);
  });

  it("agree on a flag-restricted count", async () => {
    const [fromDirect, fromEmulated] = await runBoth(
      "total_atc_clicks",
      { equality_filters: [{ dimension: "campaign", column: "campaign_natural_key", value: "campaign-2" }] },
      "campaign"
    );

    expect(fromDirect).toEqual({ kind: "scalar", value: 2, warnings: [] });
    expect(fromEmulated).toEqual(fromDirect);
  });

  it("agree on a sum and a distinct count under a start-only date bound", async () => {
    const input: FilterSetInput = {
      equality_filters: [{ dimension: "campaign", column: "campaign_natural_key", value: "campaign-2" }],
      date_range: { start: "2026-02-04", end: null }
    };

    const [sumFromDirect, sumFromEmulated] = await runBoth("total_link_value", input, "campaign");
    const [linksFromDirect, linksFromEmulated] = await runBoth("link_count", input, "campaign");

    expect(sumFromDirect).toEqual({ kind: "scalar", value: 71, warnings: [] });
    expect(sumFromEmulated).toEqual(sumFromDirect);
    expect(linksFromDirect).toEqual({ kind: "scalar", value: 2, warnings: [] });
    expect(linksFromEmulated).toEqual(linksFromDirect);
  });

  it("agree on a ratio of two scoped counts", async () => {
    const [fromDirect, fromEmulated] = await runBoth(
      "conversion_rate",
      { equality_filters: [{ dimension: "campaign", column: "campaign_natural_key", value: "campaign-2" }] },
      "campaign"
    );

    expect(fromDirect.kind === "scalar" ? fromDirect.value : null).toBeCloseTo(22.2222, 3);
    expect(fromEmulated.kind === "scalar" ? fromEmulated.value : null).toBeCloseTo(22.2222, 3);
  });

  it("agree on a ratio whose denominator is zero", async () => {
    const [fromDirect, fromEmulated] = await runBoth("conversion_rate", { date_range: { start: "2026-03-01" } });

    expect(fromDirect).toEqual({ kind: "scalar", value: 0, warnings: [] });
    expect(fromEmulated).toEqual(fromDirect);
  });

  it("agree on the second page of a listing", async () => {
    const pagination = paginationForPage(2, 20);
    const [fromDirect, fromEmulated] = await runBoth("click_listing", { pagination });
    const [totalFromDirect, totalFromEmulated] = await runBoth("click_listing_count", {});

    expect(fromDirect.kind === "rows" ? fromDirect.rows.map((row) => row.clickfactkey) : []).toEqual([8, 1, 21, 14, 7]);
    expect(fromEmulated).toEqual(fromDirect);
    expect(totalFromDirect).toEqual({ kind: "scalar", value: 25, warnings: [] });
    expect(totalFromEmulated).toEqual(totalFromDirect);
    expect(countPages(25, 20)).toBe(2);
  });
});
