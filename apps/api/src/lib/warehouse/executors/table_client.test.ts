import { createClient } from "@supabase/supabase-js";
import { describe, expect, it, vi } from "vitest";

import { BackendQueryError } from "../errors";
import { createMemoryTableClient, createSupabaseTableClient, sortRows } from "./table_client";

type FakeResponse = {
  status?: number;
  body?: unknown;
  count?: number;
};

const requestUrl = (input: string | URL | Request): URL => {
  if (input instanceof URL) {
    return input;
  }

  return new URL(typeof input === "string" ? input : input.url);
};

const createFakeSupabase = (respond: (url: URL) => FakeResponse) => {
  const fakeFetch = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const url = requestUrl(input);
    const { status = 200, body = [], count } = respond(url);
    const headers = new Headers({ "content-type": "application/json" });
    if (count !== undefined) {
      headers.set("content-range", `*/${count}`);
    }

    const payload = init?.method === "HEAD" ? null : JSON.stringify(body);
    return new Response(payload, { status, headers });
  });

  const client = createClient("http://localhost:54321", "test-key", {
    global: { fetch: fakeFetch },
    auth: { autoRefreshToken: false, persistSession: false }
  });

  return { fakeFetch, tableClient: createSupabaseTableClient(client) };
};

describe("createSupabaseTableClient", () => {
  it("translates filters, ordering and ranges into query parameters", async () => {
    const { fakeFetch, tableClient } = createFakeSupabase(() => ({
      body: [{ clickfactkey: 9, datekey: 20260203 }, "not-a-row"]
    }));

    const result = await tableClient.select({
      table: "factlinkclicks",
      columns: ["clickfactkey", "datekey"],
      filters: [
        { op: "in", column: "campaignkey", values: [1, 2] },
        { op: "gte", column: "datekey", value: 20260201 },
        { op: "lte", column: "datekey", value: 20260207 },
        { op: "eq", column: "is_atc_click", value: true },
        { op: "not_null", column: "utm_source" }
      ],
      order: [
        { column: "datekey", ascending: false },
        { column: "clickfactkey", ascending: false }
      ],
      range: { from: 20, to: 39 }
    });

    expect(result).toEqual({ rows: [{ clickfactkey: 9, datekey: 20260203 }], count: null });
    expect(fakeFetch).toHaveBeenCalledTimes(1);

    const url = requestUrl(fakeFetch.mock.calls[0][0]);
    expect(url.pathname).toBe("/rest/v1/factlinkclicks");
    expect(url.searchParams.get("select")).toBe("clickfactkey,datekey");
    expect(url.searchParams.get("campaignkey")).toBe("in.(1,2)");
    expect(url.searchParams.getAll("datekey")).toEqual(["gte.20260201", "lte.20260207"]);
    expect(url.searchParams.get("is_atc_click")).toBe("eq.true");
    expect(url.searchParams.get("utm_source")).toBe("not.is.null");
    expect(url.searchParams.get("order")).toBe("datekey.desc,clickfactkey.desc");
    expect(url.searchParams.get("offset")).toBe("20");
    expect(url.searchParams.get("limit")).toBe("20");
  });

  it("issues head requests for exact counts", async () => {
    const { fakeFetch, tableClient } = createFakeSupabase(() => ({ count: 42 }));

    await expect(
      tableClient.select({ table: "factpagevisits", columns: ["*"], filters: [], count: true, head: true })
    ).resolves.toEqual({ rows: [], count: 42 });

    const init = fakeFetch.mock.calls[0][1];
    expect(init?.method).toBe("HEAD");
    expect(new Headers(init?.headers).get("prefer")).toContain("count=exact");
  });

  it("raises backend query errors for rejected selects", async () => {
    const { tableClient } = createFakeSupabase(() => ({
      status: 400,
      body: { message: "column factlinkclicks.nope does not exist", code: "42703", details: null, hint: null }
    }));

    const result = tableClient.select({ table: "factlinkclicks", columns: ["nope"], filters: [] });
    await expect(result).rejects.toBeInstanceOf(BackendQueryError);
    await expect(result).rejects.toMatchObject({
      backend: "emulated",
      message: "Select on factlinkclicks failed: column factlinkclicks.nope does not exist"
    });
  });
});

describe("sortRows", () => {
  const rows = [{ key: 2 }, { key: null }, { key: 1 }];

  it("places nulls last when ascending", () => {
    expect(sortRows(rows, [{ column: "key", ascending: true }])).toEqual([{ key: 1 }, { key: 2 }, { key: null }]);
  });

  it("places nulls first when descending", () => {
    expect(sortRows(rows, [{ column: "key", ascending: false }])).toEqual([{ key: null }, { key: 2 }, { key: 1 }]);
  });

  it("breaks ties with later terms and keeps input order otherwise", () => {
    const tied = [
      { day: "2026-02-02", id: 1 },
      { day: "2026-02-01", id: 2 },
      { day: "2026-02-02", id: 3 }
    ];

    expect(
      sortRows(tied, [
        { column: "day", ascending: false },
        { column: "id", ascending: false }
      ]).map((row) => row.id)
    ).toEqual([3, 1, 2]);
    expect(sortRows(tied, [{ column: "day", ascending: true }]).map((row) => row.id)).toEqual([2, 1, 3]);
  });
});

describe("createMemoryTableClient", () => {
  const tables = {
    dimdate: [
      { datekey: 20260201, fulldate: "2026-02-01" },
      { datekey: 20260202, fulldate: "2026-02-02" },
      { datekey: 20260203, fulldate: null }
    ]
  };

  it("applies filters, projections, counts and ranges", async () => {
    const client = createMemoryTableClient(tables);

    await expect(
      client.select({
        table: "dimdate",
        columns: ["datekey"],
        filters: [
          { op: "gte", column: "datekey", value: 20260202 },
          { op: "not_null", column: "fulldate" }
        ],
        count: true
      })
    ).resolves.toEqual({ rows: [{ datekey: 20260202 }], count: 1 });

    await expect(
      client.select({
        table: "dimdate",
        columns: ["datekey"],
        filters: [{ op: "in", column: "datekey", values: [20260201, 20260203] }],
        order: [{ column: "datekey", ascending: false }],
        range: { from: 1, to: 1 }
      })
    ).resolves.toEqual({ rows: [{ datekey: 20260201 }], count: null });

    expect(client.requests).toHaveLength(2);
  });

  it("refuses ordering it was told it cannot do", async () => {
    const client = createMemoryTableClient(tables, { capabilities: { ordering: false } });

    await expect(
      client.select({ table: "dimdate", columns: ["*"], filters: [], order: [{ column: "datekey", ascending: true }] })
    ).rejects.toThrow("Table client cannot order or range dimdate");
  });

  it("reports unknown tables as backend errors", async () => {
    const client = createMemoryTableClient(tables);

    await expect(client.select({ table: "dimmissing", columns: ["*"], filters: [] })).rejects.toMatchObject({
      name: "BackendQueryError",
      message: "Unknown table dimmissing"
    });
  });
});
