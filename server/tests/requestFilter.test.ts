import { describe, expect, it } from "vitest";
import { RequestFilter } from "../src/requestFilter.js";
import type { FilterOptions, ScopeOptions } from "../src/types.js";
import { makeRecord } from "./helpers.js";

const records = [
  makeRecord({ index: 0, method: "GET", url: "https://api.example.test/v1/users" }),
  makeRecord({ index: 1, method: "POST", url: "https://api.example.test/v1/orders" }),
  makeRecord({ index: 2, method: "post", url: "https://cdn.example.test/upload" }),
  makeRecord({ index: 3, method: "DELETE", url: "https://api.example.test/v1/orders/9" }),
];

const noFilter: FilterOptions = { methods: [], hosts: [], urlPatterns: [], indexRange: null };
const noScope: ScopeOptions = { includeUrls: [], includePatterns: [] };

const indices = (filter: FilterOptions, scope: ScopeOptions = noScope): number[] =>
  new RequestFilter(filter, scope).apply(records).map((record) => record.index);

describe("RequestFilter", () => {
  it("keeps everything without criteria", () => {
    expect(indices(noFilter)).toEqual([0, 1, 2, 3]);
  });

  it("matches methods case-insensitively", () => {
    expect(indices({ ...noFilter, methods: ["post"] })).toEqual([1, 2]);
  });

  it("filters by host", () => {
    expect(indices({ ...noFilter, hosts: ["cdn.example.test"] })).toEqual([2]);
  });

  it("filters by URL pattern", () => {
    expect(indices({ ...noFilter, urlPatterns: ["/orders", "/users$"] })).toEqual([0, 1, 3]);
  });

  it("filters by inclusive index range", () => {
    expect(indices({ ...noFilter, indexRange: [1, 2] })).toEqual([1, 2]);
  });

  it("combines filter and scope", () => {
    expect(
      indices(
        { ...noFilter, methods: ["POST", "DELETE"] },
        {
          includeUrls: ["https://api.example.test/v1/orders"],
          includePatterns: ["/orders/\\d+$"],
        }
      )
    ).toEqual([1, 3]);
  });
});
