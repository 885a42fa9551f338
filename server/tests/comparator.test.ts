import { describe, expect, it } from "vitest";
import { ResponseComparator } from "../src/comparator.js";
import { ConfigError } from "../src/errors.js";
import { comparatorPolicy, failedSnapshot, makeSnapshot } from "./helpers.js";

const bodyOfLength = (length: number): string => "x".repeat(length);

describe("ResponseComparator", () => {
  it("treats a healthy snapshot as equivalent to itself", () => {
    const comparator = new ResponseComparator(
      comparatorPolicy({ lengthCheck: true, needAll: ["ok"], patterns: ["^o"] })
    );
    const snapshot = makeSnapshot({ body: "ok" });

    expect(comparator.equivalent(snapshot, snapshot)).toBe(true);
  });

  it("accepts any healthy pair when no signal is enabled", () => {
    const comparator = new ResponseComparator(
      comparatorPolicy({ statusCode: false, lengthCheck: false })
    );

    expect(
      comparator.equivalent(makeSnapshot({ statusCode: 200 }), makeSnapshot({ statusCode: 500 }))
    ).toBe(true);
    expect(comparator.explain(makeSnapshot(), makeSnapshot())).toEqual([]);
  });

  it("rejects unhealthy snapshots on either side", () => {
    const comparator = new ResponseComparator(
      comparatorPolicy({ statusCode: false, lengthCheck: false })
    );

    expect(comparator.equivalent(failedSnapshot(), makeSnapshot())).toBe(false);
    expect(comparator.equivalent(makeSnapshot(), failedSnapshot())).toBe(false);
    expect(comparator.equivalent(makeSnapshot(), makeSnapshot({ statusCode: undefined }))).toBe(
      false
    );
  });

  it("compares status codes", () => {
    const comparator = new ResponseComparator(comparatorPolicy());

    expect(comparator.equivalent(makeSnapshot(), makeSnapshot({ statusCode: 200 }))).toBe(true);
    expect(comparator.equivalent(makeSnapshot(), makeSnapshot({ statusCode: 403 }))).toBe(false);
  });

  it("applies the length tolerance inclusively", () => {
    const comparator = new ResponseComparator(
      comparatorPolicy({ statusCode: false, lengthCheck: true, lengthTolerance: 0.1 })
    );
    const baseline = makeSnapshot({ body: bodyOfLength(100) });

    expect(comparator.equivalent(baseline, makeSnapshot({ body: bodyOfLength(110) }))).toBe(true);
    expect(comparator.equivalent(baseline, makeSnapshot({ body: bodyOfLength(90) }))).toBe(true);
    expect(comparator.equivalent(baseline, makeSnapshot({ body: bodyOfLength(111) }))).toBe(false);
  });

  it("requires an empty candidate when the baseline body is empty", () => {
    const comparator = new ResponseComparator(
      comparatorPolicy({ statusCode: false, lengthCheck: true, lengthTolerance: 5 })
    );
    const baseline = makeSnapshot({ body: "" });

    expect(comparator.equivalent(baseline, makeSnapshot({ body: "" }))).toBe(true);
    expect(comparator.equivalent(baseline, makeSnapshot({ body: undefined }))).toBe(true);
    expect(comparator.equivalent(baseline, makeSnapshot({ body: "x" }))).toBe(false);
  });

  it("checks required and optional substrings", () => {
    const comparator = new ResponseComparator(
      comparatorPolicy({ statusCode: false, needAll: ["id", "name"], needAny: ["admin", "owner"] })
    );
    const baseline = makeSnapshot();

    expect(
      comparator.equivalent(baseline, makeSnapshot({ body: '{"id":1,"name":"a","role":"owner"}' }))
    ).toBe(true);
    expect(comparator.equivalent(baseline, makeSnapshot({ body: '{"id":1,"role":"owner"}' }))).toBe(
      false
    );
    expect(
      comparator.equivalent(baseline, makeSnapshot({ body: '{"id":1,"name":"a","role":"guest"}' }))
    ).toBe(false);
    expect(comparator.equivalent(baseline, makeSnapshot({ body: undefined }))).toBe(false);
  });

  it("requires every pattern to match, line by line", () => {
    const comparator = new ResponseComparator(
      comparatorPolicy({ statusCode: false, patterns: ["^status: active$", "\\d{3}"] })
    );
    const baseline = makeSnapshot();

    expect(
      comparator.equivalent(baseline, makeSnapshot({ body: "user 123\nstatus: active\n" }))
    ).toBe(true);
    expect(comparator.equivalent(baseline, makeSnapshot({ body: "status: active" }))).toBe(false);
  });

  it("combines signals with OR when configured", () => {
    const comparator = new ResponseComparator(
      comparatorPolicy({ statusCode: true, needAll: ["welcome"], logic: "OR" })
    );
    const baseline = makeSnapshot({ statusCode: 200 });

    expect(comparator.equivalent(baseline, makeSnapshot({ statusCode: 302, body: "welcome" }))).toBe(
      true
    );
    expect(comparator.equivalent(baseline, makeSnapshot({ statusCode: 200, body: "bye" }))).toBe(
      true
    );
    expect(comparator.equivalent(baseline, makeSnapshot({ statusCode: 302, body: "bye" }))).toBe(
      false
    );
  });

  it("explains every enabled signal", () => {
    const comparator = new ResponseComparator(
      comparatorPolicy({ lengthCheck: true, lengthTolerance: 0, needAny: ["ok"] })
    );

    expect(
      comparator.explain(makeSnapshot({ body: "ok" }), makeSnapshot({ statusCode: 201, body: "ok" }))
    ).toEqual([
      { signal: "statusCode", passed: false },
      { signal: "length", passed: true },
      { signal: "needAny", passed: true },
    ]);
  });

  it("rejects invalid patterns up front", () => {
    expect(() => new ResponseComparator(comparatorPolicy({ patterns: ["("] }))).toThrow(ConfigError);
  });
});
