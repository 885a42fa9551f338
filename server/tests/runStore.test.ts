import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { afterEach, describe, expect, it } from "vitest";
import { FileRunStore, InMemoryRunStore } from "../src/runStore.js";
import type { RunRecord } from "../src/runStore.js";

const dirs: string[] = [];

afterEach(() => {
  for (const dir of dirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
});

const makeRun = (id: string): RunRecord => ({
  id,
  createdAt: "2026-02-01T00:00:00.000Z",
  summary: { total: 2, selected: 1, matched: 1 },
  report: [],
  har: { log: { entries: [] } },
});

const tempStorePath = (): string => {
  const dir = mkdtempSync(join(tmpdir(), "har-trim-store-"));
  dirs.push(dir);
  return join(dir, "runs.json");
};

describe("run stores", () => {
  it("lists runs newest first without their payloads", () => {
    const store = new InMemoryRunStore();
    store.add(makeRun("one"));
    store.add(makeRun("two"));

    expect(store.list()).toEqual([
      { id: "two", createdAt: "2026-02-01T00:00:00.000Z", summary: { total: 2, selected: 1, matched: 1 } },
      { id: "one", createdAt: "2026-02-01T00:00:00.000Z", summary: { total: 2, selected: 1, matched: 1 } },
    ]);
  });

  it("applies the run limit in memory", () => {
    const store = new InMemoryRunStore(1);
    store.add(makeRun("one"));
    store.add(makeRun("two"));

    expect(store.list()).toHaveLength(1);
    expect(store.get("one")).toBeUndefined();
    expect(store.get("two")?.id).toBe("two");
  });

  it("persists runs to disk and loads them on restart", () => {
    const filePath = tempStorePath();

    const first = new FileRunStore(filePath, 5);
    first.add(makeRun("run-1"));

    const second = new FileRunStore(filePath, 5);
    expect(second.list()).toHaveLength(1);
    expect(second.get("run-1")?.summary.matched).toBe(1);
  });

  it("starts empty from an unreadable store file", () => {
    const filePath = tempStorePath();
    writeFileSync(filePath, "{not json", "utf8");

    const store = new FileRunStore(filePath, 5);

    expect(store.list()).toEqual([]);
  });
});
