import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import type { HarDocument } from "./harLoader.js";
import type { ReportEntry, RunSummary } from "./types.js";

export interface RunRecord {
  id: string;
  createdAt: string;
  summary: RunSummary;
  report: ReportEntry[];
  har: HarDocument;
}

export interface RunListItem {
  id: string;
  createdAt: string;
  summary: RunSummary;
}

interface PersistedRunStore {
  version: 1;
  runs: RunRecord[];
}

export interface RunStore {
  add(run: RunRecord): RunRecord;
  list(): RunListItem[];
  get(id: string): RunRecord | undefined;
}

/** Newest-first run history, capped at `maxRuns`. */
export class InMemoryRunStore implements RunStore {
  protected readonly runs: RunRecord[] = [];
  protected readonly byId = new Map<string, RunRecord>();
  protected readonly maxRuns: number;

  constructor(maxRuns = 50) {
    this.maxRuns = maxRuns;
  }

  add(run: RunRecord): RunRecord {
    this.runs.unshift(run);
    this.byId.set(run.id, run);
    this.prune();
    return run;
  }

  list(): RunListItem[] {
    return this.runs.map(({ id, createdAt, summary }) => ({ id, createdAt, summary }));
  }

  get(id: string): RunRecord | undefined {
    return this.byId.get(id);
  }

  protected hydrate(runs: RunRecord[]): void {
    for (const run of runs) {
      this.runs.push(run);
      this.byId.set(run.id, run);
    }
    this.prune();
  }

  protected snapshot(): PersistedRunStore {
    return { version: 1, runs: [...this.runs] };
  }

  private prune(): void {
    while (this.runs.length > this.maxRuns) {
      const removed = this.runs.pop();
      if (removed) {
        this.byId.delete(removed.id);
      }
    }
  }
}

const isPersistedStore = (value: unknown): value is PersistedRunStore =>
  value !== null &&
  typeof value === "object" &&
  "runs" in value &&
  Array.isArray(value.runs);

export class FileRunStore extends InMemoryRunStore {
  private readonly filePath: string;

  constructor(filePath: string, maxRuns = 50) {
    super(maxRuns);
    this.filePath = filePath;
    this.load();
  }

  override add(run: RunRecord): RunRecord {
    const saved = super.add(run);
    this.persist();
    return saved;
  }

  private load(): void {
    if (!existsSync(this.filePath)) return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.filePath, "utf8"));
    } catch {
      // Unreadable store files are replaced on the next write.
      return;
    }
    if (isPersistedStore(parsed)) {
      this.hydrate(parsed.runs);
    }
  }

  private persist(): void {
    mkdirSync(dirname(this.filePath), { recursive: true });
    writeFileSync(this.filePath, JSON.stringify(this.snapshot(), null, 2), "utf8");
  }
}
