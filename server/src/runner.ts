import type { BaseLogger } from "pino";
import { ResponseComparator } from "./comparator.js";
import { getErrorMessage } from "./errors.js";
import { loadHar } from "./harLoader.js";
import type { HarDocument, LoadedHar } from "./harLoader.js";
import { RequestMinimizer } from "./minimizer.js";
import type { Clock } from "./rateLimiter.js";
import { buildReportEntry, HarExporter, writeHar, writeReport } from "./reporting.js";
import { RequestFilter } from "./requestFilter.js";
import { HttpTransport } from "./transport.js";
import type { FetchImpl } from "./transport.js";
import type {
  ProcessedRequest,
  ReportEntry,
  RequestRecord,
  ResponseSnapshot,
  RunSummary,
  TrimConfig,
} from "./types.js";

export interface RunDependencies {
  logger: BaseLogger;
  fetchImpl?: FetchImpl;
  clock?: Clock;
}

export interface RunResult {
  summary: RunSummary;
  report: ReportEntry[];
  har: HarDocument;
}

const failedSnapshot = (error: string): ResponseSnapshot => ({
  statusCode: undefined,
  body: undefined,
  elapsedMs: 0,
  error,
  headers: {},
});

/**
 * Minimizes every record with at most `concurrency` requests in flight.
 * Results keep input order. A request that throws is recorded as unmatched
 * and the batch carries on.
 */
export const runBatch = async (
  records: readonly RequestRecord[],
  minimizer: Pick<RequestMinimizer, "minimize">,
  options: { concurrency: number; logger: BaseLogger }
): Promise<ProcessedRequest[]> => {
  const results: ProcessedRequest[] = new Array(records.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < records.length) {
      const position = next;
      next += 1;
      const record = records[position];
      try {
        const { baseline, outcome } = await minimizer.minimize(record);
        results[position] = { record, baseline, outcome };
      } catch (error) {
        const message = getErrorMessage(error);
        options.logger.error({ index: record.index, err: error }, "request minimization failed");
        const snapshot = failedSnapshot(message);
        results[position] = {
          record,
          baseline: snapshot,
          outcome: {
            headers: record.headers.map((header) => ({ ...header })),
            bodyText: record.bodyText,
            response: snapshot,
            matched: false,
            headerCandidates: 0,
            bodyCandidates: 0,
            finalHeaderCount: record.headers.length,
            finalBodyFieldCount: 0,
          },
          error: message,
        };
      }
    }
  };

  const workers = Math.max(1, Math.min(options.concurrency, records.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));
  return results;
};

/** Minimizes the selected requests of an already-loaded HAR without touching the disk. */
export const minimizeHar = async (
  loaded: LoadedHar,
  config: TrimConfig,
  deps: RunDependencies
): Promise<RunResult> => {
  const selected = new RequestFilter(config.filter, config.scope).apply(loaded.records);
  deps.logger.info(
    { total: loaded.records.length, selected: selected.length },
    "requests selected for minimization"
  );

  const transport = new HttpTransport({
    client: config.client,
    logger: deps.logger,
    fetchImpl: deps.fetchImpl,
    clock: deps.clock,
  });
  try {
    const minimizer = new RequestMinimizer({
      policy: config.minimization,
      maxTestsPerRequest: config.maxTestsPerRequest,
      transport,
      comparator: new ResponseComparator(config.comparator),
      logger: deps.logger,
    });
    const processed = await runBatch(selected, minimizer, {
      concurrency: config.concurrency,
      logger: deps.logger,
    });

    const report = processed.map((item) => buildReportEntry(item, config.report));
    const har = new HarExporter(loaded.document).apply(processed, config.report.includeMetadata);
    return {
      summary: {
        total: loaded.records.length,
        selected: selected.length,
        matched: processed.filter((item) => item.outcome.matched).length,
      },
      report,
      har,
    };
  } finally {
    await transport.close();
  }
};

export const runMinimization = async (
  config: TrimConfig,
  deps: RunDependencies
): Promise<RunSummary> => {
  const loaded = await loadHar(config.inputHar);
  const result = await minimizeHar(loaded, config, deps);
  await writeReport(config.reportPath, result.report);
  await writeHar(config.outputHar, result.har);
  deps.logger.info(
    { ...result.summary, report: config.reportPath, har: config.outputHar },
    "minimization finished"
  );
  return result.summary;
};
