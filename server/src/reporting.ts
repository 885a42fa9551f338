import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { HarDocument, HarEntry } from "./harLoader.js";
import { redactBody, redactHeaderEntries } from "./redaction.js";
import { createCurlSnippet } from "./snippets.js";
import { responseSize } from "./types.js";
import type { ProcessedRequest, ReportEntry, ReportOptions } from "./types.js";

export const buildReportEntry = (
  processed: ProcessedRequest,
  options: Pick<ReportOptions, "redact" | "snippets">
): ReportEntry => {
  const { record, baseline, outcome } = processed;
  const headers = options.redact ? redactHeaderEntries(outcome.headers) : outcome.headers;
  const body = options.redact ? redactBody(outcome.bodyText, record.mimeType) : outcome.bodyText;

  const entry: ReportEntry = {
    index: record.index,
    method: record.method,
    url: record.url,
    path: record.path,
    query: { ...record.query },
    baseline: { status: baseline.statusCode ?? null, length: responseSize(baseline) },
    final: { status: outcome.response.statusCode ?? null, length: responseSize(outcome.response) },
    matchedBaseline: outcome.matched,
    headers: {
      original: record.headers.length,
      candidates: outcome.headerCandidates,
      final: outcome.finalHeaderCount,
    },
    body: {
      candidates: outcome.bodyCandidates,
      final: outcome.finalBodyFieldCount,
    },
    minimizedHeaders: headers,
    minimizedBody: body ?? null,
    error: processed.error ?? baseline.error ?? null,
  };
  if (options.snippets) {
    entry.curl = createCurlSnippet({
      method: record.method,
      url: record.url,
      headers,
      bodyText: body,
    });
  }
  return entry;
};

const writeJson = async (path: string, value: unknown): Promise<void> => {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(value, null, 2), "utf8");
};

export const writeReport = (path: string, entries: ReportEntry[]): Promise<void> =>
  writeJson(path, entries);

export const writeHar = (path: string, document: HarDocument): Promise<void> =>
  writeJson(path, document);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === "object" && !Array.isArray(value);

/**
 * Rewrites the HAR entries of matched requests in a private copy of the
 * document: headers are replaced, and the body text when the outcome carries one.
 */
export class HarExporter {
  private readonly document: HarDocument;

  constructor(source: HarDocument) {
    this.document = structuredClone(source);
  }

  apply(processed: readonly ProcessedRequest[], includeMetadata = true): HarDocument {
    const entries = this.document.log.entries;
    for (const item of processed) {
      const { record, outcome } = item;
      if (!outcome.matched) {
        continue;
      }
      const entry = entries[record.index];
      if (!entry) {
        continue;
      }
      entry.request.headers = outcome.headers.map((header) => ({ ...header }));

      if (outcome.bodyText !== undefined) {
        const postData: NonNullable<HarEntry["request"]["postData"]> =
          entry.request.postData ?? {};
        postData.text = outcome.bodyText;
        if (postData.mimeType === undefined && record.mimeType !== undefined) {
          postData.mimeType = record.mimeType;
        }
        entry.request.postData = postData;
      }

      if (includeMetadata) {
        const existing = entry._minimized;
        entry._minimized = {
          ...(isRecord(existing) ? existing : {}),
          originalHeaderCount: record.headers.length,
          finalHeaderCount: outcome.finalHeaderCount,
          headerCandidates: outcome.headerCandidates,
          bodyCandidates: outcome.bodyCandidates,
          matched: outcome.matched,
        };
      }
    }
    return this.document;
  }
}
