import { readFile } from "node:fs/promises";
import { z } from "zod";
import { HarFormatError } from "./errors.js";
import type { HeaderEntry, QueryValue, RequestRecord } from "./types.js";

// Schemas add no defaults: unminimized entries are written back with exactly
// the keys they came with.
const harHeaderSchema = z
  .object({
    name: z.string(),
    value: z.string().optional(),
  })
  .passthrough();

const harRequestSchema = z
  .object({
    method: z.string().optional(),
    url: z.string().optional(),
    headers: z.array(harHeaderSchema).optional(),
    postData: z
      .object({
        mimeType: z.string().optional(),
        text: z.string().optional(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

const harEntrySchema = z.object({ request: harRequestSchema }).passthrough();

const harDocumentSchema = z
  .object({
    log: z.object({ entries: z.array(harEntrySchema) }).passthrough(),
  })
  .passthrough();

export type HarEntry = z.infer<typeof harEntrySchema>;
export type HarDocument = z.infer<typeof harDocumentSchema>;

export interface LoadedHar {
  document: HarDocument;
  records: RequestRecord[];
}

const parseUrl = (raw: string): { path: string; query: Record<string, QueryValue> } => {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    return { path: "", query: {} };
  }
  const query: Record<string, QueryValue> = {};
  for (const key of new Set(url.searchParams.keys())) {
    const values = url.searchParams.getAll(key);
    query[key] = values.length === 1 ? values[0] : values;
  }
  return { path: url.pathname, query };
};

export const toRequestRecord = (entry: HarEntry, index: number): RequestRecord => {
  const request = entry.request;
  const url = request.url ?? "";
  const { path, query } = parseUrl(url);
  const headers: HeaderEntry[] = (request.headers ?? []).map((header) => ({
    name: header.name,
    value: header.value ?? "",
  }));
  return {
    index,
    method: request.method ?? "GET",
    url,
    path,
    query,
    headers,
    bodyText: request.postData?.text,
    mimeType: request.postData?.mimeType,
    entry,
  };
};

/** Validates a HAR document; accepts either its JSON text or the parsed value. */
export const parseHar = (input: unknown): LoadedHar => {
  let raw: unknown = input;
  if (typeof input === "string") {
    try {
      raw = JSON.parse(input);
    } catch {
      throw new HarFormatError("HAR file is not valid JSON");
    }
  }
  const parsed = harDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new HarFormatError(`HAR must contain log.entries${where}: ${issue?.message ?? "invalid"}`);
  }
  const document = parsed.data;
  return {
    document,
    records: document.log.entries.map(toRequestRecord),
  };
};

export const loadHar = async (path: string): Promise<LoadedHar> => {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new HarFormatError(`Cannot read HAR file ${path}: ${reason}`);
  }
  return parseHar(text);
};
