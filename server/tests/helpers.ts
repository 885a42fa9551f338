import { pino } from "pino";
import type {
  BodyPolicy,
  ComparatorPolicy,
  HeaderEntry,
  HeaderPolicy,
  MinimizationPolicy,
  RequestRecord,
  ResponseSnapshot,
} from "../src/types.js";

export const silentLogger = pino({ level: "silent" });

export const makeSnapshot = (overrides: Partial<ResponseSnapshot> = {}): ResponseSnapshot => ({
  statusCode: 200,
  body: "ok",
  elapsedMs: 1,
  error: undefined,
  headers: {},
  ...overrides,
});

export const failedSnapshot = (error = "connect ECONNREFUSED"): ResponseSnapshot => ({
  statusCode: undefined,
  body: undefined,
  elapsedMs: 1,
  error,
  headers: {},
});

export const makeRecord = (overrides: Partial<RequestRecord> = {}): RequestRecord => ({
  index: 0,
  method: "POST",
  url: "https://api.example.test/v1/items",
  path: "/v1/items",
  query: {},
  headers: [],
  bodyText: undefined,
  mimeType: undefined,
  entry: {},
  ...overrides,
});

export const comparatorPolicy = (
  overrides: Partial<ComparatorPolicy> = {}
): ComparatorPolicy => ({
  statusCode: true,
  lengthCheck: false,
  lengthTolerance: 0.1,
  needAll: [],
  needAny: [],
  patterns: [],
  logic: "AND",
  ...overrides,
});

export const minimizationPolicy = (
  overrides: {
    order?: MinimizationPolicy["order"];
    headers?: Partial<HeaderPolicy>;
    body?: Partial<BodyPolicy>;
  } = {}
): MinimizationPolicy => ({
  order: overrides.order ?? ["headers", "body"],
  headers: {
    enabled: true,
    protected: [],
    ignore: [],
    allowPatterns: [],
    ...overrides.headers,
  },
  body: {
    enabled: true,
    mode: "auto",
    protectedKeys: [],
    onlyKeys: [],
    removedFields: "blank",
    tryBlankValues: false,
    ...overrides.body,
  },
});

export interface RecordedCall {
  headers: HeaderEntry[];
  body: string | undefined;
}

/**
 * In-process stand-in for the live endpoint. `respond` sees the 1-based call
 * number and what would have been sent.
 */
export class ScriptedEndpoint {
  readonly calls: RecordedCall[] = [];
  private readonly respond: (call: RecordedCall, number: number) => ResponseSnapshot;

  constructor(respond: (call: RecordedCall, number: number) => ResponseSnapshot) {
    this.respond = respond;
  }

  async exchange(
    record: RequestRecord,
    headers: readonly HeaderEntry[],
    bodyOverride?: string
  ): Promise<ResponseSnapshot> {
    const call = { headers: [...headers], body: bodyOverride ?? record.bodyText };
    this.calls.push(call);
    return this.respond(call, this.calls.length);
  }
}

export const hasHeader = (call: RecordedCall, name: string): boolean =>
  call.headers.some((header) => header.name.toLowerCase() === name.toLowerCase());

export const jsonBody = (call: RecordedCall): Record<string, unknown> => {
  const parsed: unknown = JSON.parse(call.body ?? "{}");
  return parsed !== null && typeof parsed === "object" && !Array.isArray(parsed)
    ? Object.fromEntries(Object.entries(parsed))
    : {};
};
