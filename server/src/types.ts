export interface HeaderEntry {
  name: string;
  value: string;
}

export type QueryValue = string | string[];

/** One captured request, as read from the HAR file. Never mutated. */
export interface RequestRecord {
  readonly index: number;
  readonly method: string;
  readonly url: string;
  readonly path: string;
  readonly query: Readonly<Record<string, QueryValue>>;
  readonly headers: readonly HeaderEntry[];
  readonly bodyText: string | undefined;
  readonly mimeType: string | undefined;
  /** The untouched HAR entry the record was read from. */
  readonly entry: unknown;
}

export interface ResponseSnapshot {
  readonly statusCode: number | undefined;
  readonly body: string | undefined;
  readonly elapsedMs: number;
  readonly error: string | undefined;
  readonly headers: Readonly<Record<string, string>>;
}

export const isHealthy = (snapshot: ResponseSnapshot): boolean =>
  snapshot.error === undefined && snapshot.statusCode !== undefined;

export const responseSize = (snapshot: ResponseSnapshot): number =>
  snapshot.body?.length ?? 0;

export interface MinimizationOutcome {
  headers: HeaderEntry[];
  bodyText: string | undefined;
  response: ResponseSnapshot;
  matched: boolean;
  headerCandidates: number;
  bodyCandidates: number;
  finalHeaderCount: number;
  finalBodyFieldCount: number;
}

export interface ProcessedRequest {
  record: RequestRecord;
  baseline: ResponseSnapshot;
  outcome: MinimizationOutcome;
  error?: string;
}

export type Phase = "headers" | "body";

export type BodyMode = "auto" | "json" | "form";

export type BodyKind = "json" | "form" | "raw";

export interface ComparatorPolicy {
  statusCode: boolean;
  lengthCheck: boolean;
  lengthTolerance: number;
  needAll: string[];
  needAny: string[];
  patterns: string[];
  logic: "AND" | "OR";
}

export interface HeaderPolicy {
  enabled: boolean;
  protected: string[];
  ignore: string[];
  allowPatterns: string[];
}

export interface BodyPolicy {
  enabled: boolean;
  mode: BodyMode;
  protectedKeys: string[];
  onlyKeys: string[];
  /** What happens to a candidate field that reduction drops. */
  removedFields: "omit" | "blank";
  tryBlankValues: boolean;
}

export interface MinimizationPolicy {
  order: [Phase, Phase];
  headers: HeaderPolicy;
  body: BodyPolicy;
}

export interface ClientOptions {
  timeoutMs: number;
  verifyTls: boolean;
  proxy: string | null;
  rateLimit: {
    requestsPerSecond: number | null;
  };
}

export interface FilterOptions {
  methods: string[];
  hosts: string[];
  urlPatterns: string[];
  indexRange: [number, number] | null;
}

export interface ScopeOptions {
  includeUrls: string[];
  includePatterns: string[];
}

export interface ReportOptions {
  redact: boolean;
  includeMetadata: boolean;
  snippets: boolean;
}

export interface ServerOptions {
  storePath: string | null;
  maxRuns: number;
}

export interface TrimConfig {
  inputHar: string;
  outputHar: string;
  reportPath: string;
  maxTestsPerRequest: number;
  concurrency: number;
  client: ClientOptions;
  filter: FilterOptions;
  scope: ScopeOptions;
  comparator: ComparatorPolicy;
  minimization: MinimizationPolicy;
  report: ReportOptions;
  server: ServerOptions;
}

export interface ReportEntry {
  index: number;
  method: string;
  url: string;
  path: string;
  query: Record<string, QueryValue>;
  baseline: { status: number | null; length: number };
  final: { status: number | null; length: number };
  matchedBaseline: boolean;
  headers: { original: number; candidates: number; final: number };
  body: { candidates: number; final: number };
  minimizedHeaders: HeaderEntry[];
  minimizedBody: string | null;
  curl?: string;
  error: string | null;
}

export interface RunSummary {
  total: number;
  selected: number;
  matched: number;
}
