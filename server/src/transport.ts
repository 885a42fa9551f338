import type { BaseLogger } from "pino";
import { Agent, ProxyAgent, fetch as undiciFetch } from "undici";
import type { Dispatcher, RequestInit, Response } from "undici";
import { describeFetchError } from "./errors.js";
import { RateLimiter } from "./rateLimiter.js";
import type { Clock } from "./rateLimiter.js";
import type { ClientOptions, HeaderEntry, RequestRecord, ResponseSnapshot } from "./types.js";

export type FetchImpl = (url: string, init: RequestInit) => Promise<Response>;

export interface TransportOptions {
  client: ClientOptions;
  logger: BaseLogger;
  fetchImpl?: FetchImpl;
  clock?: Clock;
}

/** Headers the client computes itself, plus HTTP/2 pseudo-headers. */
const unsendableHeaders = new Set([
  "connection",
  "content-length",
  "host",
  "keep-alive",
  "transfer-encoding",
  "upgrade",
]);

export const toSendableHeaders = (headers: readonly HeaderEntry[]): [string, string][] =>
  headers
    .filter((header) => {
      const name = header.name.toLowerCase();
      return !name.startsWith(":") && !unsendableHeaders.has(name);
    })
    .map((header) => [header.name, header.value]);

const createDispatcher = (client: ClientOptions): Dispatcher => {
  const connect = { rejectUnauthorized: client.verifyTls };
  if (client.proxy) {
    return new ProxyAgent({
      uri: client.proxy,
      requestTls: connect,
      proxyTls: connect,
    });
  }
  return new Agent({ connect });
};

const bodylessMethods = new Set(["GET", "HEAD"]);

/**
 * Sends one HTTP exchange per call, paced by a shared {@link RateLimiter}.
 * Ordinary failures (timeouts, refused connections, TLS and DNS errors)
 * come back as a snapshot with `error` set and no status.
 */
export class HttpTransport {
  private readonly client: ClientOptions;
  private readonly logger: BaseLogger;
  private readonly fetchImpl: FetchImpl;
  private readonly limiter: RateLimiter;
  private readonly dispatcher: Dispatcher;

  constructor(options: TransportOptions) {
    this.client = options.client;
    this.logger = options.logger;
    this.fetchImpl = options.fetchImpl ?? undiciFetch;
    this.limiter = new RateLimiter(options.client.rateLimit.requestsPerSecond, options.clock);
    this.dispatcher = createDispatcher(options.client);
  }

  async exchange(
    record: RequestRecord,
    headers: readonly HeaderEntry[],
    bodyOverride?: string
  ): Promise<ResponseSnapshot> {
    await this.limiter.wait();

    const method = record.method.toUpperCase();
    const body = bodylessMethods.has(method) ? undefined : bodyOverride ?? record.bodyText;
    const started = Date.now();

    try {
      const response = await this.fetchImpl(record.url, {
        method,
        headers: toSendableHeaders(headers),
        body,
        dispatcher: this.dispatcher,
        signal: AbortSignal.timeout(this.client.timeoutMs),
      });
      const text = await response.text();
      const responseHeaders: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        responseHeaders[key] = value;
      });
      const elapsedMs = Date.now() - started;

      this.logger.debug(
        { index: record.index, method, url: record.url, status: response.status, elapsedMs },
        "exchange complete"
      );
      return {
        statusCode: response.status,
        body: text,
        elapsedMs,
        error: undefined,
        headers: responseHeaders,
      };
    } catch (error) {
      const elapsedMs = Date.now() - started;
      const message = describeFetchError(error);
      this.logger.debug(
        { index: record.index, method, url: record.url, elapsedMs, error: message },
        "exchange failed"
      );
      return {
        statusCode: undefined,
        body: undefined,
        elapsedMs,
        error: message,
        headers: {},
      };
    }
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }
}
