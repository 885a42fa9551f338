import { toSendableHeaders } from "./transport.js";
import type { HeaderEntry } from "./types.js";

const escapeShell = (value: string): string => value.replace(/'/g, `'\\''`);

export interface SnippetRequest {
  method: string;
  url: string;
  headers: readonly HeaderEntry[];
  bodyText: string | undefined;
}

/** curl command reproducing the request as the transport would send it. */
export const createCurlSnippet = (request: SnippetRequest): string => {
  const method = request.method.toUpperCase();
  const headerFlags = toSendableHeaders(request.headers)
    .map(([name, value]) => `-H '${escapeShell(`${name}: ${value}`)}'`)
    .join(" \\\n  ");

  const bodyPart =
    request.bodyText && method !== "GET" && method !== "HEAD"
      ? ` \\\n  --data-raw '${escapeShell(request.bodyText)}'`
      : "";

  return `curl -X ${method} '${escapeShell(request.url)}'${
    headerFlags ? ` \\\n  ${headerFlags}` : ""
  }${bodyPart}`;
};
