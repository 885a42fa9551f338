import { classifyBody, decodeBody, encodeBody } from "./bodyCodec.js";
import type { BodyFields } from "./bodyCodec.js";
import type { HeaderEntry } from "./types.js";

export const REDACTION_TOKEN = "[REDACTED]";

const sensitiveHeaderPatterns = [
  /authorization/i,
  /cookie/i,
  /token/i,
  /api[-_]?key/i,
  /secret/i,
];

const sensitiveFieldPattern =
  /(token|secret|password|authorization|api[-_]?key|session|cookie)/i;

export const redactHeaderEntries = (headers: readonly HeaderEntry[]): HeaderEntry[] =>
  headers.map((header) => ({
    name: header.name,
    value: sensitiveHeaderPatterns.some((pattern) => pattern.test(header.name))
      ? REDACTION_TOKEN
      : header.value,
  }));

const redactJsonValue = (value: unknown, parentKey: string): unknown => {
  if (Array.isArray(value)) {
    return value.map((item) => redactJsonValue(item, parentKey));
  }
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([key, nested]) => [
        key,
        sensitiveFieldPattern.test(key) || sensitiveFieldPattern.test(parentKey)
          ? REDACTION_TOKEN
          : redactJsonValue(nested, key),
      ])
    );
  }
  if (typeof value === "string" && sensitiveFieldPattern.test(parentKey)) {
    return REDACTION_TOKEN;
  }
  return value;
};

const redactText = (body: string): string =>
  body
    .replace(/(bearer\s+)[^\s"'&]+/gi, `$1${REDACTION_TOKEN}`)
    .replace(
      /(["']?(token|secret|password|api[_-]?key)["']?\s*[:=]\s*["'])[^"']*(["'])/gi,
      `$1${REDACTION_TOKEN}$3`
    );

/**
 * Masks sensitive fields of a JSON or form body at any depth, keeping the
 * encoding of the input. Anything else gets a best-effort text scrub.
 */
export const redactBody = (
  body: string | undefined,
  mimeType: string | undefined
): string | undefined => {
  if (!body) {
    return body;
  }
  const kind = classifyBody(mimeType, "auto");
  const fields = decodeBody(kind, body);
  if (kind === "raw" || !fields) {
    return redactText(body);
  }
  const masked: BodyFields = new Map();
  for (const [key, value] of fields) {
    if (sensitiveFieldPattern.test(key)) {
      masked.set(key, kind === "json" ? JSON.stringify(REDACTION_TOKEN) : REDACTION_TOKEN);
    } else if (kind === "json" && (value.startsWith("{") || value.startsWith("["))) {
      masked.set(key, JSON.stringify(redactJsonValue(JSON.parse(value), key)));
    } else {
      masked.set(key, value);
    }
  }
  return encodeBody(kind, masked);
};
