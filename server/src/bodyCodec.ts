import type { BodyKind, BodyMode } from "./types.js";

export type DecodableKind = Exclude<BodyKind, "raw">;

/**
 * Decoded top-level fields in body order. JSON values are kept as their
 * source text so numbers and nested key order survive a rebuild; form values
 * are the decoded strings.
 */
export type BodyFields = Map<string, string>;

export const classifyBody = (mimeType: string | undefined, mode: BodyMode): BodyKind => {
  if (mode !== "auto") {
    return mode;
  }
  const type = (mimeType ?? "").toLowerCase();
  if (type.includes("json")) {
    return "json";
  }
  if (type.includes("x-www-form-urlencoded")) {
    return "form";
  }
  return "raw";
};

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === "object" && !Array.isArray(value);

const isWhitespace = (char: string | undefined): boolean =>
  char === " " || char === "\t" || char === "\n" || char === "\r";

/** Index just past the string literal opening at `start`. */
const skipString = (text: string, start: number): number => {
  let position = start + 1;
  while (position < text.length && text[position] !== '"') {
    position += text[position] === "\\" ? 2 : 1;
  }
  return position + 1;
};

/**
 * Splits the text of a JSON object into `[key, valueText]` pairs in source
 * order. The text must already be known to parse as an object.
 */
const splitJsonMembers = (text: string): BodyFields => {
  const members: BodyFields = new Map();
  let position = text.indexOf("{") + 1;
  const skipWhitespace = () => {
    while (isWhitespace(text[position])) position += 1;
  };

  skipWhitespace();
  while (position < text.length && text[position] !== "}") {
    const keyEnd = skipString(text, position);
    const key: unknown = JSON.parse(text.slice(position, keyEnd));
    position = keyEnd;
    skipWhitespace();
    position += 1; // ':'
    skipWhitespace();

    const valueStart = position;
    let depth = 0;
    while (position < text.length) {
      const char = text[position];
      if (char === '"') {
        position = skipString(text, position);
        continue;
      }
      if (char === "{" || char === "[") {
        depth += 1;
      } else if (char === "}" || char === "]") {
        if (depth === 0) break;
        depth -= 1;
      } else if (char === "," && depth === 0) {
        break;
      }
      position += 1;
    }
    members.set(String(key), text.slice(valueStart, position).trimEnd());

    if (text[position] === ",") {
      position += 1;
      skipWhitespace();
    }
  }
  return members;
};

export const decodeBody = (kind: BodyKind, text: string | undefined): BodyFields | undefined => {
  if (kind === "json") {
    if (!text) {
      return new Map();
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      return undefined;
    }
    return isPlainObject(parsed) ? splitJsonMembers(text) : undefined;
  }
  if (kind === "form") {
    const fields: BodyFields = new Map();
    new URLSearchParams(text ?? "").forEach((value, key) => {
      fields.set(key, value);
    });
    return fields;
  }
  return undefined;
};

/** The value a blanked field carries, in the body's own encoding. */
export const blankValue = (kind: DecodableKind): string => (kind === "json" ? '""' : "");

export const encodeBody = (kind: DecodableKind, fields: BodyFields): string => {
  if (kind === "json") {
    const members = [...fields].map(([key, value]) => `${JSON.stringify(key)}:${value}`);
    return `{${members.join(",")}}`;
  }
  const params = new URLSearchParams();
  for (const [key, value] of fields) {
    params.append(key, value);
  }
  return params.toString();
};

export const countBodyFields = (kind: BodyKind, text: string | undefined): number => {
  if (!text) {
    return 0;
  }
  return decodeBody(kind, text)?.size ?? 0;
};

export const isDecodable = (kind: BodyKind): kind is DecodableKind => kind !== "raw";
