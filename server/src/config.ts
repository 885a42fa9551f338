import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { compilePatterns } from "./comparator.js";
import { ConfigError } from "./errors.js";
import type { TrimConfig } from "./types.js";

const stringList = z.array(z.string()).default([]);

const phaseSchema = z.enum(["headers", "body"]);

const configSchema = z.object({
  inputHar: z.string().default("input.har"),
  outputHar: z.string().default("output/minimized.har"),
  reportPath: z.string().default("output/report.json"),
  maxTestsPerRequest: z.number().int().min(0).default(200),
  concurrency: z.number().int().min(1).default(1),
  client: z
    .object({
      timeoutMs: z.number().positive().default(15_000),
      verifyTls: z.boolean().default(true),
      proxy: z.string().url().nullable().default(null),
      rateLimit: z
        .object({
          requestsPerSecond: z.number().min(0).nullable().default(5),
        })
        .default({}),
    })
    .default({}),
  filter: z
    .object({
      methods: stringList,
      hosts: stringList,
      urlPatterns: stringList,
      indexRange: z.tuple([z.number().int(), z.number().int()]).nullable().default(null),
    })
    .default({}),
  scope: z
    .object({
      includeUrls: stringList,
      includePatterns: stringList,
    })
    .default({}),
  comparator: z
    .object({
      statusCode: z.boolean().default(true),
      lengthCheck: z.boolean().default(true),
      lengthTolerance: z.number().min(0).default(0.1),
      needAll: stringList,
      needAny: stringList,
      patterns: stringList,
      logic: z.preprocess(
        (value) => (typeof value === "string" ? value.toUpperCase() : value),
        z.enum(["AND", "OR"]).default("AND")
      ),
    })
    .default({}),
  minimization: z
    .object({
      order: z
        .tuple([phaseSchema, phaseSchema])
        .default(["headers", "body"])
        .refine(([first, second]) => first !== second, {
          message: "order must list headers and body once each",
        }),
      headers: z
        .object({
          enabled: z.boolean().default(true),
          protected: stringList,
          ignore: stringList,
          allowPatterns: stringList,
        })
        .default({}),
      body: z
        .object({
          enabled: z.boolean().default(true),
          mode: z.enum(["auto", "json", "form"]).default("auto"),
          protectedKeys: stringList,
          onlyKeys: stringList,
          removedFields: z.enum(["omit", "blank"]).default("blank"),
          tryBlankValues: z.boolean().default(false),
        })
        .default({}),
    })
    .default({}),
  report: z
    .object({
      redact: z.boolean().default(false),
      includeMetadata: z.boolean().default(true),
      snippets: z.boolean().default(true),
    })
    .default({}),
  server: z
    .object({
      storePath: z.string().nullable().default(null),
      maxRuns: z.number().int().positive().default(50),
    })
    .default({}),
});

export type ConfigOverrides = Partial<Pick<TrimConfig, "inputHar" | "outputHar" | "reportPath">>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === "object" && !Array.isArray(value);

/** Merges plain objects key by key; arrays and scalars in `patch` replace. */
export const mergeConfigValues = (base: unknown, patch: unknown): unknown => {
  if (!isRecord(base) || !isRecord(patch)) {
    return patch === undefined ? base : patch;
  }
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    merged[key] = mergeConfigValues(base[key], value);
  }
  return merged;
};

export const resolveConfig = (raw: unknown): TrimConfig => {
  const parsed = configSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  const config = parsed.data;
  compilePatterns(config.filter.urlPatterns, "");
  compilePatterns(config.scope.includePatterns, "");
  compilePatterns(config.comparator.patterns, "m");
  compilePatterns(config.minimization.headers.allowPatterns, "i");
  return config;
};

export const defaultConfig = (): TrimConfig => resolveConfig({});

export const loadConfig = async (
  path: string,
  overrides: ConfigOverrides = {}
): Promise<TrimConfig> => {
  let raw: unknown = {};
  if (existsSync(path)) {
    let text: string;
    try {
      text = await readFile(path, "utf8");
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Cannot read config ${path}: ${reason}`);
    }
    try {
      raw = parseYaml(text) ?? {};
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Config ${path} is not valid YAML: ${reason}`);
    }
    if (!isRecord(raw)) {
      throw new ConfigError(`Config ${path} must be a mapping of settings`);
    }
  }
  return resolveConfig(mergeConfigValues(raw, overrides));
};
