import { randomUUID } from "node:crypto";
import Fastify from "fastify";
import type { FastifyServerOptions } from "fastify";
import { mergeConfigValues, resolveConfig } from "./config.js";
import { ConfigError, HarFormatError } from "./errors.js";
import { parseHar } from "./harLoader.js";
import { minimizeHar } from "./runner.js";
import { FileRunStore, InMemoryRunStore } from "./runStore.js";
import type { RunRecord, RunStore } from "./runStore.js";
import type { FetchImpl } from "./transport.js";
import type { TrimConfig } from "./types.js";

const MAX_BODY_SIZE_BYTES = 50 * 1024 * 1024;

interface BuildServerOptions {
  config: TrimConfig;
  runStore?: RunStore;
  fetchImpl?: FetchImpl;
  logger?: FastifyServerOptions["logger"];
}

interface MinimizeRequest {
  har?: unknown;
  maxTestsPerRequest?: unknown;
  filter?: unknown;
  scope?: unknown;
  comparator?: unknown;
  minimization?: unknown;
}

const createRunStore = (config: TrimConfig): RunStore =>
  config.server.storePath
    ? new FileRunStore(config.server.storePath, config.server.maxRuns)
    : new InMemoryRunStore(config.server.maxRuns);

export const buildServer = (options: BuildServerOptions) => {
  const app = Fastify({ logger: options.logger ?? true, bodyLimit: MAX_BODY_SIZE_BYTES });
  const runStore = options.runStore ?? createRunStore(options.config);

  app.get("/health", async () => ({
    status: "ok",
    runs: runStore.list().length,
  }));

  app.get("/api/runs", async () => ({
    items: runStore.list(),
  }));

  app.get<{ Params: { id: string } }>("/api/runs/:id", async (request, reply) => {
    const run = runStore.get(request.params.id);
    if (!run) {
      return reply.code(404).send({ error: "Run not found" });
    }
    return { item: run };
  });

  app.post<{ Body: MinimizeRequest }>("/api/minimize", async (request, reply) => {
    const payload = request.body;
    if (!payload?.har) {
      return reply.code(400).send({ error: "har is required" });
    }

    let config: TrimConfig;
    let loaded: ReturnType<typeof parseHar>;
    try {
      config = resolveConfig(
        mergeConfigValues(options.config, {
          maxTestsPerRequest: payload.maxTestsPerRequest,
          filter: payload.filter,
          scope: payload.scope,
          comparator: payload.comparator,
          minimization: payload.minimization,
        })
      );
      loaded = parseHar(payload.har);
    } catch (error) {
      if (error instanceof ConfigError || error instanceof HarFormatError) {
        return reply.code(400).send({ error: error.message });
      }
      throw error;
    }

    const result = await minimizeHar(loaded, config, {
      logger: request.log,
      fetchImpl: options.fetchImpl,
    });
    const run: RunRecord = {
      id: randomUUID(),
      createdAt: new Date().toISOString(),
      ...result,
    };
    runStore.add(run);
    return { item: run };
  });

  return app;
};

export const startServer = async (options: {
  config: TrimConfig;
  port: number;
  host: string;
}): Promise<ReturnType<typeof buildServer>> => {
  const app = buildServer({ config: options.config });
  try {
    await app.listen({ port: options.port, host: options.host });
  } catch (error) {
    app.log.error(error);
    await app.close();
    throw error;
  }
  return app;
};
