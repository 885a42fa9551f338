#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { pino } from "pino";
import yargs from "yargs";
import type { ArgumentsCamelCase, CommandModule } from "yargs";
import { hideBin } from "yargs/helpers";
import { loadConfig } from "./config.js";
import { getErrorMessage } from "./errors.js";
import { startServer } from "./index.js";
import { runMinimization } from "./runner.js";

const stringArg = (value: unknown): string | undefined =>
  typeof value === "string" && value.length > 0 ? value : undefined;

const numberArg = (value: unknown, fallback: number): number => {
  const parsed = typeof value === "number" ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const reportFailure = (error: unknown): void => {
  console.error(getErrorMessage(error));
  process.exitCode = 1;
};

export const minimizeCommand: CommandModule = {
  command: ["minimize", "$0"],
  describe: "Minimize the requests of a HAR file against their live endpoints.",
  builder: (yargs) =>
    yargs
      .option("config", {
        type: "string",
        default: "config.yaml",
        describe: "Path to the YAML configuration file",
      })
      .option("input-har", { type: "string", describe: "HAR file to read" })
      .option("output-har", { type: "string", describe: "Where to write the rewritten HAR" })
      .option("report", { type: "string", describe: "Where to write the JSON report" })
      .option("log-level", { type: "string", default: "info", describe: "pino log level" }),
  handler: async (argv: ArgumentsCamelCase) => {
    try {
      const config = await loadConfig(stringArg(argv["config"]) ?? "config.yaml", {
        inputHar: stringArg(argv["input-har"]),
        outputHar: stringArg(argv["output-har"]),
        reportPath: stringArg(argv["report"]),
      });
      const logger = pino({ level: stringArg(argv["log-level"]) ?? "info" });
      const summary = await runMinimization(config, { logger });
      logger.info(summary, `${summary.matched}/${summary.selected} requests matched the baseline`);
    } catch (error) {
      reportFailure(error);
    }
  },
};

export const serveCommand: CommandModule = {
  command: "serve",
  describe: "Start the minimization HTTP API.",
  builder: (yargs) =>
    yargs
      .option("config", {
        type: "string",
        default: "config.yaml",
        describe: "Path to the YAML configuration file",
      })
      .option("port", { type: "number", describe: "Port to listen on (default $PORT or 8787)" })
      .option("host", { type: "string", describe: "Interface to bind (default $HOST or 0.0.0.0)" }),
  handler: async (argv: ArgumentsCamelCase) => {
    try {
      const config = await loadConfig(stringArg(argv["config"]) ?? "config.yaml");
      await startServer({
        config,
        port: numberArg(argv["port"] ?? process.env.PORT, 8787),
        host: stringArg(argv["host"]) ?? process.env.HOST ?? "0.0.0.0",
      });
    } catch (error) {
      reportFailure(error);
    }
  },
};

export const runCli = async (args: string[]): Promise<void> => {
  await yargs(args)
    .scriptName("har-trim")
    .command(minimizeCommand)
    .command(serveCommand)
    .strict()
    .help()
    .parseAsync();
};

const invokedDirectly = (): boolean => {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
};

if (invokedDirectly()) {
  void runCli(hideBin(process.argv));
}
