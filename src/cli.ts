import { Command, Option } from "commander";
import { logLevelSchema, type SchemaConfig } from "./schema-config.js";

export type CliOptions = {
  config: string;
  port?: number;
  workers?: number;
  logLevel?: string;
};

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`Expected an integer, got ${value}`);
  }
  return parsed;
}

export function buildProgram(): Command {
  return new Command()
    .name("path-router")
    .description(
      "Routes requests by path prefix to an upstream or a static directory"
    )
    .option("--config <path>", "YAML configuration file", "proxy.config.yaml")
    .option("--port <number>", "override server.listen", parseInteger)
    .option("--workers <number>", "override server.workers", parseInteger)
    .addOption(
      new Option("--log-level <level>", "override server.log_level").choices(
        logLevelSchema.options
      )
    );
}

/**
 * Flags given on the command line win over the configuration file.
 */
export function applyCliOverrides(
  config: SchemaConfig,
  options: CliOptions
): SchemaConfig {
  const server = { ...config.server };
  if (options.port !== undefined) server.listen = options.port;
  if (options.workers !== undefined) server.workers = options.workers;
  if (options.logLevel !== undefined) {
    server.log_level = logLevelSchema.parse(options.logLevel);
  }
  return { ...config, server };
}
