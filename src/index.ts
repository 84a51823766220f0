#!/usr/bin/env node
import { applyCliOverrides, buildProgram, type CliOptions } from "./cli.js";
import { loadConfigFile } from "./config.js";
import { Logger } from "./logger.js";
import { createCustomServer } from "./server.js";

async function main() {
  const program = buildProgram();
  program.parse();

  const options = program.opts<CliOptions>();
  const config = applyCliOverrides(
    await loadConfigFile(options.config),
    options
  );

  const logger = new Logger(config.server.log_level);
  logger.debug(`Loaded configuration from ${options.config}`);

  await createCustomServer({
    port: config.server.listen,
    workers: config.server.workers ?? 1,
    config,
    logger,
  });
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Fatal startup error: ${message}`);
  process.exit(1);
});
