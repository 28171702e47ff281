#!/usr/bin/env node
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { createCliServices, createProgram } from "./register-cli.js";
import { formatErrorMessage } from "./retry.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ verbose: config.diagnostics.verbose });

  const program = createProgram({
    config,
    logger,
    services: createCliServices(config, logger),
    out: (text) => {
      process.stdout.write(text.endsWith("\n") ? text : `${text}\n`);
    },
    setExitCode: (code) => {
      process.exitCode = code;
    },
  });

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(formatErrorMessage(error));
  process.exit(1);
});
