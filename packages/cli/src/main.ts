#!/usr/bin/env -S node --import tsx

/**
 * rowsift CLI entry point.
 *
 * Wires together the rules engine, the CSV collaborator and the logger
 * into a single binary. Exit status is 0 for a completed run (even with
 * zero matches) and 1 for argument, rule loading or I/O failures.
 */

import { createLogger } from "@rowsift/logger";

import { getHelp, isError, parseArgs } from "./args.js";
import type { CheckArgs, ExtractArgs } from "./args.js";
import { runCheck } from "./check.js";
import { resolveRunConfig } from "./config.js";
import { dispatchCommand, withDiagnostics } from "./dispatch.js";
import { runExtract } from "./run.js";

const VERSION = "0.1.0";

async function extractCommand(args: ExtractArgs): Promise<number> {
  const config = resolveRunConfig(args);
  if (isError(config)) {
    console.error(config.error);
    return 1;
  }

  const logger = createLogger({ verbosity: config.verbosity });
  return withDiagnostics(logger, async () => {
    await runExtract(config, logger);
    return 0;
  });
}

async function checkCommand(args: CheckArgs): Promise<number> {
  return withDiagnostics(createLogger(), () => runCheck(args));
}

async function main(): Promise<number> {
  const result = parseArgs(process.argv);

  if (isError(result)) {
    console.error(result.error);
    return 1;
  }

  return dispatchCommand(result, {
    runExtract: extractCommand,
    runCheck: checkCommand,
    showHelp: (topic) => {
      console.log(getHelp(topic));
      return 0;
    },
    showVersion: () => {
      console.log(`rowsift v${VERSION}`);
      return 0;
    },
  });
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("Fatal:", err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
