import { describeError } from "@rowsift/core";
import type { Logger } from "@rowsift/logger";

import type { CheckArgs, ExtractArgs, ParsedArgs } from "./args.js";

interface CommandHandlers {
  runExtract: (args: ExtractArgs) => Promise<number>;
  runCheck: (args: CheckArgs) => Promise<number>;
  showHelp: (topic: string | null) => number;
  showVersion: () => number;
}

export async function dispatchCommand(
  result: ParsedArgs,
  handlers: CommandHandlers,
): Promise<number> {
  switch (result.command) {
    case "extract":
      return handlers.runExtract(result);
    case "check":
      return handlers.runCheck(result);
    case "help":
      return handlers.showHelp(result.topic);
    case "version":
      return handlers.showVersion();
  }
}

/**
 * Run a command body, turning any thrown error into a logged diagnostic
 * and exit code 1.
 */
export async function withDiagnostics(
  logger: Logger,
  task: () => Promise<number>,
): Promise<number> {
  try {
    return await task();
  } catch (err: unknown) {
    logger.error(describeError(err));
    return 1;
  }
}
