import type { RunOptions } from "../cli/options";
import type { Logger } from "../utils/logger";

export interface CommandContext {
  options: RunOptions;
  // true when --config was given rather than defaulted
  configRequired: boolean;
  logger: Logger;
}

export abstract class CommandHandler {
  abstract execute(context: CommandContext): Promise<void>;
}
