import { CommandHandler, type CommandContext } from "./CommandHandler";
import { resolveTargets } from "../utils/targets";

export class ListTargetsCommand extends CommandHandler {
  async execute(context: CommandContext): Promise<void> {
    const { options, logger } = context;
    const targets = resolveTargets(options.targets, options.exclude);

    logger.info("Targeting the following nodes:");
    for (const node of targets) {
      logger.info(`  ${node}`);
    }
  }
}
