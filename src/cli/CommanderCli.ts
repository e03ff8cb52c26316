import { Command } from "commander";
import path from "path";
import { ACTION_KINDS } from "../types";
import { logger, logFileName, parseLogLevel } from "../utils/logger";
import {
  type CommandContext,
  CommandHandler,
  ListTargetsCommand,
  RollCommand,
  type RollCommandDeps,
} from "../commands";
import { parseRunOptions } from "./options";
import packageJson from "../../package.json";

export interface CommanderCliOptions extends RollCommandDeps {
  // Leave the log file out, e.g. under test
  logToFile?: boolean;
}

export class CommanderCli {
  private program: Command;
  private rollCommand: CommandHandler;
  private listCommand: CommandHandler;
  private logToFile: boolean;

  constructor(options: CommanderCliOptions = {}) {
    const { logToFile = true, ...deps } = options;
    this.program = new Command();
    this.rollCommand = new RollCommand(deps);
    this.listCommand = new ListTargetsCommand();
    this.logToFile = logToFile;
    this.setupProgram();
  }

  private setupProgram(): void {
    this.program
      .name("fleetroll")
      .description(
        "Perform rolling config updates, upgrades and reboots of a Salt-managed fleet, one node at a time. Must be run on the Salt master.",
      )
      .version(packageJson.version)
      .requiredOption(
        "-n, --targets <nodes>",
        "Comma-separated list of nodes to act upon, e.g. node-01.example.local,node-02.example.local",
      )
      .option(
        "-e, --exclude <nodes>",
        "Comma-separated list of nodes to leave out of the run",
      )
      .option(
        "-t, --test",
        "List the nodes the run would act upon, without doing anything",
      )
      .option("-s, --ssh", "Use salt-ssh instead of minions")
      .option(
        "-l, --log-level <level>",
        "Log level: error, warn, info or debug",
        "info",
      )
      .option(
        "-r, --reboot",
        "Reboot after a system upgrade (only applies to update-system)",
      )
      .requiredOption(
        "-a, --action <action>",
        `Action to perform: ${ACTION_KINDS.join(", ")}`,
      )
      .option("-c, --config <file>", "Config file", "fleetroll.yaml")
      .option("--log-dir <dir>", "Directory for the run's log file", ".")
      .action(async (_options, command: Command) => {
        await this.executeCommand(command);
      });
  }

  private async executeCommand(commandInstance: Command): Promise<void> {
    const options = parseRunOptions(commandInstance.opts());

    logger.setLevel(parseLogLevel(options.logLevel));
    logger.setTimestamp(true);
    if (this.logToFile) {
      logger.setFile(path.join(options.logDir, logFileName(new Date())));
    }

    const context: CommandContext = {
      options,
      configRequired:
        commandInstance.getOptionValueSource("config") !== "default",
      logger,
    };

    const handler = options.test ? this.listCommand : this.rollCommand;
    await handler.execute(context);
  }

  async parse(args: string[]): Promise<void> {
    await this.program.parseAsync(args);
  }

  getHelp(): string {
    return this.program.helpInformation();
  }
}
