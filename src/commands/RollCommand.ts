import { CommandHandler, type CommandContext } from "./CommandHandler";
import type { Executor } from "../core/Executor";
import { Orchestrator } from "../core/Orchestrator";
import { createContext } from "../core/createContext";
import { loadConfig } from "../config";
import { resolveTargets } from "../utils/targets";
import { formatDuration } from "../utils/formatDuration";
import {
  ConnectivityError,
  InsufficientPrivilegeError,
  NoTargetsError,
  RetryExhaustedError,
} from "../errors";

export interface RollCommandDeps {
  isPrivileged?: () => boolean;
  executor?: Executor;
  sleep?: (seconds: number) => Promise<void>;
  now?: () => number;
}

const runningAsRoot = (): boolean => process.getuid?.() === 0;

export class RollCommand extends CommandHandler {
  constructor(private deps: RollCommandDeps = {}) {
    super();
  }

  async execute(context: CommandContext): Promise<void> {
    const { options, logger, configRequired } = context;

    const isPrivileged = this.deps.isPrivileged ?? runningAsRoot;
    if (!isPrivileged()) {
      throw new InsufficientPrivilegeError();
    }

    const config = loadConfig(options.config, { required: configRequired });
    const targets = resolveTargets(options.targets, options.exclude);
    if (targets.length === 0) {
      throw new NoTargetsError();
    }

    const runContext = createContext({
      config,
      transport: options.ssh ? "ssh" : "minion",
      logger,
      rebootAfterUpgrade: options.reboot,
      executor: this.deps.executor,
      sleep: this.deps.sleep,
      now: this.deps.now,
    });

    const outcome = await new Orchestrator(runContext).run(
      targets,
      options.action,
    );

    if (outcome.status === "succeeded") {
      logger.success(
        `Finished. Total time in hh:mm:ss is ${formatDuration(outcome.elapsedSeconds)}`,
      );
      return;
    }

    if (outcome.reason === "connectivity") {
      throw new ConnectivityError(outcome.unreachable);
    }
    throw new RetryExhaustedError(
      outcome.node,
      outcome.attempts,
      outcome.failure,
    );
  }
}
