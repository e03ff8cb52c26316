import type {
  ActionKind,
  FleetOutcome,
  NodeId,
  NodeReport,
  RunContext,
} from "../types";
import { ConnectivityChecker } from "./ConnectivityChecker";
import { RetryController } from "./RetryController";
import { handlerFor } from "./actions";

/**
 * Drives one fleet run: a connectivity gate over every node, then each node
 * in the order given. The first node to exhaust its retry budget halts the
 * run; nodes after it are never touched.
 */
export class Orchestrator {
  private checker: ConnectivityChecker;
  private retries: RetryController;

  constructor(private context: RunContext) {
    this.checker = new ConnectivityChecker(context.executor);
    this.retries = new RetryController(context);
  }

  async run(nodes: NodeId[], action: ActionKind): Promise<FleetOutcome> {
    const { logger, now } = this.context;
    const startedAt = now();

    logger.info("Pinging all nodes to confirm connectivity");
    const connectivity = await this.checker.check(nodes);
    if (!connectivity.ok) {
      const unreachable = nodes.filter((n) => connectivity.unreachable.has(n));
      logger.error(
        "Not all nodes responded to pings. Halting execution. Following are the nodes that did not respond.",
      );
      for (const node of unreachable) {
        logger.error(`- ${node}`);
      }
      logger.error("Please fix the issue or exclude the problem nodes.");
      return { status: "halted", reason: "connectivity", unreachable };
    }
    logger.info("All nodes responded to ping. Continuing.");

    const handler = handlerFor(action);
    const completed: NodeReport[] = [];

    for (const node of nodes) {
      logger.info(`Beginning work on ${node}`);
      const outcome = await this.retries.run(node, handler);

      if (!outcome.ok) {
        return {
          status: "halted",
          reason: "retryExhausted",
          node,
          attempts: outcome.attempts,
          failure: outcome.failure,
          completed,
        };
      }

      completed.push({ node, attempts: outcome.attempts });
      logger.success(`Finished work on ${node}`);
    }

    return {
      status: "succeeded",
      action,
      nodes: completed,
      elapsedSeconds: Math.round((now() - startedAt) / 1000),
    };
  }
}
