import type {
  ActionResult,
  NodeFailure,
  NodeId,
  RunContext,
} from "../types";
import type { ActionHandler } from "./actions";
import { describeFailure } from "../errors";

export type RetryOutcome =
  | { ok: true; attempts: number }
  | { ok: false; attempts: number; failure: NodeFailure };

/**
 * Runs a handler against one node with a bounded attempt budget. Each retry
 * re-runs the whole handler from the start. This is the only place that
 * decides whether a node failure is retried.
 */
export class RetryController {
  constructor(private context: RunContext) {}

  async run(node: NodeId, handler: ActionHandler): Promise<RetryOutcome> {
    const { logger, settings, transport, sleep } = this.context;
    const budget = settings.retry.attempts;
    let remaining = budget;
    let attempts = 0;

    for (;;) {
      attempts += 1;
      const result = await this.invoke(node, handler);
      if (result.ok) {
        return { ok: true, attempts };
      }

      remaining -= 1;
      logger.warn(
        `Work on node '${node}' failed. Number of retries left: ${remaining}. ${describeFailure(result.failure)}`,
      );

      if (remaining === 0) {
        logger.error(`Failed on node '${node}'. Exiting now.`);
        return { ok: false, attempts, failure: result.failure };
      }

      if (transport === "ssh") {
        await this.wipeShim(node);
      }
      if (settings.retry.backoffSeconds > 0) {
        await sleep(settings.retry.backoffSeconds);
      }
    }
  }

  private async invoke(
    node: NodeId,
    handler: ActionHandler,
  ): Promise<ActionResult> {
    try {
      return await handler(node, this.context);
    } catch (error) {
      this.context.logger.debug(`Handler for '${node}' threw`, error);
      return {
        ok: false,
        failure: {
          kind: "transport",
          node,
          message: error instanceof Error ? error.message : String(error),
        },
      };
    }
  }

  private async wipeShim(node: NodeId): Promise<void> {
    const { executor, logger } = this.context;
    logger.warn("Wiping salt-ssh shim before next retry");
    try {
      await executor.wipeShim(node);
    } catch (error) {
      logger.warn(`Shim wipe on '${node}' failed; retrying anyway`, error);
    }
  }
}
