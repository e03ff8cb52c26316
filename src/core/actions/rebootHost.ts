import type { NodeFailure, NodeId, RunContext } from "../../types";
import type { RemoteCall } from "../Executor";

export type RebootResult =
  | { ok: true; polls: number }
  | { ok: false; failure: NodeFailure };

const UPTIME: RemoteCall = { fun: "status.uptime" };

/**
 * Reboots a node and waits until it reports an uptime below the one
 * sampled before the reboot. Every poll consumes one period of the
 * timeout, whether or not the node answered.
 */
export async function rebootHost(
  node: NodeId,
  context: RunContext,
): Promise<RebootResult> {
  const { executor, logger, sleep } = context;
  const { timeoutSeconds, periodSeconds } = context.settings.reboot;

  logger.info(`Restarting host '${node}'.`);

  const before = await executor.queryStatus(node, UPTIME);
  if (!before.responded) {
    logger.error(`Could not read uptime from '${node}' before rebooting.`);
    return {
      ok: false,
      failure: { kind: "noData", node, operation: UPTIME.fun },
    };
  }
  const baseline = before.uptimeSeconds;
  logger.debug(`Uptime on '${node}' before reboot: ${baseline}s`);

  await executor.dispatch(node, { fun: "system.reboot" });

  let remaining = timeoutSeconds;
  let polls = 0;
  while (remaining > 0) {
    logger.info(`Pinging host '${node}' for connectivity.`);
    const probe = await executor.queryStatus(node, UPTIME);
    polls += 1;

    if (!probe.responded) {
      logger.info(
        `No response from host '${node}'. ${remaining} seconds before giving up.`,
      );
    } else if (probe.uptimeSeconds < baseline) {
      logger.success(`Host '${node}' has completed rebooting`);
      return { ok: true, polls };
    } else {
      logger.info(`Waiting for host '${node}' to begin rebooting`);
    }

    remaining -= periodSeconds;
    if (remaining > 0) {
      await sleep(periodSeconds);
    }
  }

  logger.error(`Timed out waiting for host '${node}' to come back. Failing.`);
  return {
    ok: false,
    failure: {
      kind: "rebootTimeout",
      node,
      waitedSeconds: timeoutSeconds,
      polls,
    },
  };
}
