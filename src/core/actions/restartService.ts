import type { ActionResult, NodeId, RunContext } from "../../types";

/**
 * Restarts the managed service and confirms it is running. Carries its own
 * small retry loop, nested inside the node-level retry budget.
 */
export async function restartService(
  node: NodeId,
  context: RunContext,
): Promise<ActionResult> {
  const { executor, logger, settings, sleep } = context;
  const service = settings.serviceName;
  const { attempts, settleSeconds, backoffSeconds } = settings.restart;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    logger.info(`Restarting ${service} on '${node}'`);
    await executor.dispatch(node, { fun: "service.restart", args: [service] });

    await sleep(settleSeconds);
    const status = await executor.checkBoolean(node, {
      fun: "service.status",
      args: [service],
    });

    if (status.value) {
      logger.info(`${service} is running on '${node}'`);
      return { ok: true };
    }

    const left = attempts - attempt;
    if (left > 0) {
      logger.warn(
        `Failed to restart ${service} on '${node}'. Number of retries left: ${left}`,
      );
      await sleep(backoffSeconds);
    }
  }

  return {
    ok: false,
    failure: {
      kind: "booleanCheck",
      node,
      check: `service.status ${service}`,
      attempts,
    },
  };
}
