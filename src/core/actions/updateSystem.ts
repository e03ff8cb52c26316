import type { ActionResult, NodeId, RunContext } from "../../types";
import { RunResultInterpreter, toNodeFailure } from "../RunResultInterpreter";
import { rebootHost } from "./rebootHost";

export async function updateSystem(
  node: NodeId,
  context: RunContext,
): Promise<ActionResult> {
  const { executor, logger, settings } = context;
  const interpreter = new RunResultInterpreter(logger);

  logger.info(`Updating all system packages on '${node}'.`);
  const result = await executor.applyState(node, {
    fun: "pkg.upgrade",
    kwargs: { refresh: settings.upgradeRefresh },
  });

  const interpretation = interpreter.interpret(node, result);
  if (interpretation.verdict !== "success") {
    return { ok: false, failure: toNodeFailure(node, interpretation) };
  }

  if (settings.rebootAfterUpgrade) {
    return rebootHost(node, context);
  }
  return { ok: true };
}
