import type { ActionResult, NodeId, RunContext } from "../../types";
import { RunResultInterpreter, toNodeFailure } from "../RunResultInterpreter";
import { restartService } from "./restartService";

export async function updateConfigs(
  node: NodeId,
  context: RunContext,
): Promise<ActionResult> {
  const { executor, logger, settings } = context;
  const interpreter = new RunResultInterpreter(logger);

  logger.info(`Updating configuration files on '${node}'`);
  const result = await executor.applyState(node, {
    fun: "state.sls",
    args: [settings.configState.sls],
    kwargs: { pillar: settings.configState.pillar },
  });

  const interpretation = interpreter.interpret(node, result);
  if (interpretation.verdict !== "success") {
    return { ok: false, failure: toNodeFailure(node, interpretation) };
  }

  // Not retried on its own: a failed restart fails this whole attempt
  return restartService(node, context);
}
