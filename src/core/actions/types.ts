import type { ActionResult, NodeId, RunContext } from "../../types";

export type ActionHandler = (
  node: NodeId,
  context: RunContext,
) => Promise<ActionResult>;
