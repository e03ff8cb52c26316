import type { Executor } from "./Executor";
import type { NodeId } from "../types";
import { NoTargetsError } from "../errors";

export type ConnectivityResult =
  | { ok: true }
  | { ok: false; unreachable: Set<NodeId> };

export class ConnectivityChecker {
  constructor(private executor: Executor) {}

  /**
   * Pings every node in one call. Nodes missing from the reply count as
   * unreachable.
   */
  async check(nodes: NodeId[]): Promise<ConnectivityResult> {
    if (nodes.length === 0) {
      throw new NoTargetsError();
    }

    const replies = await this.executor.ping(nodes);
    const unreachable = new Set<NodeId>();
    for (const node of nodes) {
      if (replies.get(node) !== true) {
        unreachable.add(node);
      }
    }

    return unreachable.size === 0 ? { ok: true } : { ok: false, unreachable };
  }
}
