import type { NodeId } from "../types";

export function parseNodeList(value?: string): NodeId[] {
  if (!value) return [];
  return value
    .split(",")
    .map((n) => n.trim())
    .filter((n) => n.length > 0);
}

/**
 * Drops excluded nodes and repeats, keeping the operator's order.
 */
export function resolveTargets(targets: NodeId[], exclude: NodeId[]): NodeId[] {
  const excluded = new Set(exclude);
  const seen = new Set<NodeId>();
  const result: NodeId[] = [];
  for (const node of targets) {
    if (excluded.has(node) || seen.has(node)) continue;
    seen.add(node);
    result.push(node);
  }
  return result;
}
