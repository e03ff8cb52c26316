import type {
  BooleanResult,
  NodeId,
  StateRunResult,
  StatusResult,
  TransportMode,
} from "../types";

export interface RemoteCall {
  fun: string;
  args?: string[];
  kwargs?: Record<string, unknown>;
}

/**
 * Ships one remote operation to one or more nodes. The caller picks the
 * method for the result shape it expects; implementations never infer the
 * shape from what came back.
 */
export interface Executor {
  readonly transport: TransportMode;

  applyState(node: NodeId, call: RemoteCall): Promise<StateRunResult>;
  checkBoolean(node: NodeId, call: RemoteCall): Promise<BooleanResult>;
  queryStatus(node: NodeId, call: RemoteCall): Promise<StatusResult>;

  /** One liveness probe addressed to every node at once. */
  ping(nodes: NodeId[]): Promise<Map<NodeId, boolean>>;

  /** Fire and forget; the return payload is discarded. */
  dispatch(node: NodeId, call: RemoteCall): Promise<void>;

  /** Reset transport-local state on a node (shim transport only). */
  wipeShim(node: NodeId): Promise<void>;
}
