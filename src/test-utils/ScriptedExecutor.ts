import type { Executor, RemoteCall } from "../core/Executor";
import type {
  BooleanResult,
  NodeId,
  StateRunResult,
  StatusResult,
  TransportMode,
} from "../types";

export interface RecordedCall {
  method:
    | "applyState"
    | "checkBoolean"
    | "queryStatus"
    | "ping"
    | "dispatch"
    | "wipeShim";
  node: NodeId | NodeId[];
  call?: RemoteCall;
}

// null stands for a probe that got no answer
export type UptimeSample = number | null;

/**
 * In-process Executor whose replies are queued up front by the test.
 * Running out of queued replies throws, which surfaces as a test failure.
 */
export class ScriptedExecutor implements Executor {
  readonly calls: RecordedCall[] = [];
  private stateResults: Array<StateRunResult | Error> = [];
  private booleans: boolean[] = [];
  private uptimes: UptimeSample[] = [];
  private pingReplies = new Map<NodeId, boolean>();
  private pingAll = true;

  constructor(readonly transport: TransportMode = "minion") {}

  queueState(...results: Array<StateRunResult | Error>): this {
    this.stateResults.push(...results);
    return this;
  }

  queueBoolean(...values: boolean[]): this {
    this.booleans.push(...values);
    return this;
  }

  queueUptime(...samples: UptimeSample[]): this {
    this.uptimes.push(...samples);
    return this;
  }

  // Nodes not listed answer true
  setPing(replies: Record<NodeId, boolean>): this {
    for (const [node, up] of Object.entries(replies)) {
      this.pingReplies.set(node, up);
    }
    return this;
  }

  dropFromPing(): this {
    this.pingAll = false;
    return this;
  }

  callsTo(method: RecordedCall["method"]): RecordedCall[] {
    return this.calls.filter((c) => c.method === method);
  }

  async applyState(node: NodeId, call: RemoteCall): Promise<StateRunResult> {
    this.calls.push({ method: "applyState", node, call });
    const next = this.stateResults.shift();
    if (next === undefined) {
      throw new Error(`No scripted state result left for ${call.fun}`);
    }
    if (next instanceof Error) throw next;
    return next;
  }

  async checkBoolean(node: NodeId, call: RemoteCall): Promise<BooleanResult> {
    this.calls.push({ method: "checkBoolean", node, call });
    const next = this.booleans.shift();
    if (next === undefined) {
      throw new Error(`No scripted boolean left for ${call.fun}`);
    }
    return { shape: "boolean", value: next };
  }

  async queryStatus(node: NodeId, call: RemoteCall): Promise<StatusResult> {
    this.calls.push({ method: "queryStatus", node, call });
    if (this.uptimes.length === 0) {
      throw new Error(`No scripted uptime left for ${call.fun}`);
    }
    const next = this.uptimes.shift();
    if (next === null || next === undefined) {
      return { shape: "status", responded: false };
    }
    return { shape: "status", responded: true, uptimeSeconds: next };
  }

  async ping(nodes: NodeId[]): Promise<Map<NodeId, boolean>> {
    this.calls.push({ method: "ping", node: [...nodes] });
    const replies = new Map<NodeId, boolean>();
    for (const node of nodes) {
      const scripted = this.pingReplies.get(node);
      if (scripted !== undefined) {
        replies.set(node, scripted);
      } else if (this.pingAll) {
        replies.set(node, true);
      }
    }
    return replies;
  }

  async dispatch(node: NodeId, call: RemoteCall): Promise<void> {
    this.calls.push({ method: "dispatch", node, call });
  }

  async wipeShim(node: NodeId): Promise<void> {
    this.calls.push({ method: "wipeShim", node });
  }
}

export function stateMap(
  states: Record<string, { result?: boolean | null; comment?: string }>,
  retcode?: number,
): StateRunResult {
  return { shape: "stateMap", states, retcode };
}

export function compiled(...errors: string[]): StateRunResult {
  return { shape: "compiled", errors };
}
