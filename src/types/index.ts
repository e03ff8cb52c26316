export type NodeId = string;

export const ACTION_KINDS = [
  "update-configuration",
  "update-system",
  "reboot-host",
] as const;

export type ActionKind = (typeof ACTION_KINDS)[number];

export type TransportMode = "minion" | "ssh";

// A single state entry from a state run. `result` may be null (test mode)
// or missing (e.g. pkg.upgrade change maps), neither of which is a failure.
export interface StateEntry {
  result?: boolean | null;
  comment?: string;
  [key: string]: unknown;
}

export interface CompiledResult {
  shape: "compiled";
  errors: string[];
  retcode?: number;
}

export interface StateMapResult {
  shape: "stateMap";
  states: Record<string, StateEntry>;
  retcode?: number;
}

export interface BooleanResult {
  shape: "boolean";
  value: boolean;
}

export type StatusResult =
  | { shape: "status"; responded: false; retcode?: number }
  | { shape: "status"; responded: true; uptimeSeconds: number };

export type StateRunResult = CompiledResult | StateMapResult;

export type RunResult = StateRunResult | BooleanResult | StatusResult;

export type NodeFailure =
  | { kind: "compile"; node: NodeId; errors: string[] }
  | {
      kind: "state";
      node: NodeId;
      state: string;
      result: boolean | null | undefined;
      comment?: string;
    }
  | { kind: "booleanCheck"; node: NodeId; check: string; attempts: number }
  | {
      kind: "rebootTimeout";
      node: NodeId;
      waitedSeconds: number;
      polls: number;
    }
  | { kind: "noData"; node: NodeId; operation: string }
  | { kind: "transport"; node: NodeId; message: string };

export type ActionResult = { ok: true } | { ok: false; failure: NodeFailure };

export interface NodeReport {
  node: NodeId;
  attempts: number;
}

export type FleetOutcome =
  | {
      status: "succeeded";
      action: ActionKind;
      nodes: NodeReport[];
      elapsedSeconds: number;
    }
  | {
      status: "halted";
      reason: "connectivity";
      unreachable: NodeId[];
    }
  | {
      status: "halted";
      reason: "retryExhausted";
      node: NodeId;
      attempts: number;
      failure: NodeFailure;
      completed: NodeReport[];
    };

export * from "./Context";
