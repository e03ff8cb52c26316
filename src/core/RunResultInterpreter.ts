import type {
  CompiledResult,
  NodeFailure,
  NodeId,
  StateEntry,
  StateMapResult,
  StateRunResult,
} from "../types";
import type { Logger } from "../utils/logger";

export type Interpretation =
  | { verdict: "success"; lenient: boolean }
  | { verdict: "compileFailure"; payload: CompiledResult }
  | {
      verdict: "stateFailure";
      state: string;
      result: boolean | null | undefined;
      comment?: string;
      payload: StateMapResult;
    };

/**
 * A state fails when its `result` is present and not exactly `true`.
 * An absent `result` (change maps such as pkg.upgrade) is not a failure.
 */
export function isStateFailed(entry: StateEntry): boolean {
  return entry.result !== undefined && entry.result !== true;
}

/**
 * Target-level judgment of a state run: a compile failure, a nonzero
 * retcode, an empty state map or any failed state all count as failure.
 */
export function checkStateResult(result: StateRunResult): boolean {
  if (result.shape === "compiled") return false;
  if (result.retcode !== undefined && result.retcode !== 0) return false;

  const entries = Object.values(result.states);
  if (entries.length === 0) return false;
  return entries.every((entry) => !isStateFailed(entry));
}

export class RunResultInterpreter {
  constructor(private logger: Logger) {}

  interpret(node: NodeId, result: StateRunResult): Interpretation {
    this.logger.debug(`Checking return data from '${node}'`, result);

    if (checkStateResult(result)) {
      return { verdict: "success", lenient: false };
    }

    if (result.shape === "compiled") {
      this.logger.error(
        `State run on '${node}' failed to compile. Full output follows.`,
      );
      this.logger.error(result.errors.join("\n"));
      return { verdict: "compileFailure", payload: result };
    }

    // Object key order is insertion order, so the first failed state in the
    // payload is the one reported.
    for (const [state, entry] of Object.entries(result.states)) {
      if (isStateFailed(entry)) {
        this.logger.error(
          `State '${state}' on '${node}' failed with a status of '${String(entry.result)}'.`,
        );
        this.logger.error(`Comment from failed state is: ${entry.comment ?? ""}`);
        this.logger.debug("The entire return value is:", result);
        return {
          verdict: "stateFailure",
          state,
          result: entry.result,
          comment: entry.comment,
          payload: result,
        };
      }
    }

    // The aggregate check disagrees with the per-state scan. This is accepted
    // as success; the payload is dumped so the run can be investigated.
    this.logger.warn(
      `State checker reported a failed run on '${node}' but no failed state was found.`,
    );
    this.logger.warn("Continuing. Full return data follows.", result);
    return { verdict: "success", lenient: true };
  }
}

export function toNodeFailure(
  node: NodeId,
  interpretation: Exclude<Interpretation, { verdict: "success" }>,
): NodeFailure {
  if (interpretation.verdict === "compileFailure") {
    return { kind: "compile", node, errors: interpretation.payload.errors };
  }
  return {
    kind: "state",
    node,
    state: interpretation.state,
    result: interpretation.result,
    comment: interpretation.comment,
  };
}
