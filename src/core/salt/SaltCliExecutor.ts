import type { Executor, RemoteCall } from "../Executor";
import type {
  BooleanResult,
  NodeId,
  StateRunResult,
  StatusResult,
  TransportMode,
} from "../../types";
import type { Logger } from "../../utils/logger";
import { SaltCommandError } from "../../errors";
import { runSalt, type SaltRunner } from "./runSalt";
import {
  CompileErrorsSchema,
  EnvelopeSchema,
  type SaltOutput,
  SaltOutputSchema,
  StateMapSchema,
  UptimeSchema,
} from "./schemas";

export interface SaltCliExecutorOptions {
  logger: Logger;
  configDir?: string;
  runner?: SaltRunner;
}

interface Unwrapped {
  ret: unknown;
  retcode?: number;
}

/**
 * Executor backed by the `salt` CLI (direct push to minions) or `salt-ssh`
 * (shim transport). All output is requested as static JSON.
 */
export class SaltCliExecutor implements Executor {
  readonly transport: TransportMode;
  private logger: Logger;
  private configDir?: string;
  private runner: SaltRunner;

  constructor(transport: TransportMode, options: SaltCliExecutorOptions) {
    this.transport = transport;
    this.logger = options.logger;
    this.configDir = options.configDir;
    this.runner = options.runner ?? runSalt;
  }

  private get binary(): string {
    return this.transport === "ssh" ? "salt-ssh" : "salt";
  }

  static formatCall(call: RemoteCall): string[] {
    const kwargs = Object.entries(call.kwargs ?? {}).map(
      ([key, value]) =>
        `${key}=${typeof value === "string" ? value : JSON.stringify(value)}`,
    );
    return [call.fun, ...(call.args ?? []), ...kwargs];
  }

  private baseArgs(): string[] {
    const args = this.configDir ? ["-c", this.configDir] : [];
    return [...args, "--out=json", "--static"];
  }

  // Unreachable targets can leave stdout empty; probes read that as silence
  private async invoke(
    extraArgs: string[],
    { allowEmpty = false }: { allowEmpty?: boolean } = {},
  ): Promise<{ output: SaltOutput; code: number | null }> {
    const args = [...this.baseArgs(), ...extraArgs];
    const command = `${this.binary} ${args.join(" ")}`;
    this.logger.debug(`Running: ${command}`);

    const { code, stdout, stderr } = await this.runner(this.binary, args);
    if (!stdout) {
      if (allowEmpty) return { output: {}, code };
      throw new SaltCommandError(command, stderr || `exit code ${code}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(stdout);
    } catch {
      throw new SaltCommandError(
        command,
        stderr,
        `Unparseable output from ${command}`,
      );
    }

    const result = SaltOutputSchema.safeParse(parsed);
    if (!result.success) {
      throw new SaltCommandError(
        command,
        stderr,
        `Unexpected output shape from ${command}`,
      );
    }
    return { output: result.data, code };
  }

  private unwrap(value: unknown): Unwrapped {
    const envelope = EnvelopeSchema.safeParse(value);
    if (envelope.success) {
      return {
        ret: envelope.data.return ?? envelope.data.ret,
        retcode: envelope.data.retcode,
      };
    }
    return { ret: value };
  }

  async applyState(node: NodeId, call: RemoteCall): Promise<StateRunResult> {
    const extra = [node, ...SaltCliExecutor.formatCall(call)];
    if (this.transport === "minion") {
      extra.unshift("--retcode-passthrough");
    }
    const { output, code } = await this.invoke(extra);

    if (!(node in output) || output[node] === null) {
      throw new SaltCommandError(
        `${call.fun} on ${node}`,
        undefined,
        `The salt call ${call.fun} on '${node}' returned no data`,
      );
    }

    const { ret, retcode } = this.unwrap(output[node]);
    const effectiveRetcode = retcode ?? code ?? undefined;

    const compiled = CompileErrorsSchema.safeParse(ret);
    if (compiled.success) {
      return {
        shape: "compiled",
        errors: compiled.data,
        retcode: effectiveRetcode,
      };
    }

    const states = StateMapSchema.safeParse(ret);
    if (states.success) {
      return {
        shape: "stateMap",
        states: states.data,
        retcode: effectiveRetcode,
      };
    }

    throw new SaltCommandError(
      `${call.fun} on ${node}`,
      typeof ret === "string" ? ret : JSON.stringify(ret),
    );
  }

  async checkBoolean(node: NodeId, call: RemoteCall): Promise<BooleanResult> {
    const { output } = await this.invoke([
      node,
      ...SaltCliExecutor.formatCall(call),
    ]);
    const { ret } = this.unwrap(output[node]);
    return { shape: "boolean", value: ret === true };
  }

  // A node in the middle of a reboot can make salt print anything; such a
  // probe reads as silence
  async queryStatus(node: NodeId, call: RemoteCall): Promise<StatusResult> {
    let output: SaltOutput;
    try {
      ({ output } = await this.invoke(
        [node, ...SaltCliExecutor.formatCall(call)],
        { allowEmpty: true },
      ));
    } catch (error) {
      if (!(error instanceof SaltCommandError)) throw error;
      this.logger.debug(`${call.fun} on '${node}' gave no usable output`, error);
      return { shape: "status", responded: false };
    }
    const { ret, retcode } = this.unwrap(output[node]);

    if (this.transport === "ssh" && retcode !== undefined && retcode !== 0) {
      return { shape: "status", responded: false, retcode };
    }

    const uptime = UptimeSchema.safeParse(ret);
    if (!uptime.success) {
      return { shape: "status", responded: false, retcode };
    }
    return {
      shape: "status",
      responded: true,
      uptimeSeconds: uptime.data.seconds,
    };
  }

  async ping(nodes: NodeId[]): Promise<Map<NodeId, boolean>> {
    const { output } = await this.invoke(["-L", nodes.join(","), "test.ping"], {
      allowEmpty: true,
    });
    const replies = new Map<NodeId, boolean>();
    for (const node of nodes) {
      replies.set(node, this.unwrap(output[node]).ret === true);
    }
    return replies;
  }

  async dispatch(node: NodeId, call: RemoteCall): Promise<void> {
    const args = [
      ...this.baseArgs(),
      node,
      ...SaltCliExecutor.formatCall(call),
    ];
    this.logger.debug(`Running: ${this.binary} ${args.join(" ")}`);
    const { code } = await this.runner(this.binary, args);
    if (code !== 0) {
      this.logger.debug(`${call.fun} on '${node}' exited with code ${code}`);
    }
  }

  async wipeShim(node: NodeId): Promise<void> {
    if (this.transport !== "ssh") return;
    await this.invoke(["--wipe", node, "test.ping"]);
  }
}
