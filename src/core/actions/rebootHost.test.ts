import { describe, it, expect, vi } from "vitest";
import { rebootHost } from "./rebootHost";
import { ScriptedExecutor } from "../../test-utils/ScriptedExecutor";
import { SaltCliExecutor } from "../salt/SaltCliExecutor";
import { Logger } from "../../utils/logger";
import { testContext } from "../../test-utils/context";

describe("rebootHost", () => {
  it("confirms the reboot on the first poll with a smaller uptime", async () => {
    const executor = new ScriptedExecutor().queueUptime(1200, 1205, 1210, 50);
    const sleep = vi.fn().mockResolvedValue(undefined);

    const result = await rebootHost("node-01", testContext(executor, { sleep }));

    expect(result).toEqual({ ok: true, polls: 3 });
    expect(executor.callsTo("queryStatus")).toHaveLength(4);
    expect(sleep.mock.calls).toEqual([[10], [10]]);
  });

  it("issues the reboot once, after sampling the baseline", async () => {
    const executor = new ScriptedExecutor().queueUptime(1200, 3);

    await rebootHost("node-01", testContext(executor));

    expect(executor.calls.map((c) => c.call?.fun)).toEqual([
      "status.uptime",
      "system.reboot",
      "status.uptime",
    ]);
  });

  it("times out after 30 polls when uptime never drops", async () => {
    const executor = new ScriptedExecutor().queueUptime(
      1200,
      ...Array<number>(30).fill(1205),
    );
    const sleep = vi.fn().mockResolvedValue(undefined);

    const result = await rebootHost("node-01", testContext(executor, { sleep }));

    expect(result).toEqual({
      ok: false,
      failure: {
        kind: "rebootTimeout",
        node: "node-01",
        waitedSeconds: 300,
        polls: 30,
      },
    });
    expect(executor.callsTo("queryStatus")).toHaveLength(31);
    expect(sleep).toHaveBeenCalledTimes(29);
  });

  it("does not accept an equal uptime as a reboot", async () => {
    const executor = new ScriptedExecutor().queueUptime(1200, 1200, 1200);

    const result = await rebootHost(
      "node-01",
      testContext(executor, {
        settings: { reboot: { timeoutSeconds: 20, periodSeconds: 10 } },
      }),
    );

    expect(result.ok).toBe(false);
  });

  it("keeps polling through silence while the node boots", async () => {
    const executor = new ScriptedExecutor().queueUptime(
      1200,
      null,
      null,
      12,
    );

    const result = await rebootHost("node-01", testContext(executor));

    expect(result).toEqual({ ok: true, polls: 3 });
  });

  it("spends the timeout on silent polls as well", async () => {
    const executor = new ScriptedExecutor().queueUptime(1200, null, null, null);

    const result = await rebootHost(
      "node-01",
      testContext(executor, {
        settings: { reboot: { timeoutSeconds: 30, periodSeconds: 10 } },
      }),
    );

    expect(result).toEqual({
      ok: false,
      failure: {
        kind: "rebootTimeout",
        node: "node-01",
        waitedSeconds: 30,
        polls: 3,
      },
    });
  });

  it("keeps waiting when a poll prints something other than JSON", async () => {
    const runner = vi
      .fn()
      .mockResolvedValueOnce({
        code: 0,
        stdout: JSON.stringify({ "node-01": { seconds: 1200 } }),
        stderr: "",
      })
      .mockResolvedValueOnce({ code: 0, stdout: "", stderr: "" })
      .mockResolvedValueOnce({
        code: 1,
        stdout: "Salt request timed out. The master is not responding.",
        stderr: "",
      })
      .mockResolvedValueOnce({
        code: 0,
        stdout: JSON.stringify({ "node-01": { seconds: 20 } }),
        stderr: "",
      });
    const executor = new SaltCliExecutor("minion", {
      logger: new Logger({ silent: true }),
      runner,
    });

    const result = await rebootHost("node-01", testContext(executor));

    expect(result).toEqual({ ok: true, polls: 2 });
    expect(runner).toHaveBeenCalledTimes(4);
    expect(runner.mock.calls[1]?.[1]).toEqual([
      "--out=json",
      "--static",
      "node-01",
      "system.reboot",
    ]);
  });

  it("fails without rebooting when the baseline cannot be read", async () => {
    const executor = new ScriptedExecutor().queueUptime(null);

    const result = await rebootHost("node-01", testContext(executor));

    expect(result).toEqual({
      ok: false,
      failure: { kind: "noData", node: "node-01", operation: "status.uptime" },
    });
    expect(executor.callsTo("dispatch")).toHaveLength(0);
  });
});
