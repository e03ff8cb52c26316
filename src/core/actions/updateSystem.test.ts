import { describe, it, expect } from "vitest";
import { updateSystem } from "./updateSystem";
import {
  ScriptedExecutor,
  compiled,
} from "../../test-utils/ScriptedExecutor";
import { testContext } from "../../test-utils/context";

const upgraded = {
  shape: "stateMap" as const,
  states: { openssl: { old: "3.0.1", new: "3.0.2" } },
  retcode: 0,
};

describe("updateSystem", () => {
  it("upgrades packages with a refresh and stops there without the reboot flag", async () => {
    const executor = new ScriptedExecutor().queueState(upgraded);

    const result = await updateSystem("node-01", testContext(executor));

    expect(result).toEqual({ ok: true });
    expect(executor.calls).toEqual([
      {
        method: "applyState",
        node: "node-01",
        call: { fun: "pkg.upgrade", kwargs: { refresh: true } },
      },
    ]);
  });

  it("reboots after the upgrade when asked to", async () => {
    const executor = new ScriptedExecutor()
      .queueState(upgraded)
      .queueUptime(900, 4);

    const result = await updateSystem(
      "node-01",
      testContext(executor, { settings: { rebootAfterUpgrade: true } }),
    );

    expect(result).toEqual({ ok: true, polls: 1 });
    expect(executor.callsTo("dispatch")[0].call).toEqual({
      fun: "system.reboot",
    });
  });

  it("does not reboot when the upgrade failed", async () => {
    const executor = new ScriptedExecutor().queueState(
      compiled("pkg.upgrade is not available"),
    );

    const result = await updateSystem(
      "node-01",
      testContext(executor, { settings: { rebootAfterUpgrade: true } }),
    );

    expect(result.ok).toBe(false);
    expect(executor.callsTo("queryStatus")).toHaveLength(0);
  });
});
