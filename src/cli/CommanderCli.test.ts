import { describe, it, expect, afterEach, vi } from "vitest";
import path from "path";
import { tmpdir } from "os";
import { CommanderCli } from "./CommanderCli";
import { logger, LogLevel } from "../utils/logger";
import { ScriptedExecutor } from "../test-utils/ScriptedExecutor";
import { ConfigFileNotFoundError, InvalidLogLevelError } from "../errors";

const argv = (...args: string[]) => ["node", "fleetroll", ...args];

describe("CommanderCli", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    logger.setLevel(LogLevel.INFO);
    logger.setTimestamp(false);
  });

  it("documents every option in its help", () => {
    const help = new CommanderCli({ logToFile: false }).getHelp();

    expect(help).toContain("-n, --targets <nodes>");
    expect(help).toContain("-e, --exclude <nodes>");
    expect(help).toContain("-a, --action <action>");
    expect(help).toContain("-s, --ssh");
    expect(help).toContain("-r, --reboot");
    expect(help).toContain("--log-dir <dir>");
  });

  it("lists targets in test mode without contacting any node", async () => {
    const info = vi.spyOn(logger, "info").mockImplementation(() => {});
    const executor = new ScriptedExecutor();

    await new CommanderCli({ logToFile: false, executor }).parse(
      argv("-n", "web-01,web-02", "-e", "web-02", "-a", "reboot-host", "-t"),
    );

    expect(info.mock.calls).toEqual([
      ["Targeting the following nodes:"],
      ["  web-01"],
    ]);
    expect(executor.calls).toEqual([]);
  });

  it("stamps console lines with the time", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    await new CommanderCli({ logToFile: false }).parse(
      argv("-n", "web-01", "-a", "reboot-host", "-t"),
    );

    expect(String(log.mock.calls[0]?.[0])).toMatch(
      /^\u001B\[37m\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] 🔹 Targeting the following nodes:/,
    );
  });

  it("applies the log level flag", async () => {
    vi.spyOn(logger, "info").mockImplementation(() => {});

    await new CommanderCli({ logToFile: false }).parse(
      argv("-n", "web-01", "-a", "reboot-host", "-t", "-l", "debug"),
    );

    expect(logger.getLevel()).toBe(LogLevel.DEBUG);
  });

  it("rejects an unknown log level", async () => {
    await expect(
      new CommanderCli({ logToFile: false }).parse(
        argv("-n", "web-01", "-a", "reboot-host", "-t", "-l", "loud"),
      ),
    ).rejects.toThrow(InvalidLogLevelError);
  });

  it("insists on a config file that was named explicitly", async () => {
    const executor = new ScriptedExecutor();
    const configPath = path.join(tmpdir(), "fleetroll-missing-config.yaml");

    await expect(
      new CommanderCli({
        logToFile: false,
        isPrivileged: () => true,
        executor,
      }).parse(
        argv("-n", "web-01", "-a", "reboot-host", "-c", configPath),
      ),
    ).rejects.toThrow(ConfigFileNotFoundError);
    expect(executor.calls).toEqual([]);
  });
});
