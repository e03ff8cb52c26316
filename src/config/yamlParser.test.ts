import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import path from "path";
import { tmpdir } from "os";
import { loadConfig, parseYamlFile } from "./yamlParser";
import {
  ConfigFileNotFoundError,
  ConfigParseError,
  ConfigValidationError,
} from "../errors";

describe("yamlParser", () => {
  let testDir: string;
  let configPath: string;

  beforeEach(() => {
    testDir = mkdtempSync(path.join(tmpdir(), "fleetroll-yaml-parser-"));
    configPath = path.join(testDir, "fleetroll.yaml");
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it("should fill every section with defaults for an empty file", () => {
    writeFileSync(configPath, "");

    expect(parseYamlFile(configPath)).toEqual({
      service: { name: "haproxy" },
      configs: { sls: "haproxy.update_configs", pillar: {} },
      upgrade: { refresh: true },
      retry: { attempts: 3, backoff_seconds: 0 },
      restart: { attempts: 3, settle_seconds: 2, backoff_seconds: 5 },
      reboot: { timeout_seconds: 300, period_seconds: 10 },
      salt: { config_dir: "/etc/salt" },
    });
  });

  it("should read overrides and keep defaults for the rest", () => {
    writeFileSync(
      configPath,
      `service:
  name: nginx
configs:
  sls: nginx.config
  pillar:
    upstream: blue
reboot:
  timeout_seconds: 600
`,
    );

    const config = parseYamlFile(configPath);

    expect(config.service.name).toBe("nginx");
    expect(config.configs).toEqual({
      sls: "nginx.config",
      pillar: { upstream: "blue" },
    });
    expect(config.reboot).toEqual({ timeout_seconds: 600, period_seconds: 10 });
    expect(config.retry.attempts).toBe(3);
  });

  it("should reject unknown top-level fields", () => {
    writeFileSync(configPath, "unexpected_key: true\n");

    expect(() => parseYamlFile(configPath)).toThrow(ConfigValidationError);
    expect(() => parseYamlFile(configPath)).toThrow(
      'Unrecognized key: "unexpected_key"',
    );
  });

  it("should name the path of an invalid value", () => {
    writeFileSync(configPath, "retry:\n  attempts: 0\n");

    expect(() => parseYamlFile(configPath)).toThrow(
      "Configuration validation failed: retry.attempts: At least one attempt is required",
    );
  });

  it("should reject a poll period longer than the reboot timeout", () => {
    writeFileSync(
      configPath,
      "reboot:\n  timeout_seconds: 5\n  period_seconds: 10\n",
    );

    expect(() => parseYamlFile(configPath)).toThrow(ConfigValidationError);
  });

  it("should wrap YAML syntax errors", () => {
    writeFileSync(configPath, "service: [unclosed\n");

    expect(() => parseYamlFile(configPath)).toThrow(ConfigParseError);
  });

  it("should throw for a missing file", () => {
    expect(() => parseYamlFile(configPath)).toThrow(ConfigFileNotFoundError);
  });

  describe("loadConfig", () => {
    it("should fall back to defaults when an optional file is missing", () => {
      expect(loadConfig(configPath).retry.attempts).toBe(3);
    });

    it("should insist on a file that was asked for", () => {
      expect(() => loadConfig(configPath, { required: true })).toThrow(
        ConfigFileNotFoundError,
      );
    });
  });
});
