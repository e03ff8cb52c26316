import type { FleetrollConfig } from "../config/schemas";
import type { RunContext, RunSettings, TransportMode } from "../types";
import type { Logger } from "../utils/logger";
import type { Executor } from "./Executor";
import { SaltCliExecutor } from "./salt/SaltCliExecutor";
import { sleepSeconds } from "../utils/sleep";

/**
 * Transforms the validated config file into the settings the engine reads.
 * `rebootAfterUpgrade` is a run-level CLI flag, not a config file key.
 */
export function createSettings(
  config: FleetrollConfig,
  rebootAfterUpgrade = false,
): RunSettings {
  return {
    serviceName: config.service.name,
    configState: {
      sls: config.configs.sls,
      pillar: config.configs.pillar,
    },
    upgradeRefresh: config.upgrade.refresh,
    rebootAfterUpgrade,
    retry: {
      attempts: config.retry.attempts,
      backoffSeconds: config.retry.backoff_seconds,
    },
    restart: {
      attempts: config.restart.attempts,
      settleSeconds: config.restart.settle_seconds,
      backoffSeconds: config.restart.backoff_seconds,
    },
    reboot: {
      timeoutSeconds: config.reboot.timeout_seconds,
      periodSeconds: config.reboot.period_seconds,
    },
  };
}

export interface CreateContextOptions {
  config: FleetrollConfig;
  transport: TransportMode;
  logger: Logger;
  rebootAfterUpgrade?: boolean;
  executor?: Executor;
  sleep?: (seconds: number) => Promise<void>;
  now?: () => number;
}

export function createContext(options: CreateContextOptions): RunContext {
  const { config, transport, logger } = options;

  const executor =
    options.executor ??
    new SaltCliExecutor(transport, {
      logger,
      configDir: config.salt.config_dir,
    });

  return {
    transport,
    executor,
    logger,
    settings: createSettings(config, options.rebootAfterUpgrade ?? false),
    sleep: options.sleep ?? sleepSeconds,
    now: options.now ?? Date.now,
  };
}
