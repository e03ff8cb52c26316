import type { Executor } from "../core/Executor";
import type { Logger } from "../utils/logger";
import type { TransportMode } from "./index";

// Resolved, camel-cased view of the config file plus run-level CLI flags
export interface RunSettings {
  serviceName: string;
  configState: {
    sls: string;
    pillar: Record<string, unknown>;
  };
  upgradeRefresh: boolean;
  rebootAfterUpgrade: boolean;
  retry: {
    attempts: number;
    backoffSeconds: number;
  };
  restart: {
    attempts: number;
    settleSeconds: number;
    backoffSeconds: number;
  };
  reboot: {
    timeoutSeconds: number;
    periodSeconds: number;
  };
}

// Everything the engine needs, passed explicitly from the CLI down
export interface RunContext {
  transport: TransportMode;
  executor: Executor;
  logger: Logger;
  settings: RunSettings;
  sleep: (seconds: number) => Promise<void>;
  now: () => number; // epoch milliseconds
}
