import { vi } from "vitest";
import type { RunContext, RunSettings } from "../types";
import type { Executor } from "../core/Executor";
import { createSettings } from "../core/createContext";
import { ZodConfigValidator } from "../config/ZodConfigValidator";
import { Logger } from "../utils/logger";

export function defaultSettings(): RunSettings {
  return createSettings(ZodConfigValidator.validate({}));
}

export function testContext(
  executor: Executor,
  overrides: Partial<Omit<RunContext, "executor" | "settings">> & {
    settings?: Partial<RunSettings>;
  } = {},
): RunContext {
  const { settings, ...rest } = overrides;
  return {
    transport: executor.transport,
    executor,
    logger: new Logger({ silent: true }),
    sleep: vi.fn().mockResolvedValue(undefined),
    now: () => 0,
    ...rest,
    settings: { ...defaultSettings(), ...settings },
  };
}
