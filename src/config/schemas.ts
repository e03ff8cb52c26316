import { z } from "zod";

const seconds = z.number().nonnegative("Duration cannot be negative");
const attempts = z.number().int().min(1, "At least one attempt is required");

export const ServiceSchema = z
  .object({
    name: z.string().min(1, "Service name cannot be empty").default("haproxy"),
  })
  .strict();

export const ConfigsSchema = z
  .object({
    sls: z
      .string()
      .min(1, "State name cannot be empty")
      .default("haproxy.update_configs"),
    pillar: z.record(z.string(), z.unknown()).default({}),
  })
  .strict();

export const UpgradeSchema = z
  .object({
    refresh: z.boolean().default(true),
  })
  .strict();

export const RetrySchema = z
  .object({
    attempts: attempts.default(3),
    backoff_seconds: seconds.default(0),
  })
  .strict();

export const RestartSchema = z
  .object({
    attempts: attempts.default(3),
    settle_seconds: seconds.default(2),
    backoff_seconds: seconds.default(5),
  })
  .strict();

export const RebootSchema = z
  .object({
    timeout_seconds: z
      .number()
      .positive("Timeout must be positive")
      .default(300),
    period_seconds: z.number().positive("Period must be positive").default(10),
  })
  .strict();

export const SaltSchema = z
  .object({
    config_dir: z
      .string()
      .min(1, "Salt config directory cannot be empty")
      .default("/etc/salt"),
  })
  .strict();

// Sections parse their own defaults when left out of the file
export const FleetrollConfigSchema = z
  .object({
    service: ServiceSchema.prefault({}),
    configs: ConfigsSchema.prefault({}),
    upgrade: UpgradeSchema.prefault({}),
    retry: RetrySchema.prefault({}),
    restart: RestartSchema.prefault({}),
    reboot: RebootSchema.prefault({}),
    salt: SaltSchema.prefault({}),
  })
  .strict();

export type FleetrollConfig = z.infer<typeof FleetrollConfigSchema>;
