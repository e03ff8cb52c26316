import { z } from "zod";
import { ACTION_KINDS } from "../types";
import { parseNodeList } from "../utils/targets";
import { formatIssues } from "../config/ZodConfigValidator";
import { OptionsValidationError } from "../errors";

export const RunOptionsSchema = z.object({
  targets: z
    .string({ message: "Targets are required" })
    .transform(parseNodeList)
    .pipe(z.array(z.string()).min(1, "At least one target is required")),
  exclude: z.string().optional().transform(parseNodeList),
  action: z.enum(ACTION_KINDS, {
    message: `Action must be one of: ${ACTION_KINDS.join(", ")}`,
  }),
  test: z.boolean().default(false),
  ssh: z.boolean().default(false),
  reboot: z.boolean().default(false),
  logLevel: z.string().default("info"),
  config: z.string().min(1).default("fleetroll.yaml"),
  logDir: z.string().min(1).default("."),
});

export type RunOptions = z.infer<typeof RunOptionsSchema>;

export function parseRunOptions(raw: unknown): RunOptions {
  const result = RunOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw new OptionsValidationError(formatIssues(result.error));
  }
  return result.data;
}
