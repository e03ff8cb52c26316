import { ZodError } from "zod";
import { FleetrollConfigSchema, type FleetrollConfig } from "./schemas";
import { ConfigValidationError } from "../errors";

export function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${path}${issue.message}`;
  });
}

export class ZodConfigValidator {
  static validate(config: unknown): FleetrollConfig {
    // An empty YAML document parses to null
    const result = FleetrollConfigSchema.safeParse(config ?? {});
    if (!result.success) {
      throw new ConfigValidationError(formatIssues(result.error));
    }

    const { timeout_seconds, period_seconds } = result.data.reboot;
    if (period_seconds > timeout_seconds) {
      throw new ConfigValidationError([
        "reboot.period_seconds: Period cannot exceed the reboot timeout",
      ]);
    }
    return result.data;
  }
}
