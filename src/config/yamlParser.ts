import { readFileSync, existsSync } from "fs";
import { parse } from "yaml";
import { ZodConfigValidator } from "./ZodConfigValidator";
import type { FleetrollConfig } from "./schemas";
import {
  ConfigFileNotFoundError,
  ConfigParseError,
  ConfigValidationError,
} from "../errors";

export function parseYamlFile(filePath: string): FleetrollConfig {
  if (!existsSync(filePath)) {
    throw new ConfigFileNotFoundError(filePath);
  }

  try {
    const content = readFileSync(filePath, "utf8");
    const parsed: unknown = parse(content);
    return ZodConfigValidator.validate(parsed);
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      throw error;
    }
    throw new ConfigParseError(filePath, error);
  }
}

/**
 * Loads the config file. A missing file falls back to defaults unless the
 * path was asked for explicitly.
 */
export function loadConfig(
  filePath: string,
  options: { required?: boolean } = {},
): FleetrollConfig {
  if (!options.required && !existsSync(filePath)) {
    return ZodConfigValidator.validate({});
  }
  return parseYamlFile(filePath);
}
