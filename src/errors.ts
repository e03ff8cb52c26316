import type { NodeFailure, NodeId } from "./types";

export class ConfigFileNotFoundError extends Error {
  constructor(
    public configPath: string,
    message?: string,
  ) {
    super(message || `Config file not found: ${configPath}`);
    this.name = "ConfigFileNotFoundError";
  }
}

export class ConfigParseError extends Error {
  constructor(
    public configPath: string,
    public cause?: unknown,
    message?: string,
  ) {
    super(message || `Failed to parse config file: ${configPath}`);
    this.name = "ConfigParseError";
  }
}

export class ConfigValidationError extends Error {
  constructor(
    public issues: string[],
    message?: string,
  ) {
    super(message || `Configuration validation failed: ${issues.join(", ")}`);
    this.name = "ConfigValidationError";
  }
}

export class OptionsValidationError extends Error {
  constructor(
    public issues: string[],
    message?: string,
  ) {
    super(message || `Invalid options: ${issues.join(", ")}`);
    this.name = "OptionsValidationError";
  }
}

export class InvalidLogLevelError extends Error {
  constructor(
    public level: string,
    message?: string,
  ) {
    super(
      message ||
        `Log level '${level}' is not available. Use one of error, warn, info, debug`,
    );
    this.name = "InvalidLogLevelError";
  }
}

export class InsufficientPrivilegeError extends Error {
  constructor(message?: string) {
    super(message || "This command needs root permissions to execute");
    this.name = "InsufficientPrivilegeError";
  }
}

export class NoTargetsError extends Error {
  constructor(message?: string) {
    super(message || "No targets left to act upon");
    this.name = "NoTargetsError";
  }
}

export class ConnectivityError extends Error {
  constructor(
    public unreachable: NodeId[],
    message?: string,
  ) {
    super(
      message ||
        `Not all nodes responded to pings: ${unreachable.join(", ")}. Fix the issue or exclude the problem nodes`,
    );
    this.name = "ConnectivityError";
  }
}

export class RetryExhaustedError extends Error {
  constructor(
    public node: NodeId,
    public attempts: number,
    public failure: NodeFailure,
    message?: string,
  ) {
    super(
      message ||
        `Failed on node '${node}' after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${describeFailure(failure)}`,
    );
    this.name = "RetryExhaustedError";
  }
}

export class SaltCommandError extends Error {
  constructor(
    public command: string,
    public stderr?: string,
    message?: string,
  ) {
    super(
      message ||
        `Salt command failed: ${command}` + (stderr ? ` (${stderr})` : ""),
    );
    this.name = "SaltCommandError";
  }
}

export function describeFailure(failure: NodeFailure): string {
  switch (failure.kind) {
    case "compile":
      return `state run failed to compile: ${failure.errors.join("; ")}`;
    case "state":
      return (
        `state '${failure.state}' reported ${String(failure.result)}` +
        (failure.comment ? ` (${failure.comment})` : "")
      );
    case "booleanCheck":
      return `${failure.check} still false after ${failure.attempts} attempts`;
    case "rebootTimeout":
      return `no reboot confirmed within ${failure.waitedSeconds}s (${failure.polls} polls)`;
    case "noData":
      return `${failure.operation} returned no data`;
    case "transport":
      return failure.message;
  }
}

// ANSI color codes
const colors = {
  reset: "\u001B[0m",
  bold: "\u001B[1m",
  dim: "\u001B[2m",
  red: "\u001B[31m",
};

export function formatError(error: unknown, showStackTrace = false): string {
  const symbol = "✗";

  if (
    error instanceof ConfigFileNotFoundError ||
    error instanceof ConfigParseError ||
    error instanceof ConfigValidationError ||
    error instanceof OptionsValidationError ||
    error instanceof InvalidLogLevelError ||
    error instanceof InsufficientPrivilegeError ||
    error instanceof NoTargetsError ||
    error instanceof ConnectivityError ||
    error instanceof RetryExhaustedError ||
    error instanceof SaltCommandError
  ) {
    const errorType = error.name.replace(/Error$/, "");
    const message = error.message;

    let output = `${colors.red}${colors.bold}${symbol} ${errorType}${colors.reset}\n`;
    output += `${colors.dim}${message}${colors.reset}`;

    if (showStackTrace && error.stack) {
      output += `\n\n${colors.dim}${error.stack}${colors.reset}`;
    }

    return output;
  }

  // Unknown error type
  const errorName =
    error instanceof Error ? error.constructor.name : typeof error;
  const errorMessage = error instanceof Error ? error.message : String(error);

  let output = `${colors.red}${colors.bold}${symbol} Unexpected Error: ${errorName}${colors.reset}\n`;
  output += `${colors.dim}${errorMessage}${colors.reset}`;

  if (showStackTrace && error instanceof Error && error.stack) {
    output += `\n\n${colors.dim}${error.stack}${colors.reset}`;
  }

  return output;
}
