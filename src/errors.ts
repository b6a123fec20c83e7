/**
 * @fileoverview Error types raised by the setup workflow.
 *
 * Every failure that should end the run with exit code 1 is one of these,
 * so the entry point can report it in a single line.
 *
 * @module Errors
 */

/**
 * An external binary exited non-zero or could not be started.
 */
export class CommandError extends Error {
  readonly command: string;
  readonly args: string[];
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(command: string, args: string[], exitCode: number | null, stderr: string) {
    const detail = stderr.trim().split("\n").slice(-1)[0] ?? "";
    const status = exitCode === null ? "could not be started" : `exited with code ${exitCode}`;
    super(`'${[command, ...args].join(" ")}' ${status}${detail ? `: ${detail}` : ""}`);
    this.name = "CommandError";
    this.command = command;
    this.args = args;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/**
 * One or more dependency checks failed. Raised after every check has run.
 */
export class EnvironmentCheckError extends Error {
  readonly failures: number;

  constructor(failures: number) {
    super(
      `${failures} dependency check(s) failed. Please install the missing dependencies and try again.`,
    );
    this.name = "EnvironmentCheckError";
    this.failures = failures;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
