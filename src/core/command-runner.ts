/**
 * @fileoverview Execution of external binaries.
 *
 * Every kind, k3d, kubectl, helm, mkcert, docker and git call goes through a
 * {@link CommandRunner}. Operations receive the runner in their constructor,
 * so tests substitute an in-process fake and no binary is ever started.
 *
 * @module CommandRunner
 */

import { spawn } from "node:child_process";
import { access, constants } from "node:fs/promises";
import path from "node:path";
import { CommandError } from "../errors.ts";
import { Logger } from "../logger.ts";

export interface RunOptions {
  /** Written to the child's stdin, which is closed afterwards */
  input?: string;
  /** Extra environment variables layered over the current environment */
  env?: Record<string, string>;
  cwd?: string;
  /**
   * `pipe` captures stdout and stderr into the result; `inherit` streams
   * them to the terminal and leaves the captured output empty.
   */
  stdio?: "pipe" | "inherit";
}

export interface CommandResult {
  /** Exit code, or `null` when the binary could not be started */
  code: number | null;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  /** Runs a command and resolves with its outcome, whatever the exit code */
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;
  /** Whether `command` resolves to an executable on PATH */
  exists(command: string): Promise<boolean>;
}

function quote(arg: string): string {
  return /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, "'\\''")}'`;
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map(quote).join(" ");
}

/**
 * Runs a command and throws {@link CommandError} unless it exits with 0.
 */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: string[],
  options?: RunOptions,
): Promise<CommandResult> {
  const result = await runner.run(command, args, options);
  if (result.code !== 0) {
    throw new CommandError(command, args, result.code, result.stderr);
  }
  return result;
}

/**
 * Runs a command and reports only whether it exited with 0.
 */
export async function succeeds(
  runner: CommandRunner,
  command: string,
  args: string[],
  options?: RunOptions,
): Promise<boolean> {
  const result = await runner.run(command, args, { stdio: "pipe", ...options });
  return result.code === 0;
}

/**
 * {@link CommandRunner} backed by `child_process.spawn`. No shell is
 * involved, so arguments are passed through verbatim.
 */
export class ShellCommandRunner implements CommandRunner {
  run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    const stdio = options.stdio ?? "pipe";
    Logger.debug(formatCommand(command, args));

    return new Promise((resolve) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        env: options.env ? { ...process.env, ...options.env } : process.env,
        stdio: [options.input === undefined ? "ignore" : "pipe", stdio, stdio],
      });

      let stdout = "";
      let stderr = "";
      child.stdout?.setEncoding("utf8");
      child.stderr?.setEncoding("utf8");
      child.stdout?.on("data", (chunk: string) => {
        stdout += chunk;
      });
      child.stderr?.on("data", (chunk: string) => {
        stderr += chunk;
      });

      child.on("error", (error) => {
        resolve({ code: null, stdout, stderr: stderr || error.message });
      });
      child.on("close", (code) => {
        resolve({ code: code ?? 1, stdout, stderr });
      });

      if (options.input !== undefined && child.stdin) {
        // a child that exits before draining stdin closes the pipe (EPIPE)
        child.stdin.on("error", (error) => {
          stderr += `${error.message}\n`;
        });
        child.stdin.end(options.input);
      }
    });
  }

  async exists(command: string): Promise<boolean> {
    if (command.includes(path.sep)) {
      return isExecutable(command);
    }
    const dirs = (process.env.PATH ?? "").split(path.delimiter).filter(Boolean);
    const extensions = process.platform === "win32"
      ? (process.env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";")
      : [""];

    for (const dir of dirs) {
      for (const ext of extensions) {
        if (await isExecutable(path.join(dir, command + ext))) {
          return true;
        }
      }
    }
    return false;
  }
}

async function isExecutable(file: string): Promise<boolean> {
  try {
    await access(file, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
