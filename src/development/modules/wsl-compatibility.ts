/**
 * @fileoverview Windows Subsystem for Linux detection and guidance.
 *
 * Under WSL the cluster runs in Docker Desktop on the Windows side, so the
 * hosts entry has to go into the Windows hosts file and a setup tree on a
 * Windows mount is slow enough to hit the wait timeouts.
 *
 * @module WslCompatibility
 */

import { readFile } from "node:fs/promises";
import { Logger } from "../../logger.ts";

const WINDOWS_MOUNT = /^\/mnt\/[a-z]\//i;
const WINDOWS_HOSTS_FILE = "C:\\Windows\\System32\\drivers\\etc\\hosts";

export class WslCompatibility {
  private detected: boolean | undefined;

  constructor(private readonly procVersionPath = "/proc/version") {}

  async isWsl(): Promise<boolean> {
    if (this.detected === undefined) {
      try {
        const version = await readFile(this.procVersionPath, "utf8");
        this.detected = version.toLowerCase().includes("microsoft");
      } catch {
        this.detected = false;
      }
    }
    return this.detected;
  }

  /**
   * Warns when running under WSL from a Windows-mounted directory.
   *
   * @returns The warnings printed, empty outside WSL
   */
  async checkCompatibility(setupDir: string): Promise<string[]> {
    if (!(await this.isWsl())) {
      return [];
    }

    const warnings = ["WSL detected. Make sure Docker Desktop runs with WSL2 integration enabled."];
    if (WINDOWS_MOUNT.test(setupDir)) {
      warnings.push(
        `The setup directory ${setupDir} is on a Windows mount; clone the repository into the WSL filesystem for acceptable performance.`,
      );
    }
    warnings.forEach((warning) => Logger.warn(warning));
    return warnings;
  }

  /**
   * Prints where the hosts entry goes on the Windows side.
   *
   * @returns The lines printed, empty outside WSL
   */
  async showHostsGuidance(hostsEntry: string): Promise<string[]> {
    if (!(await this.isWsl())) {
      return [];
    }
    const lines = [
      `WSL: add the entry to the Windows hosts file as well: ${WINDOWS_HOSTS_FILE}`,
      `WSL: open an elevated editor on Windows and append: ${hostsEntry}`,
    ];
    lines.forEach((line) => Logger.plain(line));
    return lines;
  }
}
