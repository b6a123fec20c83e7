import type { HelmReleaseSpec } from "../../types/index.ts";
import { type CommandRunner, runChecked } from "../command-runner.ts";

export interface HelmInstallOptions {
  /** Pass `--devel` so pre-release chart versions qualify */
  prerelease?: boolean;
  /** Capture helm's output instead of streaming it */
  quiet?: boolean;
}

export function upgradeInstallArgs(release: HelmReleaseSpec, options: HelmInstallOptions = {}): string[] {
  const args = [
    "upgrade",
    "-i",
    "-n",
    release.namespace,
    "--create-namespace",
    release.name,
    release.chart,
    "--version",
    release.version,
  ];
  for (const [key, value] of Object.entries(release.values)) {
    args.push("--set", `${key}=${value}`);
  }
  if (options.prerelease) {
    args.push("--devel");
  }
  return args;
}

export class HelmOperations {
  constructor(private readonly runner: CommandRunner) {}

  /**
   * Installs the release, or upgrades it when it already exists.
   */
  async upgradeInstall(release: HelmReleaseSpec, options: HelmInstallOptions = {}): Promise<void> {
    await runChecked(this.runner, "helm", upgradeInstallArgs(release, options), {
      stdio: options.quiet ? "pipe" : "inherit",
    });
  }
}
