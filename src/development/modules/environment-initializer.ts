/**
 * @fileoverview Top-level workflows: start, check and cleanup.
 *
 * `start` is the full bootstrap:
 * 1. WSL compatibility warnings
 * 2. dependency checks (abort on any failure)
 * 3. registry proxies when running with `--cached`
 * 4. cluster selection: running k3d, existing kind, or a new kind cluster
 * 5. mkcert certificates
 * 6. the platform install sequence and the closing instructions
 *
 * @example
 * ```typescript
 * const initializer = new EnvironmentInitializer(loadSetupConfig({ options: { latest: true } }));
 * await initializer.start();
 * ```
 *
 * @module EnvironmentInitializer
 */

import inquirer from "inquirer";
import { Logger } from "../../logger.ts";
import { CertificateManager } from "../../core/certificate-manager.ts";
import { ClusterManager } from "../../core/cluster-manager.ts";
import { type CommandRunner, ShellCommandRunner } from "../../core/command-runner.ts";
import { ClusterOperations } from "../../core/cluster/index.ts";
import type { ClusterSelection, EnvironmentReport, SetupConfig } from "../../types/index.ts";
import { EnvironmentChecker } from "./environment-checker.ts";
import { PlatformInstaller } from "./platform-installer.ts";
import { RegistryProxies } from "./registry-proxies.ts";
import { WslCompatibility } from "./wsl-compatibility.ts";

export interface InitializerDependencies {
  runner?: CommandRunner;
  wsl?: WslCompatibility;
  /** `uname -m` equivalent used by the architecture check */
  machine?: () => string;
  /** Asks the user a yes/no question */
  confirm?: (message: string) => Promise<boolean>;
}

async function promptConfirm(message: string): Promise<boolean> {
  const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
    {
      type: "confirm",
      name: "confirm",
      message,
      default: false,
    },
  ]);
  return confirm;
}

export class EnvironmentInitializer {
  private readonly runner: CommandRunner;
  private readonly wsl: WslCompatibility;
  private readonly checker: EnvironmentChecker;
  private readonly certificates: CertificateManager;
  private readonly clusterManager: ClusterManager;
  private readonly installer: PlatformInstaller;
  private readonly confirm: (message: string) => Promise<boolean>;

  constructor(
    private readonly config: SetupConfig,
    dependencies: InitializerDependencies = {},
  ) {
    this.runner = dependencies.runner ?? new ShellCommandRunner();
    this.wsl = dependencies.wsl ?? new WslCompatibility();
    this.confirm = dependencies.confirm ?? promptConfirm;
    this.checker = new EnvironmentChecker(this.runner, {
      setupDir: config.setupDir,
      exampleData: config.options.exampleData,
      machine: dependencies.machine,
      wsl: this.wsl,
    });
    this.certificates = new CertificateManager(this.runner, config.certsDir);
    this.clusterManager = new ClusterManager(
      new ClusterOperations(this.runner),
      this.certificates,
      config,
    );
    this.installer = new PlatformInstaller(this.runner, config, this.certificates, this.wsl);
  }

  /**
   * Runs the dependency checks only.
   *
   * @throws {EnvironmentCheckError} When any check failed
   */
  check(): Promise<EnvironmentReport> {
    return this.checker.runAll();
  }

  /**
   * Bootstraps the local platform end to end.
   *
   * @returns The cluster the platform was installed into
   */
  async start(): Promise<ClusterSelection> {
    await this.wsl.checkCompatibility(this.config.setupDir);
    const report = await this.checker.runAll();

    if (this.config.options.cached) {
      await new RegistryProxies(this.runner, report.containerRuntime).setup();
    }

    const cluster = await this.clusterManager.ensureCluster();
    await this.certificates.generate(report.mkcertCommand);

    await this.installer.install();
    await this.installer.printCompletion();
    return cluster;
  }

  /**
   * Deletes the kind cluster and its certificates after confirmation.
   *
   * @param assumeYes - Skip the confirmation prompt
   * @returns False when the user declined
   */
  async cleanup(assumeYes = false): Promise<boolean> {
    if (!assumeYes) {
      const confirmed = await this.confirm(
        `This will delete the kind cluster '${this.config.clusterName}' and its certificates. Continue?`,
      );
      if (!confirmed) {
        Logger.info("Cleanup cancelled");
        return false;
      }
    }

    Logger.step(1, 2, "Deleting kind cluster...");
    await this.clusterManager.removeKindCluster();
    Logger.step(2, 2, "Cleanup complete");
    return true;
  }
}
