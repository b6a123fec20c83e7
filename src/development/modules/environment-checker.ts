/**
 * @fileoverview Dependency checks run before anything touches a cluster.
 *
 * Every check runs even after an earlier one failed, so a single run lists
 * all missing tools. The run fails afterwards with the number of failed
 * checks.
 *
 * @example
 * ```typescript
 * const checker = new EnvironmentChecker(runner, { setupDir, exampleData: false });
 * const report = await checker.runAll();
 * console.log(report.architecture, report.mkcertCommand);
 * ```
 *
 * @module EnvironmentChecker
 */

import { stat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { INSTALL_GUIDES } from "../../constants.ts";
import { EnvironmentCheckError } from "../../errors.ts";
import { Logger } from "../../logger.ts";
import { type CommandRunner, succeeds } from "../../core/command-runner.ts";
import { ClusterOperations, KubernetesOperations } from "../../core/cluster/index.ts";
import type {
  Architecture,
  CheckResult,
  ContainerRuntimeStatus,
  EnvironmentReport,
} from "../../types/index.ts";
import { WslCompatibility } from "./wsl-compatibility.ts";

export interface EnvironmentCheckerOptions {
  setupDir: string;
  exampleData: boolean;
  /** `uname -m` equivalent; defaults to `os.machine()` */
  machine?: () => string;
  wsl?: WslCompatibility;
}

/**
 * Maps a machine name to the architecture the container images are
 * published for.
 */
export function checkArchitecture(machine: string): CheckResult<Architecture> {
  switch (machine) {
    case "arm64":
    case "aarch64":
      return { ok: true, label: "architecture", messages: ["Architecture: arm64"], value: "arm64" };
    case "x86_64":
    case "amd64":
      return { ok: true, label: "architecture", messages: ["Architecture: x86_64"], value: "x86_64" };
    default:
      return {
        ok: false,
        label: "architecture",
        messages: [
          `Unsupported architecture '${machine}'`,
          "💡 Supported architectures: arm64, aarch64, x86_64, amd64",
          "📚 Please check if your architecture has available container images",
        ],
      };
  }
}

export class EnvironmentChecker {
  private readonly clusterOps: ClusterOperations;
  private readonly k8sOps: KubernetesOperations;
  private readonly wsl: WslCompatibility;
  private readonly machine: () => string;

  constructor(
    private readonly runner: CommandRunner,
    private readonly options: EnvironmentCheckerOptions,
  ) {
    this.clusterOps = new ClusterOperations(runner);
    this.k8sOps = new KubernetesOperations(runner);
    this.wsl = options.wsl ?? new WslCompatibility();
    this.machine = options.machine ?? (() => os.machine());
  }

  /**
   * Bundled mkcert shipped in the repository's `bin/` directory.
   */
  get bundledMkcert(): string {
    return path.resolve(this.options.setupDir, "..", "bin", "mkcert");
  }

  private async runtimeUsable(runtime: "docker" | "podman"): Promise<{ installed: boolean; running: boolean }> {
    const installed = await this.runner.exists(runtime);
    const running = installed && await succeeds(this.runner, runtime, ["info"]);
    return { installed, running };
  }

  async checkContainerRuntime(): Promise<CheckResult<ContainerRuntimeStatus>> {
    const label = "container runtime";
    const docker = await this.runtimeUsable("docker");
    const podman = await this.runtimeUsable("podman");
    const wsl = await this.wsl.isWsl();

    if (docker.running || podman.running) {
      const value: ContainerRuntimeStatus = docker.running
        ? { runtime: "docker", displayName: podman.running ? "Docker and Podman" : "Docker" }
        : { runtime: "podman", displayName: "Podman" };
      return { ok: true, label, messages: [`${value.displayName} is available and running`], value };
    }

    if (!docker.installed && !podman.installed) {
      const messages = [
        "Neither 'docker' nor 'podman' is installed",
        "🐳 A container runtime (Docker or Podman) is required for kind to create Kubernetes clusters.",
      ];
      if (wsl) {
        messages.push("📚 For WSL: Install Docker Desktop with WSL2 integration");
        messages.push(`📚 Docker installation guide: ${INSTALL_GUIDES.dockerWsl}`);
      } else {
        messages.push(`📚 Docker installation guide: ${INSTALL_GUIDES.docker}`);
      }
      messages.push(`📚 Podman installation guide: ${INSTALL_GUIDES.podman}`);
      return { ok: false, label, messages };
    }

    const messages = ["Container runtime daemon is not running"];
    if (docker.installed) {
      messages.push("🐳 Docker is installed but not running. Please start Docker and try again.");
      if (wsl) {
        messages.push("💡 For WSL: Ensure Docker Desktop is running on Windows");
      }
    }
    if (podman.installed) {
      messages.push("🐳 Podman is installed but not running. Please start Podman and try again.");
      messages.push("💡 Try: 'podman machine start' or 'systemctl --user start podman.socket'");
    }
    return { ok: false, label, messages };
  }

  /**
   * kind is only needed when there is no k3d cluster to reuse.
   */
  async checkKind(): Promise<CheckResult> {
    const label = "kind";
    const k3dClusters = await this.clusterOps.listK3dClusters();
    if (k3dClusters.length > 0) {
      return {
        ok: true,
        label,
        messages: ["k3d is available with existing clusters, skipping kind dependency check"],
      };
    }

    if (!(await this.runner.exists("kind"))) {
      return {
        ok: false,
        label,
        messages: [
          "'kind' (Kubernetes in Docker) is not installed",
          "📦 Kind is required to create local Kubernetes clusters.",
          `📚 Installation guide: ${INSTALL_GUIDES.kind}`,
        ],
      };
    }
    return { ok: true, label, messages: ["Kind is available"] };
  }

  /**
   * Prefers mkcert from PATH over the bundled binary.
   */
  async checkMkcert(): Promise<CheckResult<string>> {
    const label = "mkcert";
    if (await this.runner.exists("mkcert")) {
      return { ok: true, label, messages: ["Using system mkcert"], value: "mkcert" };
    }

    const bundled = this.bundledMkcert;
    if (await isFile(bundled)) {
      return { ok: true, label, messages: ["Using bundled mkcert"], value: bundled };
    }

    const messages = [
      "'mkcert' is not installed and bundled version not found",
      "🔐 mkcert is required to generate local SSL certificates.",
      `📚 Installation guide: ${INSTALL_GUIDES.mkcert}`,
    ];
    if (await this.wsl.isWsl()) {
      messages.push("💡 For Windows: Use 'choco install mkcert' or 'scoop install mkcert'");
    }
    return { ok: false, label, messages };
  }

  async checkKcpPlugin(): Promise<CheckResult> {
    const label = "kubectl-kcp";
    if (await this.k8sOps.hasKcpPlugin()) {
      return { ok: true, label, messages: ["kubectl-kcp plugin is available"] };
    }
    return {
      ok: false,
      label,
      messages: [
        "'kubectl-kcp' plugin is not installed",
        "🔌 The KCP kubectl plugin is required for creating workspaces when using --example-data.",
        `📚 Installation guide: ${INSTALL_GUIDES.kcpPlugin}`,
      ],
    };
  }

  /**
   * Runs every check, prints its diagnostics and fails when any check failed.
   *
   * @throws {EnvironmentCheckError} After all checks ran, if at least one failed
   */
  async runAll(): Promise<EnvironmentReport> {
    Logger.plain("🔍 Checking environment dependencies...");

    const runtime = report(await this.checkContainerRuntime());
    const kind = report(await this.checkKind());
    const mkcert = report(await this.checkMkcert());
    const architecture = report(checkArchitecture(this.machine()));
    const results: CheckResult<unknown>[] = [runtime, kind, mkcert, architecture];
    if (this.options.exampleData) {
      results.push(report(await this.checkKcpPlugin()));
    }

    const failures = results.filter((result) => !result.ok).length;
    if (failures > 0 || !runtime.value || !mkcert.value || !architecture.value) {
      const error = new EnvironmentCheckError(Math.max(failures, 1));
      Logger.error(error.message);
      throw error;
    }

    Logger.success("All environment checks passed!");
    return {
      architecture: architecture.value,
      mkcertCommand: mkcert.value,
      containerRuntime: runtime.value.runtime,
    };
  }
}

function report<T>(result: CheckResult<T>): CheckResult<T> {
  const [headline, ...details] = result.messages;
  if (result.ok) {
    Logger.success(headline ?? result.label);
  } else {
    Logger.error(`Error: ${headline ?? result.label}`);
  }
  details.forEach((line) => Logger.plain(line));
  return result;
}

async function isFile(file: string): Promise<boolean> {
  try {
    return (await stat(file)).isFile();
  } catch {
    return false;
  }
}
