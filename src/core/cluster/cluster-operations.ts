/**
 * @fileoverview k3d and kind cluster queries and lifecycle calls.
 *
 * This module wraps the `k3d` and `kind` binaries:
 * - listing clusters and telling whether a k3d cluster is running
 * - merging or exporting kubeconfig for an existing cluster
 * - creating and deleting the kind cluster
 *
 * @module ClusterOperations
 */

import { Logger } from "../../logger.ts";
import { errorMessage } from "../../errors.ts";
import type { K3dCluster } from "../../types/index.ts";
import { type CommandRunner, runChecked, succeeds } from "../command-runner.ts";

/**
 * Whether a k3d cluster entry has at least one running server.
 *
 * Older k3d releases omit `serversRunning`; the server nodes' state is
 * consulted instead.
 */
export function isK3dClusterRunning(cluster: K3dCluster): boolean {
  if (typeof cluster.serversRunning === "number") {
    return cluster.serversRunning > 0;
  }
  const servers = (cluster.nodes ?? []).filter((node) => node.role === "server");
  return servers.length > 0 &&
    servers.every((node) => node.State?.Running === true || node.State?.Status === "running");
}

export function parseK3dClusterList(output: string): K3dCluster[] {
  const parsed: unknown = JSON.parse(output);
  if (!Array.isArray(parsed)) {
    throw new Error("Unexpected k3d cluster list output");
  }
  return parsed.filter((entry: unknown): entry is K3dCluster =>
    typeof entry === "object" && entry !== null &&
    "name" in entry && typeof entry.name === "string"
  );
}

export function parseKindClusterList(output: string): string[] {
  return output
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && line !== "No kind clusters found.");
}

/**
 * Low-level k3d and kind operations.
 *
 * @example
 * ```typescript
 * const operations = new ClusterOperations(new ShellCommandRunner());
 * if (!(await operations.kindClusterExists("platform-mesh"))) {
 *   await operations.createKindCluster("platform-mesh", "kind/kind-config.yaml", "kindest/node:v1.34.0");
 * }
 * ```
 */
export class ClusterOperations {
  constructor(private readonly runner: CommandRunner) {}

  /**
   * Lists k3d clusters. Resolves to an empty list when k3d is not
   * installed or the listing fails.
   */
  async listK3dClusters(): Promise<K3dCluster[]> {
    if (!(await this.runner.exists("k3d"))) {
      return [];
    }
    const result = await this.runner.run("k3d", ["cluster", "list", "--output", "json"], {
      stdio: "pipe",
    });
    if (result.code !== 0) {
      return [];
    }
    try {
      return parseK3dClusterList(result.stdout);
    } catch (err) {
      Logger.warn(`Could not read k3d cluster list: ${errorMessage(err)}`);
      return [];
    }
  }

  /**
   * Returns the first k3d cluster with a running server, if any.
   */
  async findRunningK3dCluster(): Promise<K3dCluster | undefined> {
    const clusters = await this.listK3dClusters();
    return clusters.find(isK3dClusterRunning);
  }

  /**
   * Merges the k3d cluster's kubeconfig into the default kubeconfig and
   * switches the current context to it.
   *
   * @returns True when k3d exited with 0
   */
  mergeK3dKubeconfig(name: string): Promise<boolean> {
    return succeeds(this.runner, "k3d", [
      "kubeconfig",
      "merge",
      name,
      "--kubeconfig-switch-context",
    ]);
  }

  async listKindClusters(): Promise<string[]> {
    const result = await this.runner.run("kind", ["get", "clusters"], { stdio: "pipe" });
    if (result.code !== 0) {
      return [];
    }
    return parseKindClusterList(result.stdout);
  }

  async kindClusterExists(name: string): Promise<boolean> {
    const clusters = await this.listKindClusters();
    return clusters.includes(name);
  }

  async exportKindKubeconfig(name: string): Promise<void> {
    await runChecked(this.runner, "kind", ["export", "kubeconfig", "--name", name], {
      stdio: "inherit",
    });
  }

  async createKindCluster(name: string, configPath: string, image: string): Promise<void> {
    await runChecked(
      this.runner,
      "kind",
      ["create", "cluster", "--config", configPath, "--name", name, `--image=${image}`, "--quiet"],
      { stdio: "inherit" },
    );
  }

  /**
   * Deletes the kind cluster. Succeeds without doing anything when it does
   * not exist.
   *
   * @returns True when a cluster was deleted
   */
  async deleteKindCluster(name: string): Promise<boolean> {
    if (!(await this.kindClusterExists(name))) {
      Logger.info(`Kind cluster ${name} does not exist`);
      return false;
    }
    await runChecked(this.runner, "kind", ["delete", "cluster", "--name", name], {
      stdio: "inherit",
    });
    return true;
  }
}
