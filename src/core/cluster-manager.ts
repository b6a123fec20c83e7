/**
 * @fileoverview Decides which local cluster the install targets.
 *
 * Three mutually exclusive branches, tried in order:
 * 1. a running k3d cluster, whose kubeconfig is merged and selected
 * 2. an existing kind cluster named after the configured cluster name
 * 3. a new kind cluster, created from the standard or cached kind config
 *
 * @module ClusterManager
 */

import path from "node:path";
import { KIND_CONFIGS } from "../constants.ts";
import { Logger } from "../logger.ts";
import type { ClusterSelection, SetupConfig } from "../types/index.ts";
import type { CertificateManager } from "./certificate-manager.ts";
import type { ClusterOperations } from "./cluster/index.ts";

export class ClusterManager {
  constructor(
    private readonly clusterOps: ClusterOperations,
    private readonly certificates: CertificateManager,
    private readonly config: SetupConfig,
  ) {}

  /**
   * Kind configuration file for a new cluster.
   */
  get kindConfigPath(): string {
    const file = this.config.options.cached ? KIND_CONFIGS.cached : KIND_CONFIGS.standard;
    return path.join(this.config.setupDir, file);
  }

  /**
   * Reuses a running k3d cluster when there is one.
   *
   * @returns The selection, or undefined when no k3d cluster can be used
   */
  async useK3dCluster(): Promise<ClusterSelection | undefined> {
    const cluster = await this.clusterOps.findRunningK3dCluster();
    if (!cluster) {
      return undefined;
    }

    Logger.info(`k3d cluster '${cluster.name}' detected, bypassing kind cluster creation`);
    if (!(await this.clusterOps.mergeK3dKubeconfig(cluster.name))) {
      Logger.warn("Failed to export k3d kubeconfig, will attempt to use kind");
      return undefined;
    }

    Logger.info(`Using k3d cluster: ${cluster.name}`);
    return { source: "k3d", name: cluster.name };
  }

  async useExistingKindCluster(): Promise<ClusterSelection | undefined> {
    const name = this.config.clusterName;
    if (!(await this.clusterOps.kindClusterExists(name))) {
      return undefined;
    }
    Logger.info("Kind cluster already running, using existing");
    await this.clusterOps.exportKindKubeconfig(name);
    return { source: "kind-existing", name };
  }

  /**
   * Creates the kind cluster. Certificates issued for a previous cluster
   * are discarded first.
   */
  async createKindCluster(): Promise<ClusterSelection> {
    const name = this.config.clusterName;
    await this.certificates.clear();

    Logger.info(this.config.options.cached ? "Creating kind cluster with cached images" : "Creating kind cluster");
    await this.clusterOps.createKindCluster(name, this.kindConfigPath, this.config.kindImage);
    return { source: "kind-created", name };
  }

  /**
   * Runs the three branches in order and returns the first that applies.
   */
  async ensureCluster(): Promise<ClusterSelection> {
    const k3d = await this.useK3dCluster();
    if (k3d) {
      Logger.info("Using existing k3d cluster, bypassing kind cluster creation");
      return k3d;
    }
    return (await this.useExistingKindCluster()) ?? (await this.createKindCluster());
  }

  /**
   * Deletes the kind cluster and the certificates issued for it.
   *
   * @returns True when a cluster was deleted
   */
  async removeKindCluster(): Promise<boolean> {
    const deleted = await this.clusterOps.deleteKindCluster(this.config.clusterName);
    await this.certificates.clear();
    return deleted;
  }
}
