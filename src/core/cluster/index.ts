/**
 * @fileoverview Cluster module exports.
 *
 * - k3d and kind operations
 * - kubectl resource operations
 * - helm releases
 *
 * @module Cluster
 */

export { ClusterOperations, isK3dClusterRunning, parseK3dClusterList, parseKindClusterList } from "./cluster-operations.ts";
export { KubernetesOperations, waitArgs, type KubectlTarget } from "./kubernetes-operations.ts";
export { HelmOperations, upgradeInstallArgs, type HelmInstallOptions } from "./helm-operations.ts";
