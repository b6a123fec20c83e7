/**
 * @fileoverview Cluster detection and lifecycle type definitions.
 *
 * @module ClusterTypes
 */

/**
 * Entry of `k3d cluster list --output json`. Only the fields the
 * detection logic reads are declared.
 */
export interface K3dCluster {
  name: string;
  serversRunning?: number;
  serversCount?: number;
  agentsRunning?: number;
  agentsCount?: number;
  nodes?: Array<{
    name: string;
    role: string;
    State?: {
      Running?: boolean;
      Status?: string;
    };
  }>;
}

/**
 * How the cluster used for the install was obtained.
 *
 * - `k3d`: a running k3d cluster was found and its kubeconfig merged
 * - `kind-existing`: the `platform-mesh` kind cluster already existed
 * - `kind-created`: a new kind cluster was created
 */
export type ClusterSource = "k3d" | "kind-existing" | "kind-created";

export interface ClusterSelection {
  source: ClusterSource;
  name: string;
}
