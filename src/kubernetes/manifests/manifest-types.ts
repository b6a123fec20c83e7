/**
 * @fileoverview Kubernetes document shapes rendered by this tool.
 *
 * @module ManifestTypes
 */

export interface ObjectMeta {
  name: string;
  namespace?: string;
  labels?: Record<string, string>;
}

/**
 * Secret as `kubectl create secret --dry-run=client -o yaml` would render
 * it: values base64-encoded under `data`.
 */
export interface K8sSecret {
  apiVersion: "v1";
  kind: "Secret";
  metadata: ObjectMeta;
  type: "Opaque" | "kubernetes.io/tls";
  data: Record<string, string>;
}

export interface KubeconfigCluster {
  name: string;
  cluster: {
    server: string;
    "certificate-authority-data": string;
  };
}

export interface KubeconfigUser {
  name: string;
  user: {
    "client-certificate-data": string;
    "client-key-data": string;
  };
}

export interface KubeconfigContext {
  name: string;
  context: {
    cluster: string;
    user: string;
  };
}

export interface Kubeconfig {
  apiVersion: "v1";
  kind: "Config";
  clusters: KubeconfigCluster[];
  users: KubeconfigUser[];
  contexts: KubeconfigContext[];
  "current-context": string;
  preferences: Record<string, never>;
}
