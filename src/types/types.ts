/**
 * Flags accepted by the `start` workflow.
 */
export interface SetupOptions {
  /** Allow pre-release chart versions for Helm releases */
  prerelease: boolean;
  /** Start registry proxies and use the cached kind configuration */
  cached: boolean;
  /** Install the example-data overlay and provider workspaces */
  exampleData: boolean;
  /** Use the latest OCM component version instead of the released one */
  latest: boolean;
}

/**
 * Resolved, immutable configuration for one run.
 */
export interface SetupConfig {
  options: SetupOptions;
  debug: boolean;
  /** Timeout handed to every `kubectl wait`, e.g. `900s` */
  waitTimeout: string;
  /** Root of the local-setup tree holding kind/, kustomize/ and example-data/ */
  setupDir: string;
  certsDir: string;
  kcpKubeconfigPath: string;
  clusterName: string;
  kindImage: string;
}

export interface HelmReleaseSpec {
  name: string;
  namespace: string;
  chart: string;
  version: string;
  values: Record<string, string>;
}

export interface RegistryProxySpec {
  /** Upstream registry host, also used in the container name */
  name: string;
  remoteUrl: string;
}

/**
 * A resource `kubectl wait` should block on.
 */
export interface WaitTarget {
  /** Resource kind or `kind/name` reference as kubectl accepts it */
  resource: string;
  name?: string;
  namespace?: string;
  condition: string;
}
