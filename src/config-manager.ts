import path from "node:path";
import {
  CLUSTER_NAME,
  DEFAULT_WAIT_TIMEOUT,
  KCP,
  KINDEST_IMAGE,
} from "./constants.ts";
import { ConfigurationError } from "./errors.ts";
import type { SetupConfig, SetupOptions } from "./types/index.ts";

const GO_DURATION = /^(\d+(\.\d+)?(ns|us|µs|ms|s|m|h))+$/;

export const DEFAULT_OPTIONS: SetupOptions = {
  prerelease: false,
  cached: false,
  exampleData: false,
  latest: false,
};

/**
 * Validates a `kubectl wait --timeout` value. kubectl takes Go durations
 * such as `900s`, `15m` or `1h30m`.
 */
export function parseWaitTimeout(value: string | undefined): string {
  if (value === undefined || value.trim() === "") {
    return DEFAULT_WAIT_TIMEOUT;
  }
  const trimmed = value.trim();
  if (!GO_DURATION.test(trimmed)) {
    throw new ConfigurationError(
      `Invalid KUBECTL_WAIT_TIMEOUT '${value}': expected a duration such as 900s, 15m or 1h30m`,
    );
  }
  return trimmed;
}

export function isDebugEnabled(value: string | undefined): boolean {
  return value === "true";
}

export interface ConfigInput {
  options?: Partial<SetupOptions>;
  setupDir?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Builds the configuration for one run from CLI flags and the environment.
 *
 * `setupDir` falls back to `LOCAL_SETUP_DIR`, then to the working
 * directory. Certificates live under `<setupDir>/scripts/certs` and the kcp
 * admin kubeconfig under `<cwd>/.secret/kcp`, where the shell scripts kept
 * them.
 */
export function loadSetupConfig(input: ConfigInput = {}): SetupConfig {
  const env = input.env ?? process.env;
  const cwd = input.cwd ?? process.cwd();
  const setupDir = path.resolve(cwd, input.setupDir ?? env.LOCAL_SETUP_DIR ?? ".");

  return {
    options: { ...DEFAULT_OPTIONS, ...input.options },
    debug: isDebugEnabled(env.DEBUG),
    waitTimeout: parseWaitTimeout(env.KUBECTL_WAIT_TIMEOUT),
    setupDir,
    certsDir: path.join(setupDir, "scripts", "certs"),
    kcpKubeconfigPath: path.join(cwd, KCP.kubeconfigPath),
    clusterName: CLUSTER_NAME,
    kindImage: KINDEST_IMAGE,
  };
}
