import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { CLUSTER_NAME, KINDEST_IMAGE } from "../../src/constants.ts";
import type { SetupConfig, SetupOptions } from "../../src/types/index.ts";
import { WslCompatibility } from "../../src/development/modules/wsl-compatibility.ts";

export function makeConfig(root: string, options: Partial<SetupOptions> = {}): SetupConfig {
  return {
    options: { prerelease: false, cached: false, exampleData: false, latest: false, ...options },
    debug: false,
    waitTimeout: "900s",
    setupDir: root,
    certsDir: path.join(root, "scripts", "certs"),
    kcpKubeconfigPath: path.join(root, ".secret", "kcp", "admin.kubeconfig"),
    clusterName: CLUSTER_NAME,
    kindImage: KINDEST_IMAGE,
  };
}

/** Creates a temporary directory and removes it after `fn` settles */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "pm-local-setup-"));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

/** WSL detection that always reports a plain Linux host */
export function nativeLinux(): WslCompatibility {
  return new WslCompatibility(path.join(os.tmpdir(), "pm-local-setup-no-proc-version"));
}
