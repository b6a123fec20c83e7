/**
 * @fileoverview Admin kubeconfig for the kcp root workspace.
 *
 * The platform-mesh operator stores the kcp cluster-admin client
 * certificate in a secret. Its three keys are copied verbatim (they are
 * already base64) into a kubeconfig pointing at the root workspace.
 *
 * @module KcpAdmin
 */

import { chmod, mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { KCP, SYSTEM_NAMESPACE } from "../../constants.ts";
import { Logger } from "../../logger.ts";
import type { KubernetesOperations } from "../../core/cluster/index.ts";
import { ManifestUtils, type KubeconfigInput } from "../../kubernetes/index.ts";

const REQUIRED_KEYS = ["ca.crt", "tls.crt", "tls.key"] as const;

export function rootWorkspaceUrl(...segments: string[]): string {
  return `${KCP.server}/clusters/${["root", ...segments].join(":")}`;
}

/**
 * Pulls the client certificate keys out of a Secret object read as JSON.
 *
 * @throws {Error} When the object is not a Secret or a key is missing
 */
export function adminKubeconfigInput(secret: unknown): KubeconfigInput {
  if (
    typeof secret !== "object" || secret === null ||
    !("data" in secret) || typeof secret.data !== "object" || secret.data === null
  ) {
    throw new Error(`Secret ${KCP.adminSecret} has no data`);
  }

  const data: Record<string, string> = {};
  for (const key of REQUIRED_KEYS) {
    const value: unknown = key in secret.data ? Reflect.get(secret.data, key) : undefined;
    if (typeof value !== "string" || value.length === 0) {
      throw new Error(`Secret ${KCP.adminSecret} is missing key '${key}'`);
    }
    data[key] = value;
  }

  return {
    clusterName: "root",
    server: rootWorkspaceUrl(),
    userName: KCP.adminUser,
    caData: data["ca.crt"] ?? "",
    certData: data["tls.crt"] ?? "",
    keyData: data["tls.key"] ?? "",
  };
}

export class KcpAdmin {
  constructor(
    private readonly k8sOps: KubernetesOperations,
    private readonly kubeconfigPath: string,
  ) {}

  /**
   * Writes the admin kubeconfig, readable by the current user only.
   *
   * @returns The kubeconfig path
   */
  async writeAdminKubeconfig(): Promise<string> {
    Logger.info("Preparing KCP Secrets for admin access");
    const secret = await this.k8sOps.getJson("secret", KCP.adminSecret, SYSTEM_NAMESPACE);
    const kubeconfig = ManifestUtils.kubeconfig(adminKubeconfigInput(secret));

    await mkdir(path.dirname(this.kubeconfigPath), { recursive: true });
    await writeFile(this.kubeconfigPath, ManifestUtils.render(kubeconfig), { mode: 0o600 });
    await chmod(this.kubeconfigPath, 0o600);
    return this.kubeconfigPath;
  }
}
