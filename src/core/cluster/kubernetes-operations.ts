/**
 * @fileoverview kubectl operations used by the install sequence.
 *
 * All operations use the kubectl CLI against the current context (or the
 * kubeconfig passed in), and throw on a non-zero exit.
 *
 * @module KubernetesOperations
 */

import { Logger } from "../../logger.ts";
import type { WaitTarget } from "../../types/index.ts";
import { type CommandRunner, type RunOptions, runChecked, succeeds } from "../command-runner.ts";

export interface KubectlTarget {
  /** Path exported as KUBECONFIG for this call */
  kubeconfig?: string;
  /** Value for `--server` */
  server?: string;
}

function targetOptions(target: KubectlTarget, stdio: RunOptions["stdio"]): RunOptions {
  return target.kubeconfig ? { stdio, env: { KUBECONFIG: target.kubeconfig } } : { stdio };
}

function serverArgs(target: KubectlTarget): string[] {
  return target.server ? [`--server=${target.server}`] : [];
}

/**
 * Builds the argument list for `kubectl wait`.
 */
export function waitArgs(target: WaitTarget, timeout: string): string[] {
  const args = ["wait"];
  if (target.namespace) {
    args.push("--namespace", target.namespace);
  }
  args.push(`--for=condition=${target.condition}`, target.resource, `--timeout=${timeout}`);
  if (target.name) {
    args.push(target.name);
  }
  return args;
}

/**
 * Kubernetes resource operations.
 *
 * @class KubernetesOperations
 */
export class KubernetesOperations {
  constructor(private readonly runner: CommandRunner) {}

  /**
   * Applies a kustomization directory (`kubectl apply -k`).
   */
  async applyKustomization(dir: string, target: KubectlTarget = {}): Promise<void> {
    await runChecked(
      this.runner,
      "kubectl",
      ["apply", "-k", dir, ...serverArgs(target)],
      targetOptions(target, "inherit"),
    );
  }

  /**
   * Applies manifests given as YAML text through stdin (`kubectl apply -f -`).
   */
  async applyManifest(yaml: string): Promise<void> {
    await runChecked(this.runner, "kubectl", ["apply", "-f", "-"], {
      input: yaml,
      stdio: "inherit",
    });
  }

  /**
   * Blocks until the resource reaches the condition or the timeout elapses.
   *
   * @param quiet - Capture kubectl's output instead of streaming it
   */
  async wait(target: WaitTarget, timeout: string, quiet = false): Promise<void> {
    Logger.debug(`waiting for ${target.resource}${target.name ? `/${target.name}` : ""} ${target.condition}`);
    await runChecked(this.runner, "kubectl", waitArgs(target, timeout), {
      stdio: quiet ? "pipe" : "inherit",
    });
  }

  async deletePodsByLabel(namespace: string, selector: string): Promise<void> {
    await runChecked(this.runner, "kubectl", ["delete", "pod", "-l", selector, "-n", namespace], {
      stdio: "inherit",
    });
  }

  /**
   * Fetches one object as parsed JSON.
   */
  async getJson(kind: string, name: string, namespace: string): Promise<unknown> {
    const result = await runChecked(
      this.runner,
      "kubectl",
      ["get", kind, name, "-n", namespace, "-o", "json"],
      { stdio: "pipe" },
    );
    return JSON.parse(result.stdout);
  }

  /**
   * Creates a kcp workspace through the kcp kubectl plugin; an existing
   * workspace is left as it is.
   */
  async createWorkspace(name: string, type: string, target: KubectlTarget): Promise<void> {
    await runChecked(
      this.runner,
      "kubectl",
      ["create-workspace", name, `--type=${type}`, "--ignore-existing", ...serverArgs(target)],
      targetOptions(target, "inherit"),
    );
  }

  /**
   * Whether the kcp kubectl plugin is installed.
   */
  hasKcpPlugin(): Promise<boolean> {
    return succeeds(this.runner, "kubectl", ["kcp", "--help"]);
  }
}
