/**
 * @fileoverview Pull-through registry caches for `--cached` runs.
 *
 * One `registry:2` container per upstream registry, running in proxy mode
 * and attached to the `kind` network so the cached kind configuration can
 * point containerd mirrors at them. Images survive cluster re-creation.
 *
 * @module RegistryProxies
 */

import {
  KIND_NETWORK,
  REGISTRY_PROXIES,
  REGISTRY_PROXY_IMAGE,
  REGISTRY_PROXY_PREFIX,
} from "../../constants.ts";
import { CommandError } from "../../errors.ts";
import { Logger } from "../../logger.ts";
import { type CommandRunner, runChecked } from "../../core/command-runner.ts";
import type { ContainerRuntime, RegistryProxySpec } from "../../types/index.ts";

export type ProxyState = "running" | "stopped" | "missing";

export function proxyContainerName(proxy: RegistryProxySpec): string {
  return `${REGISTRY_PROXY_PREFIX}${proxy.name}`;
}

export class RegistryProxies {
  constructor(
    private readonly runner: CommandRunner,
    private readonly runtime: ContainerRuntime,
    private readonly proxies: RegistryProxySpec[] = REGISTRY_PROXIES,
  ) {}

  async containerState(name: string): Promise<ProxyState> {
    const result = await this.runner.run(
      this.runtime,
      ["inspect", "--format", "{{.State.Running}}", name],
      { stdio: "pipe" },
    );
    if (result.code !== 0) {
      return "missing";
    }
    return result.stdout.trim() === "true" ? "running" : "stopped";
  }

  private async ensureNetwork(): Promise<void> {
    const inspect = await this.runner.run(this.runtime, ["network", "inspect", KIND_NETWORK], {
      stdio: "pipe",
    });
    if (inspect.code !== 0) {
      await runChecked(this.runner, this.runtime, ["network", "create", KIND_NETWORK], { stdio: "pipe" });
    }
  }

  private async connect(name: string): Promise<void> {
    const args = ["network", "connect", KIND_NETWORK, name];
    const result = await this.runner.run(this.runtime, args, { stdio: "pipe" });
    // connecting twice is reported as an error by docker and podman alike
    if (result.code !== 0 && !result.stderr.includes("already exists")) {
      throw new CommandError(this.runtime, args, result.code, result.stderr);
    }
  }

  /**
   * Starts every proxy that is not running yet and connects it to the kind
   * network.
   *
   * @returns The container names, in configuration order
   */
  async setup(): Promise<string[]> {
    Logger.info("Starting registry proxies");
    await this.ensureNetwork();

    const names: string[] = [];
    for (const proxy of this.proxies) {
      const name = proxyContainerName(proxy);
      const state = await this.containerState(name);

      if (state === "stopped") {
        await runChecked(this.runner, this.runtime, ["start", name], { stdio: "pipe" });
      } else if (state === "missing") {
        await runChecked(this.runner, this.runtime, [
          "run",
          "-d",
          "--restart=always",
          "--name",
          name,
          "-e",
          `REGISTRY_PROXY_REMOTEURL=${proxy.remoteUrl}`,
          REGISTRY_PROXY_IMAGE,
        ], { stdio: "pipe" });
      }

      await this.connect(name);
      Logger.debug(`registry proxy ${name} ${state === "running" ? "already running" : "started"}`);
      names.push(name);
    }
    return names;
  }
}
