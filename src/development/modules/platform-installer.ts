/**
 * @fileoverview The platform install sequence.
 *
 * The install is a fixed, ordered list of steps built from the setup
 * options. Steps run one after another; the first failing step aborts the
 * install. Every `kubectl wait` uses the configured timeout.
 *
 * @example
 * ```typescript
 * const installer = new PlatformInstaller(runner, config, certificates);
 * console.log(installer.plan().map((step) => step.id));
 * await installer.install();
 * ```
 *
 * @module PlatformInstaller
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import {
  CROSSPLANE_NAMESPACE,
  DEFAULT_NAMESPACE,
  EXAMPLE_HELM_RELEASES,
  FLUX_CONTROLLERS,
  FLUX_NAMESPACE,
  FLUX_RELEASE,
  HOSTS_ENTRY,
  KEYCLOAK_PROVIDER_LABEL,
  KUSTOMIZE_PATHS,
  PLATFORM_HELM_RELEASES,
  PLATFORM_MESH_CRD,
  PORTAL_URL,
  SYSTEM_NAMESPACE,
} from "../../constants.ts";
import { Logger } from "../../logger.ts";
import type { CertificateManager } from "../../core/certificate-manager.ts";
import type { CommandRunner } from "../../core/command-runner.ts";
import { HelmOperations, KubernetesOperations } from "../../core/cluster/index.ts";
import { ManifestUtils, platformSecrets } from "../../kubernetes/index.ts";
import type { SetupConfig, WaitTarget } from "../../types/index.ts";
import { KcpAdmin, rootWorkspaceUrl } from "./kcp-admin.ts";
import { WslCompatibility } from "./wsl-compatibility.ts";

export interface InstallStep {
  id: string;
  title: string;
  run: () => Promise<void>;
}

function helmRelease(name: string): WaitTarget {
  return { resource: "helmreleases", name, namespace: DEFAULT_NAMESPACE, condition: "Ready" };
}

export class PlatformInstaller {
  private readonly k8s: KubernetesOperations;
  private readonly helm: HelmOperations;
  private readonly kcpAdmin: KcpAdmin;

  constructor(
    private readonly runner: CommandRunner,
    private readonly config: SetupConfig,
    private readonly certificates: CertificateManager,
    private readonly wsl: WslCompatibility = new WslCompatibility(),
  ) {
    this.k8s = new KubernetesOperations(runner);
    this.helm = new HelmOperations(runner);
    this.kcpAdmin = new KcpAdmin(this.k8s, config.kcpKubeconfigPath);
  }

  private resolve(relative: string): string {
    return path.join(this.config.setupDir, relative);
  }

  private wait(target: WaitTarget, quiet = false): Promise<void> {
    return this.k8s.wait(target, this.config.waitTimeout, quiet);
  }

  private async installFlux(): Promise<void> {
    await this.helm.upgradeInstall(FLUX_RELEASE, {
      prerelease: this.config.options.prerelease,
      quiet: true,
    });
    for (const controller of FLUX_CONTROLLERS) {
      await this.wait(
        { resource: "deployment", name: controller, namespace: FLUX_NAMESPACE, condition: "available" },
        true,
      );
    }
  }

  private async installKroAndOcm(): Promise<void> {
    await this.k8s.applyKustomization(this.resolve(KUSTOMIZE_PATHS.base));
    await this.wait(helmRelease("kro"));
  }

  private async createSecrets(): Promise<void> {
    const paths = this.certificates.paths;
    const [cert, key, ca] = await Promise.all([
      readFile(paths.cert),
      readFile(paths.key),
      readFile(paths.ca),
    ]);
    await this.k8s.applyManifest(ManifestUtils.renderAll(platformSecrets({ cert, key, ca })));
  }

  private async installOperator(): Promise<void> {
    await this.k8s.applyKustomization(this.resolve(KUSTOMIZE_PATHS.rgd));
    await this.wait({
      resource: "resourcegraphdefinition",
      name: "platform-mesh-operator",
      namespace: DEFAULT_NAMESPACE,
      condition: "Ready",
    });
  }

  private async installComponent(): Promise<void> {
    if (this.config.options.latest) {
      Logger.info("Using LATEST OCM Component version");
      await this.k8s.applyKustomization(this.resolve(KUSTOMIZE_PATHS.latestOverlay));
    } else {
      Logger.info("Using RELEASED OCM Component version");
      await this.k8s.applyKustomization(this.resolve(KUSTOMIZE_PATHS.defaultOverlay));
    }
    await this.wait({
      resource: "PlatformMeshOperator",
      name: "platform-mesh-operator",
      namespace: DEFAULT_NAMESPACE,
      condition: "Ready",
    });
    await this.wait({ resource: PLATFORM_MESH_CRD, condition: "Established" });
  }

  private async installPlatformMesh(): Promise<void> {
    const overlay = this.config.options.exampleData
      ? KUSTOMIZE_PATHS.exampleDataOverlay
      : KUSTOMIZE_PATHS.platformMeshOverlay;
    await this.k8s.applyKustomization(this.resolve(overlay));

    Logger.info("Waiting for kind: PlatformMesh resource to become ready");
    await this.wait({
      resource: "platformmesh",
      name: "platform-mesh",
      namespace: SYSTEM_NAMESPACE,
      condition: "Ready",
    });
  }

  private async restartKeycloakProvider(): Promise<void> {
    await this.wait(helmRelease("keycloak"));
    await this.k8s.deletePodsByLabel(CROSSPLANE_NAMESPACE, KEYCLOAK_PROVIDER_LABEL);
  }

  private async waitForReleases(releases: string[]): Promise<void> {
    for (const release of releases) {
      await this.wait(helmRelease(release));
    }
  }

  private async createExampleWorkspaces(): Promise<void> {
    const kubeconfig = this.config.kcpKubeconfigPath;
    await this.k8s.createWorkspace("providers", "root:providers", {
      kubeconfig,
      server: rootWorkspaceUrl(),
    });
    await this.k8s.createWorkspace("httpbin-provider", "root:provider", {
      kubeconfig,
      server: rootWorkspaceUrl("providers"),
    });
    await this.k8s.applyKustomization(this.resolve(KUSTOMIZE_PATHS.httpbinProvider), {
      kubeconfig,
      server: rootWorkspaceUrl("providers", "httpbin-provider"),
    });
  }

  /**
   * The ordered install steps for the configured options.
   */
  plan(): InstallStep[] {
    const { exampleData } = this.config.options;
    const steps: InstallStep[] = [
      { id: "flux", title: "Installing flux", run: () => this.installFlux() },
      { id: "kro-ocm", title: "Install KRO and OCM", run: () => this.installKroAndOcm() },
      { id: "secrets", title: "Creating necessary secrets", run: () => this.createSecrets() },
      { id: "operator", title: "Install Platform-Mesh Operator", run: () => this.installOperator() },
      { id: "component", title: "Applying OCM component", run: () => this.installComponent() },
      {
        id: "platform-mesh",
        title: exampleData ? "Install Platform-Mesh (with example-data)" : "Install Platform-Mesh",
        run: () => this.installPlatformMesh(),
      },
      { id: "keycloak", title: "Waiting for keycloak", run: () => this.restartKeycloakProvider() },
      {
        id: "helmreleases",
        title: "Waiting for helmreleases",
        run: () => this.waitForReleases(PLATFORM_HELM_RELEASES),
      },
      {
        id: "kcp-admin",
        title: "Preparing KCP admin kubeconfig",
        run: async () => {
          await this.kcpAdmin.writeAdminKubeconfig();
        },
      },
    ];

    if (exampleData) {
      steps.push(
        { id: "example-workspaces", title: "Creating example provider workspaces", run: () => this.createExampleWorkspaces() },
        {
          id: "example-releases",
          title: "Waiting for example provider",
          run: () => this.waitForReleases(EXAMPLE_HELM_RELEASES),
        },
      );
    }
    return steps;
  }

  /**
   * Runs every planned step in order.
   */
  async install(): Promise<void> {
    const steps = this.plan();
    for (const [index, step] of steps.entries()) {
      Logger.step(index + 1, steps.length, step.title);
      await step.run();
    }
  }

  /**
   * Whether the operator resource differs from what git has committed.
   */
  async hasLocalOperatorChanges(): Promise<boolean> {
    const result = await this.runner.run(
      "git",
      ["diff", "--quiet", this.resolve(KUSTOMIZE_PATHS.operatorResource)],
      { stdio: "pipe", cwd: this.config.setupDir },
    );
    return result.code === 1;
  }

  /**
   * Prints the post-install instructions.
   */
  async printCompletion(): Promise<void> {
    Logger.plain(`Please create an entry in your /etc/hosts with the following line: "${HOSTS_ENTRY}"`);
    await this.wsl.showHostsGuidance(HOSTS_ENTRY);

    Logger.warn("WARNING: You need to add a hosts entry for every organization that is onboarded!");
    Logger.warn("   Each organization will require its own subdomain entry in /etc/hosts");
    Logger.warn("   Example: 127.0.0.1 <organization-name>.portal.dev.local");

    Logger.plain(
      `Once kcp is up and running, run 'export KUBECONFIG=${this.config.kcpKubeconfigPath}' to gain access to the root workspace.`,
    );
    Logger.plain("-------------------------------------");
    Logger.info("Installation Complete ♥ !");
    Logger.plain("-------------------------------------");
    Logger.plain(
      `You can access the onboarding portal at: ${PORTAL_URL} , any send emails can be received here: ${PORTAL_URL}/mailpit`,
    );

    if (await this.hasLocalOperatorChanges()) {
      Logger.info("Detected changes in platform-mesh-operator-resource/platform-mesh.yaml");
      Logger.info("You may need to run task local-setup:iterate to apply them.");
    }
  }
}
