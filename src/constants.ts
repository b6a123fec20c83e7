import type { HelmReleaseSpec, RegistryProxySpec } from "./types/index.ts";

export const CLUSTER_NAME = "platform-mesh";
export const KINDEST_IMAGE = "kindest/node:v1.34.0";
export const DEFAULT_WAIT_TIMEOUT = "900s";

export const DEFAULT_NAMESPACE = "default";
export const FLUX_NAMESPACE = "flux-system";
export const SYSTEM_NAMESPACE = "platform-mesh-system";
export const CROSSPLANE_NAMESPACE = "crossplane-system";

export const CERTIFICATE_HOSTS = [
  "*.dev.local",
  "*.portal.dev.local",
  "*.services.portal.dev.local",
  "oci-registry-docker-registry.registry.svc.cluster.local",
];

export const FLUX_RELEASE: HelmReleaseSpec = {
  name: "flux",
  namespace: FLUX_NAMESPACE,
  chart: "oci://ghcr.io/fluxcd-community/charts/flux2",
  version: "2.17.1",
  values: {
    "imageAutomationController.create": "false",
    "imageReflectionController.create": "false",
    "notificationController.create": "false",
    "helmController.container.additionalArgs[0]": "--concurrent=50",
    "sourceController.container.additionalArgs[1]": "--requeue-dependency=5s",
  },
};

export const FLUX_CONTROLLERS = ["helm-controller", "source-controller", "kustomize-controller"];

export const PLATFORM_HELM_RELEASES = [
  "rebac-authz-webhook",
  "account-operator",
  "portal",
  "security-operator",
];

export const EXAMPLE_HELM_RELEASES = ["api-syncagent", "example-httpbin-provider"];

export const KEYCLOAK_PROVIDER_LABEL = "pkg.crossplane.io/provider=provider-keycloak";

export const PLATFORM_MESH_CRD = "crd/platformmeshes.core.platform-mesh.io";

export const KUSTOMIZE_PATHS = {
  base: "kustomize/base",
  rgd: "kustomize/base/rgd",
  defaultOverlay: "kustomize/overlays/default",
  latestOverlay: "kustomize/overlays/default-latest",
  exampleDataOverlay: "kustomize/overlays/example-data",
  platformMeshOverlay: "kustomize/overlays/platform-mesh-resource",
  httpbinProvider: "example-data/root/providers/httpbin-provider",
  operatorResource: "kustomize/components/platform-mesh-operator-resource/platform-mesh.yaml",
} as const;

export const KIND_CONFIGS = {
  standard: "kind/kind-config.yaml",
  cached: "kind/kind-config-cached.yaml",
} as const;

export const KCP = {
  server: "https://kcp.api.portal.dev.local:8443",
  adminSecret: "kcp-cluster-admin-client-cert",
  adminUser: "kcp-admin",
  kubeconfigPath: ".secret/kcp/admin.kubeconfig",
} as const;

export const PORTAL_URL = "https://portal.dev.local:8443";
export const HOSTS_ENTRY = "127.0.0.1 default.portal.dev.local portal.dev.local kcp.api.portal.dev.local";

export const REGISTRY_PROXY_IMAGE = "registry:2";
export const REGISTRY_PROXY_PREFIX = "proxy-";
export const KIND_NETWORK = "kind";

export const REGISTRY_PROXIES: RegistryProxySpec[] = [
  { name: "docker.io", remoteUrl: "https://registry-1.docker.io" },
  { name: "ghcr.io", remoteUrl: "https://ghcr.io" },
  { name: "quay.io", remoteUrl: "https://quay.io" },
  { name: "registry.k8s.io", remoteUrl: "https://registry.k8s.io" },
];

export const INSTALL_GUIDES = {
  kind: "https://kind.sigs.k8s.io/docs/user/quick-start/#installation",
  docker: "https://docs.docker.com/get-docker/",
  dockerWsl: "https://docs.docker.com/desktop/wsl/",
  podman: "https://podman.io/getting-started/installation",
  mkcert: "https://github.com/FiloSottile/mkcert#installation",
  kcpPlugin: "https://docs.kcp.io/kcp/main/setup/kubectl-plugin/",
} as const;
