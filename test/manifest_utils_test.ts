import assert from "node:assert/strict";
import { test } from "node:test";
import { ManifestUtils, platformSecrets } from "../src/kubernetes/index.ts";

const files = {
  cert: Buffer.from("cert"),
  key: Buffer.from("key"),
  ca: Buffer.from("ca"),
};

test("ManifestUtils - encode strings and buffers as base64", () => {
  assert.equal(ManifestUtils.encode("admin"), "YWRtaW4=");
  assert.equal(ManifestUtils.encode(Buffer.from("cert")), "Y2VydA==");
});

test("ManifestUtils - secret defaults to Opaque", () => {
  assert.deepEqual(
    ManifestUtils.secret({ name: "keycloak-admin", namespace: "platform-mesh-system", data: { secret: "admin" } }),
    {
      apiVersion: "v1",
      kind: "Secret",
      metadata: { name: "keycloak-admin", namespace: "platform-mesh-system" },
      type: "Opaque",
      data: { secret: "YWRtaW4=" },
    },
  );
});

test("ManifestUtils - render produces block YAML", () => {
  const secret = ManifestUtils.secret({ name: "keycloak-admin", namespace: "platform-mesh-system", data: { secret: "admin" } });

  assert.equal(
    ManifestUtils.render(secret),
    [
      "apiVersion: v1",
      "kind: Secret",
      "metadata:",
      "  name: keycloak-admin",
      "  namespace: platform-mesh-system",
      "type: Opaque",
      "data:",
      "  secret: YWRtaW4=",
      "",
    ].join("\n"),
  );
});

test("platformSecrets - secrets in apply order", () => {
  const secrets = platformSecrets(files);

  assert.deepEqual(
    secrets.map((secret) => [secret.metadata.namespace, secret.metadata.name, secret.type]),
    [
      ["platform-mesh-system", "keycloak-admin", "Opaque"],
      ["default", "domain-certificate", "kubernetes.io/tls"],
      ["platform-mesh-system", "domain-certificate", "kubernetes.io/tls"],
      ["platform-mesh-system", "domain-certificate-ca", "Opaque"],
    ],
  );
  assert.deepEqual(secrets[1]?.data, { "tls.crt": "Y2VydA==", "tls.key": "a2V5", "ca.crt": "Y2E=" });
  assert.deepEqual(secrets[3]?.data, { "tls.crt": "Y2E=" });
});

test("ManifestUtils - renderAll joins documents", () => {
  const stream = ManifestUtils.renderAll(platformSecrets(files));
  const documents = stream.split("---\n");

  assert.equal(documents.length, 4);
  assert.equal(documents[3]?.split("\n")[3], "  name: domain-certificate-ca");
});

test("ManifestUtils - kubeconfig with a single context", () => {
  assert.deepEqual(
    ManifestUtils.kubeconfig({
      clusterName: "root",
      server: "https://kcp.example.test/clusters/root",
      userName: "kcp-admin",
      caData: "Y2E=",
      certData: "Y2VydA==",
      keyData: "a2V5",
    }),
    {
      apiVersion: "v1",
      kind: "Config",
      clusters: [{
        name: "root",
        cluster: { server: "https://kcp.example.test/clusters/root", "certificate-authority-data": "Y2E=" },
      }],
      users: [{ name: "kcp-admin", user: { "client-certificate-data": "Y2VydA==", "client-key-data": "a2V5" } }],
      contexts: [{ name: "root", context: { cluster: "root", user: "kcp-admin" } }],
      "current-context": "root",
      preferences: {},
    },
  );
});
