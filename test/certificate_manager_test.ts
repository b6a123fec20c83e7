import assert from "node:assert/strict";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { test } from "node:test";
import { CertificateManager } from "../src/core/certificate-manager.ts";
import { CommandError } from "../src/errors.ts";
import { FakeCommandRunner } from "./helpers/fake-runner.ts";
import { withTempDir } from "./helpers/setup.ts";

test("CertificateManager - paths inside the certs directory", () => {
  const certificates = new CertificateManager(new FakeCommandRunner(), "/setup/scripts/certs");
  assert.deepEqual(certificates.paths, {
    cert: "/setup/scripts/certs/cert.crt",
    key: "/setup/scripts/certs/cert.key",
    ca: "/setup/scripts/certs/ca.crt",
  });
});

test("CertificateManager - generate issues the certificate and copies the root CA", async () => {
  await withTempDir(async (root) => {
    const caRoot = path.join(root, "caroot");
    await mkdir(caRoot);
    await writeFile(path.join(caRoot, "rootCA.pem"), "test-root-ca");

    const certsDir = path.join(root, "certs");
    const runner = new FakeCommandRunner(["mkcert"]).on("mkcert -CAROOT", { stdout: `${caRoot}\n` });
    const certificates = new CertificateManager(runner, certsDir);

    assert.equal(await certificates.exists(), false);
    const paths = await certificates.generate("mkcert");

    assert.equal(await certificates.exists(), true);
    assert.equal(await readFile(paths.ca, "utf8"), "test-root-ca");
    assert.deepEqual(runner.calls[0]?.args, [
      `-cert-file=${certsDir}/cert.crt`,
      `-key-file=${certsDir}/cert.key`,
      "*.dev.local",
      "*.portal.dev.local",
      "*.services.portal.dev.local",
      "oci-registry-docker-registry.registry.svc.cluster.local",
    ]);
    assert.deepEqual(runner.commandLines()[1], "mkcert -CAROOT");
  });
});

test("CertificateManager - generate uses the given mkcert binary", async () => {
  await withTempDir(async (root) => {
    await writeFile(path.join(root, "rootCA.pem"), "test-root-ca");
    const runner = new FakeCommandRunner().on("/opt/bin/mkcert -CAROOT", { stdout: root });

    await new CertificateManager(runner, path.join(root, "certs")).generate("/opt/bin/mkcert");

    assert.deepEqual(runner.calls.map((call) => call.command), ["/opt/bin/mkcert", "/opt/bin/mkcert"]);
  });
});

test("CertificateManager - mkcert failure aborts generation", async () => {
  await withTempDir(async (root) => {
    const runner = new FakeCommandRunner().onCommand("mkcert", { code: 1, stderr: "ERROR: failed to save certificate" });

    await assert.rejects(
      new CertificateManager(runner, path.join(root, "certs")).generate("mkcert"),
      CommandError,
    );
    assert.equal(runner.calls.length, 1);
  });
});

test("CertificateManager - clear removes the directory", async () => {
  await withTempDir(async (root) => {
    const certsDir = path.join(root, "certs");
    await mkdir(certsDir);
    await writeFile(path.join(certsDir, "cert.crt"), "old");
    const certificates = new CertificateManager(new FakeCommandRunner(), certsDir);

    await certificates.clear();
    assert.equal(await certificates.exists(), false);
    await certificates.clear();
  });
});
