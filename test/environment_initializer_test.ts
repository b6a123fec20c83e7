import assert from "node:assert/strict";
import { mkdir, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { test } from "node:test";
import { EnvironmentInitializer } from "../src/development/modules/environment-initializer.ts";
import { EnvironmentCheckError } from "../src/errors.ts";
import type { SetupOptions } from "../src/types/index.ts";
import { FakeCommandRunner } from "./helpers/fake-runner.ts";
import { makeConfig, nativeLinux, withTempDir } from "./helpers/setup.ts";

/**
 * A host with docker, kind and mkcert where every command succeeds; mkcert
 * writes the files it is asked for.
 */
async function healthyHost(root: string): Promise<FakeCommandRunner> {
  const caRoot = path.join(root, "caroot");
  await mkdir(caRoot);
  await writeFile(path.join(caRoot, "rootCA.pem"), "test-root-ca");

  return new FakeCommandRunner(["docker", "kind", "mkcert"])
    .on("kind get clusters", { stdout: "" })
    .on("kubectl get secret kcp-cluster-admin-client-cert -n platform-mesh-system -o json", {
      stdout: JSON.stringify({ data: { "ca.crt": "Y2E=", "tls.crt": "Y2VydA==", "tls.key": "a2V5" } }),
    })
    .onCommand("mkcert", async (args) => {
      if (args[0] === "-CAROOT") {
        return { stdout: `${caRoot}\n` };
      }
      for (const arg of args) {
        const match = /^-(?:cert|key)-file=(.+)$/.exec(arg);
        if (match?.[1]) {
          await writeFile(match[1], "test-pem");
        }
      }
      return {};
    });
}

function initializer(root: string, runner: FakeCommandRunner, options: Partial<SetupOptions> = {}, confirm = false) {
  return new EnvironmentInitializer(makeConfig(root, options), {
    runner,
    wsl: nativeLinux(),
    machine: () => "x86_64",
    confirm: () => Promise.resolve(confirm),
  });
}

test("EnvironmentInitializer - start creates a cluster and installs the platform", async () => {
  await withTempDir(async (root) => {
    const runner = await healthyHost(root);
    const config = makeConfig(root);

    const selection = await initializer(root, runner).start();

    assert.deepEqual(selection, { source: "kind-created", name: "platform-mesh" });
    const lines = runner.commandLines();
    const created = lines.findIndex((line) => line.startsWith("kind create cluster"));
    const issued = lines.findIndex((line) => line.startsWith("mkcert -cert-file="));
    const flux = lines.findIndex((line) => line.startsWith("helm upgrade -i"));
    assert.equal(created >= 0 && created < issued && issued < flux, true);
    assert.equal(lines.some((line) => line.includes("proxy-")), false);
    assert.equal((await stat(config.kcpKubeconfigPath)).isFile(), true);
    assert.equal(lines.at(-1), `git diff --quiet ${root}/kustomize/components/platform-mesh-operator-resource/platform-mesh.yaml`);
  });
});

test("EnvironmentInitializer - cached start brings up registry proxies before the cluster", async () => {
  await withTempDir(async (root) => {
    const runner = await healthyHost(root);

    await initializer(root, runner, { cached: true }).start();

    const lines = runner.commandLines();
    const proxies = lines.indexOf("docker network connect kind proxy-registry.k8s.io");
    const created = lines.findIndex((line) => line.startsWith("kind create cluster"));
    assert.equal(proxies >= 0 && proxies < created, true);
    assert.equal(lines[created]?.includes(`${root}/kind/kind-config-cached.yaml`), true);
  });
});

test("EnvironmentInitializer - failed checks stop before any cluster work", async () => {
  await withTempDir(async (root) => {
    const runner = new FakeCommandRunner(["docker", "mkcert"]);

    await assert.rejects(initializer(root, runner).start(), EnvironmentCheckError);
    assert.equal(runner.commandLines().some((line) => line.startsWith("kind ")), false);
  });
});

test("EnvironmentInitializer - check reports the environment", async () => {
  await withTempDir(async (root) => {
    const runner = await healthyHost(root);
    assert.deepEqual(await initializer(root, runner).check(), {
      architecture: "x86_64",
      mkcertCommand: "mkcert",
      containerRuntime: "docker",
    });
  });
});

test("EnvironmentInitializer - cleanup declined", async () => {
  await withTempDir(async (root) => {
    const runner = new FakeCommandRunner(["kind"]);

    assert.equal(await initializer(root, runner, {}, false).cleanup(), false);
    assert.equal(runner.calls.length, 0);
  });
});

test("EnvironmentInitializer - cleanup confirmed or forced", async () => {
  await withTempDir(async (root) => {
    const confirmed = new FakeCommandRunner(["kind"]).on("kind get clusters", { stdout: "platform-mesh\n" });
    assert.equal(await initializer(root, confirmed, {}, true).cleanup(), true);
    assert.equal(confirmed.commandLines().at(-1), "kind delete cluster --name platform-mesh");

    const forced = new FakeCommandRunner(["kind"]).on("kind get clusters", { stdout: "platform-mesh\n" });
    assert.equal(await initializer(root, forced, {}, false).cleanup(true), true);
    assert.equal(forced.commandLines().at(-1), "kind delete cluster --name platform-mesh");
  });
});
