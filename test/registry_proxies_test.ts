import assert from "node:assert/strict";
import { test } from "node:test";
import { RegistryProxies, proxyContainerName } from "../src/development/modules/registry-proxies.ts";
import { CommandError } from "../src/errors.ts";
import { FakeCommandRunner } from "./helpers/fake-runner.ts";

const DOCKER_HUB = [{ name: "docker.io", remoteUrl: "https://registry-1.docker.io" }];
const INSPECT = "docker inspect --format {{.State.Running}} proxy-docker.io";

test("proxyContainerName - prefixes the registry host", () => {
  assert.equal(proxyContainerName({ name: "ghcr.io", remoteUrl: "https://ghcr.io" }), "proxy-ghcr.io");
});

test("RegistryProxies - containerState", async () => {
  const runner = new FakeCommandRunner()
    .on("docker inspect --format {{.State.Running}} up", { stdout: "true\n" })
    .on("docker inspect --format {{.State.Running}} down", { stdout: "false\n" })
    .on("docker inspect --format {{.State.Running}} gone", { code: 1, stderr: "Error: No such object: gone" });
  const proxies = new RegistryProxies(runner, "docker", DOCKER_HUB);

  assert.equal(await proxies.containerState("up"), "running");
  assert.equal(await proxies.containerState("down"), "stopped");
  assert.equal(await proxies.containerState("gone"), "missing");
});

test("RegistryProxies - creates the network and a missing proxy", async () => {
  const runner = new FakeCommandRunner()
    .on("docker network inspect kind", { code: 1 })
    .on(INSPECT, { code: 1 });

  const names = await new RegistryProxies(runner, "docker", DOCKER_HUB).setup();

  assert.deepEqual(names, ["proxy-docker.io"]);
  assert.deepEqual(runner.commandLines(), [
    "docker network inspect kind",
    "docker network create kind",
    INSPECT,
    "docker run -d --restart=always --name proxy-docker.io -e REGISTRY_PROXY_REMOTEURL=https://registry-1.docker.io registry:2",
    "docker network connect kind proxy-docker.io",
  ]);
});

test("RegistryProxies - restarts a stopped proxy on an existing network", async () => {
  const runner = new FakeCommandRunner().on(INSPECT, { stdout: "false\n" });

  await new RegistryProxies(runner, "docker", DOCKER_HUB).setup();

  assert.deepEqual(runner.commandLines(), [
    "docker network inspect kind",
    INSPECT,
    "docker start proxy-docker.io",
    "docker network connect kind proxy-docker.io",
  ]);
});

test("RegistryProxies - an already connected proxy is fine", async () => {
  const runner = new FakeCommandRunner()
    .on(INSPECT, { stdout: "true\n" })
    .on("docker network connect kind proxy-docker.io", {
      code: 1,
      stderr: "Error response from daemon: endpoint with name proxy-docker.io already exists in network kind",
    });

  assert.deepEqual(await new RegistryProxies(runner, "docker", DOCKER_HUB).setup(), ["proxy-docker.io"]);
  assert.equal(runner.call("docker start proxy-docker.io"), undefined);
});

test("RegistryProxies - other connect errors abort", async () => {
  const runner = new FakeCommandRunner()
    .on(INSPECT, { stdout: "true\n" })
    .on("docker network connect kind proxy-docker.io", { code: 1, stderr: "Error: network kind not found" });

  await assert.rejects(
    new RegistryProxies(runner, "docker", DOCKER_HUB).setup(),
    (error: unknown) =>
      error instanceof CommandError &&
      error.message === "'docker network connect kind proxy-docker.io' exited with code 1: Error: network kind not found",
  );
});

test("RegistryProxies - uses the detected runtime binary", async () => {
  const runner = new FakeCommandRunner();
  await new RegistryProxies(runner, "podman").setup();

  assert.equal(runner.calls.every((call) => call.command === "podman"), true);
  assert.equal(runner.calls.filter((call) => call.args[0] === "network" && call.args[1] === "connect").length, 4);
});
