import assert from "node:assert/strict";
import { writeFile } from "node:fs/promises";
import path from "node:path";
import { test } from "node:test";
import { WslCompatibility } from "../src/development/modules/wsl-compatibility.ts";
import { nativeLinux, withTempDir } from "./helpers/setup.ts";

async function wsl(root: string): Promise<WslCompatibility> {
  const procVersion = path.join(root, "version");
  await writeFile(procVersion, "Linux version 5.15.153.1-Microsoft-standard-WSL2 (gcc) #1 SMP");
  return new WslCompatibility(procVersion);
}

test("WslCompatibility - detection", async () => {
  await withTempDir(async (root) => {
    assert.equal(await (await wsl(root)).isWsl(), true);

    const linux = path.join(root, "linux");
    await writeFile(linux, "Linux version 6.8.0-45-generic (buildd@lcy02-amd64-075)");
    assert.equal(await new WslCompatibility(linux).isWsl(), false);
  });
  assert.equal(await nativeLinux().isWsl(), false);
});

test("WslCompatibility - warns about Windows mounts", async () => {
  await withTempDir(async (root) => {
    const compatibility = await wsl(root);

    assert.deepEqual(await compatibility.checkCompatibility("/home/dev/local-setup"), [
      "WSL detected. Make sure Docker Desktop runs with WSL2 integration enabled.",
    ]);
    assert.deepEqual(await compatibility.checkCompatibility("/mnt/c/work/local-setup"), [
      "WSL detected. Make sure Docker Desktop runs with WSL2 integration enabled.",
      "The setup directory /mnt/c/work/local-setup is on a Windows mount; clone the repository into the WSL filesystem for acceptable performance.",
    ]);
  });
});

test("WslCompatibility - silent outside WSL", async () => {
  const compatibility = nativeLinux();
  assert.deepEqual(await compatibility.checkCompatibility("/mnt/c/work"), []);
  assert.deepEqual(await compatibility.showHostsGuidance("127.0.0.1 portal.dev.local"), []);
});

test("WslCompatibility - hosts guidance names the Windows hosts file", async () => {
  await withTempDir(async (root) => {
    assert.deepEqual(await (await wsl(root)).showHostsGuidance("127.0.0.1 portal.dev.local"), [
      "WSL: add the entry to the Windows hosts file as well: C:\\Windows\\System32\\drivers\\etc\\hosts",
      "WSL: open an elevated editor on Windows and append: 127.0.0.1 portal.dev.local",
    ]);
  });
});
