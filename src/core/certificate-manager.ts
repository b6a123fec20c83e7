/**
 * @fileoverview Local TLS certificates issued by mkcert.
 *
 * The certificate directory holds `cert.crt`, `cert.key` and the mkcert
 * root CA copied to `ca.crt`. Those three files end up in the
 * `domain-certificate` secrets.
 *
 * @module CertificateManager
 */

import { copyFile, mkdir, rm, stat } from "node:fs/promises";
import path from "node:path";
import { CERTIFICATE_HOSTS } from "../constants.ts";
import { Logger } from "../logger.ts";
import { type CommandRunner, runChecked } from "./command-runner.ts";

export interface CertificatePaths {
  cert: string;
  key: string;
  ca: string;
}

export class CertificateManager {
  constructor(
    private readonly runner: CommandRunner,
    private readonly certsDir: string,
  ) {}

  get paths(): CertificatePaths {
    return {
      cert: path.join(this.certsDir, "cert.crt"),
      key: path.join(this.certsDir, "cert.key"),
      ca: path.join(this.certsDir, "ca.crt"),
    };
  }

  async exists(): Promise<boolean> {
    try {
      return (await stat(this.certsDir)).isDirectory();
    } catch {
      return false;
    }
  }

  /**
   * Removes the certificate directory and everything in it.
   */
  async clear(): Promise<void> {
    if (await this.exists()) {
      Logger.info("Clearing existing certs directory");
      await rm(this.certsDir, { recursive: true, force: true });
    }
  }

  /**
   * Issues the wildcard certificate for the local domains and copies the
   * mkcert root CA next to it.
   *
   * @param mkcertCommand - mkcert binary, from PATH or the bundled copy
   */
  async generate(mkcertCommand: string): Promise<CertificatePaths> {
    const paths = this.paths;
    await mkdir(this.certsDir, { recursive: true });

    await runChecked(
      this.runner,
      mkcertCommand,
      [`-cert-file=${paths.cert}`, `-key-file=${paths.key}`, ...CERTIFICATE_HOSTS],
      { stdio: "pipe" },
    );

    const caRoot = await runChecked(this.runner, mkcertCommand, ["-CAROOT"], { stdio: "pipe" });
    await copyFile(path.join(caRoot.stdout.trim(), "rootCA.pem"), paths.ca);

    return paths;
  }
}
