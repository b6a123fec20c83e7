#!/usr/bin/env tsx

import { readFileSync } from "node:fs";
import { loadSetupConfig } from "./src/config-manager.ts";
import { EnvironmentInitializer } from "./src/development/modules/environment-initializer.ts";
import { EnvironmentCheckError, errorMessage } from "./src/errors.ts";
import { Logger } from "./src/logger.ts";
import type { SetupOptions } from "./src/types/index.ts";
import { createProgram } from "./src/utils/cli-helpers.ts";

function packageVersion(): string {
  const manifest: unknown = JSON.parse(
    readFileSync(new URL("./package.json", import.meta.url), "utf8"),
  );
  if (typeof manifest === "object" && manifest !== null && "version" in manifest && typeof manifest.version === "string") {
    return manifest.version;
  }
  return "0.0.0";
}

function initializer(options: Partial<SetupOptions>, setupDir?: string): EnvironmentInitializer {
  const config = loadSetupConfig({ options, setupDir });
  Logger.setDebug(config.debug);
  return new EnvironmentInitializer(config);
}

const program = createProgram(
  {
    start: async (options, setupDir) => {
      await initializer(options, setupDir).start();
    },
    check: async (options, setupDir) => {
      await initializer(options, setupDir).check();
    },
    cleanup: async (assumeYes, setupDir) => {
      await initializer({}, setupDir).cleanup(assumeYes);
    },
  },
  { version: packageVersion() },
);

program.parseAsync(process.argv).then(
  () => process.exit(0),
  (error: unknown) => {
    // the checker has already reported each failed check and the total
    if (!(error instanceof EnvironmentCheckError)) {
      Logger.error(`Error: ${errorMessage(error)}`);
    }
    process.exit(1);
  },
);
