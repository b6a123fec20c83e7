import { Command, type OutputConfiguration } from "commander";
import { Logger } from "../logger.ts";
import type { SetupOptions } from "../types/index.ts";

export interface CliHandlers {
  start(options: SetupOptions, setupDir?: string): Promise<void>;
  check(options: SetupOptions, setupDir?: string): Promise<void>;
  cleanup(assumeYes: boolean, setupDir?: string): Promise<void>;
}

export interface ProgramSettings {
  version?: string;
  /** Throw instead of exiting the process on parse errors and --help */
  exitOverride?: boolean;
  output?: OutputConfiguration;
}

interface StartFlags {
  prerelease?: boolean;
  cached?: boolean;
  exampleData?: boolean;
  latest?: boolean;
  setupDir?: string;
}

interface CleanupFlags {
  yes?: boolean;
  setupDir?: string;
}

/**
 * Converts parsed flags into setup options; absent flags are false.
 */
export function toSetupOptions(flags: StartFlags): SetupOptions {
  return {
    prerelease: flags.prerelease ?? false,
    cached: flags.cached ?? false,
    exampleData: flags.exampleData ?? false,
    latest: flags.latest ?? false,
  };
}

const SETUP_DIR_DESCRIPTION = "local-setup directory holding kind/, kustomize/ and example-data/ (default: $LOCAL_SETUP_DIR or cwd)";

/**
 * Builds the command-line program. `start` is the default command, so the
 * bare flags (`--latest`, `--cached`, ...) work without naming it.
 */
export function createProgram(handlers: CliHandlers, settings: ProgramSettings = {}): Command {
  const program = new Command();
  if (settings.exitOverride) {
    program.exitOverride();
  }
  if (settings.output) {
    program.configureOutput(settings.output);
  }
  program.showHelpAfterError();

  program
    .name("platform-mesh-local-setup")
    .description("Bootstrap a local platform-mesh environment on kind or k3d")
    .version(settings.version ?? "0.0.0")
    .addHelpText(
      "after",
      `
Environment Variables:
  DEBUG                  Set to 'true' to trace every external command
  KUBECTL_WAIT_TIMEOUT   Timeout for each kubectl wait (default: 900s)
  LOCAL_SETUP_DIR        Default for --setup-dir
`,
    );

  program
    .command("start", { isDefault: true })
    .description("detect or create the cluster and install the platform")
    .argument("[args...]", "ignored")
    .option("--prerelease", "allow pre-release chart versions")
    .option("--cached", "start registry proxies and use the cached kind configuration")
    .option("--example-data", "install example data and provider workspaces")
    .option("--latest", "use the latest OCM component version")
    .option("--setup-dir <path>", SETUP_DIR_DESCRIPTION)
    .action(async (args: string[], flags: StartFlags) => {
      for (const arg of args) {
        Logger.plain(`Ignoring positional arg: ${arg}`);
      }
      await handlers.start(toSetupOptions(flags), flags.setupDir);
    });

  program
    .command("check")
    .description("run the environment dependency checks only")
    .option("--example-data", "also require the kubectl kcp plugin")
    .option("--setup-dir <path>", SETUP_DIR_DESCRIPTION)
    .action(async (flags: StartFlags) => {
      await handlers.check(toSetupOptions(flags), flags.setupDir);
    });

  program
    .command("cleanup")
    .description("delete the kind cluster and generated certificates")
    .option("-y, --yes", "do not ask for confirmation")
    .option("--setup-dir <path>", SETUP_DIR_DESCRIPTION)
    .action(async (flags: CleanupFlags) => {
      await handlers.cleanup(flags.yes ?? false, flags.setupDir);
    });

  return program;
}
