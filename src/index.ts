/**
 * @fileoverview Library entry point.
 *
 * ## Module Organization:
 * - **Core**: command execution, cluster selection, certificates, kubectl and helm
 * - **Kubernetes**: Secret and kubeconfig documents
 * - **Development**: environment checks, install sequence, workflows
 * - **Types**: shared type definitions
 *
 * ## Usage:
 * ```typescript
 * import { EnvironmentInitializer, loadSetupConfig } from './src/index.ts';
 *
 * await new EnvironmentInitializer(loadSetupConfig()).start();
 * ```
 */

export * from './core/index.ts';
export * from './kubernetes/index.ts';
export * from './development/index.ts';
export * from './types/index.ts';
export { Logger } from './logger.ts';
export { CommandError, ConfigurationError, EnvironmentCheckError, errorMessage } from './errors.ts';
export { DEFAULT_OPTIONS, loadSetupConfig, parseWaitTimeout } from './config-manager.ts';
