/**
 * @fileoverview Core modules.
 *
 * - CommandRunner: execution of external binaries
 * - ClusterManager: k3d / kind cluster selection
 * - CertificateManager: mkcert certificates
 */

export { ClusterManager } from './cluster-manager.ts';
export { CertificateManager, type CertificatePaths } from './certificate-manager.ts';
export {
  ShellCommandRunner,
  formatCommand,
  runChecked,
  succeeds,
  type CommandResult,
  type CommandRunner,
  type RunOptions,
} from './command-runner.ts';
export * from './cluster/index.ts';
