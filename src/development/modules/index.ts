/**
 * @fileoverview Export point for the setup workflow modules.
 */

export { EnvironmentInitializer, type InitializerDependencies } from './environment-initializer.ts';
export { EnvironmentChecker, checkArchitecture, type EnvironmentCheckerOptions } from './environment-checker.ts';
export { PlatformInstaller, type InstallStep } from './platform-installer.ts';
export { RegistryProxies, proxyContainerName, type ProxyState } from './registry-proxies.ts';
export { KcpAdmin, adminKubeconfigInput, rootWorkspaceUrl } from './kcp-admin.ts';
export { WslCompatibility } from './wsl-compatibility.ts';
