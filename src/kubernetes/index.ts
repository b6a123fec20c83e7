/**
 * @fileoverview Kubernetes document exports.
 */

export { ManifestUtils, type KubeconfigInput, type SecretInput } from './manifests/manifest-utils.ts';
export { platformSecrets, type CertificateFiles } from './manifests/platform-secrets.ts';
export * from './manifests/manifest-types.ts';
