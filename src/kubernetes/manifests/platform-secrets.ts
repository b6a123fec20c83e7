import { DEFAULT_NAMESPACE, SYSTEM_NAMESPACE } from '../../constants.ts';
import type { K8sSecret } from './manifest-types.ts';
import { ManifestUtils } from './manifest-utils.ts';

export interface CertificateFiles {
  cert: Buffer;
  key: Buffer;
  ca: Buffer;
}

/**
 * Secrets the platform charts expect before the operator is installed:
 * the Keycloak admin password, the domain certificate in both namespaces
 * and the CA on its own.
 */
export function platformSecrets(files: CertificateFiles): K8sSecret[] {
  const tls = {
    'tls.crt': files.cert,
    'tls.key': files.key,
    'ca.crt': files.ca,
  };

  return [
    ManifestUtils.secret({
      name: 'keycloak-admin',
      namespace: SYSTEM_NAMESPACE,
      data: { secret: 'admin' },
    }),
    ManifestUtils.secret({
      name: 'domain-certificate',
      namespace: DEFAULT_NAMESPACE,
      type: 'kubernetes.io/tls',
      data: tls,
    }),
    ManifestUtils.secret({
      name: 'domain-certificate',
      namespace: SYSTEM_NAMESPACE,
      type: 'kubernetes.io/tls',
      data: tls,
    }),
    ManifestUtils.secret({
      name: 'domain-certificate-ca',
      namespace: SYSTEM_NAMESPACE,
      data: { 'tls.crt': files.ca },
    }),
  ];
}
