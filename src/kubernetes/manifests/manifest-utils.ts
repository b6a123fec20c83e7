/**
 * @fileoverview Building and rendering the documents this tool applies or writes.
 *
 * Secrets are built the way `kubectl create secret --dry-run=client -o yaml`
 * builds them, then piped to `kubectl apply -f -`. The kcp admin kubeconfig
 * is rendered with the same YAML settings.
 *
 * @module ManifestUtils
 */

import { stringify as yamlStringify } from 'yaml';
import type { K8sSecret, Kubeconfig } from './manifest-types.ts';

export interface SecretInput {
  name: string;
  namespace: string;
  type?: K8sSecret['type'];
  /** Raw values; encoded to base64 when the secret is built */
  data: Record<string, string | Buffer>;
}

export interface KubeconfigInput {
  clusterName: string;
  server: string;
  userName: string;
  /** Values already base64-encoded, as read from a Secret's `data` */
  caData: string;
  certData: string;
  keyData: string;
}

export class ManifestUtils {
  static encode(value: string | Buffer): string {
    return (typeof value === 'string' ? Buffer.from(value, 'utf8') : value).toString('base64');
  }

  static secret(input: SecretInput): K8sSecret {
    const data: Record<string, string> = {};
    for (const [key, value] of Object.entries(input.data)) {
      data[key] = ManifestUtils.encode(value);
    }
    return {
      apiVersion: 'v1',
      kind: 'Secret',
      metadata: { name: input.name, namespace: input.namespace },
      type: input.type ?? 'Opaque',
      data,
    };
  }

  static kubeconfig(input: KubeconfigInput): Kubeconfig {
    return {
      apiVersion: 'v1',
      kind: 'Config',
      clusters: [{
        name: input.clusterName,
        cluster: {
          server: input.server,
          'certificate-authority-data': input.caData,
        },
      }],
      users: [{
        name: input.userName,
        user: {
          'client-certificate-data': input.certData,
          'client-key-data': input.keyData,
        },
      }],
      contexts: [{
        name: input.clusterName,
        context: { cluster: input.clusterName, user: input.userName },
      }],
      'current-context': input.clusterName,
      preferences: {},
    };
  }

  /**
   * Renders one document as YAML.
   */
  static render(document: K8sSecret | Kubeconfig): string {
    return yamlStringify(document, { indent: 2, lineWidth: 0 });
  }

  /**
   * Renders several documents as one multi-document YAML stream.
   */
  static renderAll(documents: K8sSecret[]): string {
    return documents.map((document) => ManifestUtils.render(document)).join('---\n');
  }
}
