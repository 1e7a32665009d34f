/**
 * Trusted root certificates for outbound HTTPS
 *
 * Requests never fall back to the host's trust store: either the PEM bundle
 * named by CA_BUNDLE_PATH or the Mozilla roots bundled with Node is passed
 * explicitly to every connection.
 */

import { readFile } from 'node:fs/promises';
import { rootCertificates } from 'node:tls';
import { Agent } from 'undici';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

const PEM_BLOCK = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;

/**
 * Load the certificate list used for TLS verification
 */
export async function loadTrustedCertificates(bundlePath?: string): Promise<string[]> {
  if (!bundlePath) {
    return [...rootCertificates];
  }

  let pem: string;
  try {
    pem = await readFile(bundlePath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read CA bundle at ${bundlePath}`, { bundlePath, cause: error });
  }

  const certificates = pem.match(PEM_BLOCK) ?? [];
  if (certificates.length === 0) {
    throw new ConfigError(`CA bundle at ${bundlePath} contains no certificates`, { bundlePath });
  }

  logger.debug({ bundlePath, certificates: certificates.length }, 'Loaded CA bundle');
  return certificates;
}

export function createTrustedAgent(ca: string[] = [...rootCertificates]): Agent {
  return new Agent({ connect: { ca } });
}
