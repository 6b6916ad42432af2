// ---------------------------------------------------------------------------
// Directory credential resolution
//
// The certificate comes from a pluggable source (a PEM file on disk or a PEM
// held in configuration). Whatever the source, its SHA-1 thumbprint must
// match CertificateThumbprint before a credential is built.
// ---------------------------------------------------------------------------

import fs from 'fs';
import { X509Certificate } from 'crypto';
import { ClientCertificateCredential } from '@azure/identity';
import type { TokenCredential } from '@azure/identity';
import type { CertificateSource, IdentityConfig } from '../config';
import { ConfigurationError } from '../errors';

/** Returns the PEM (private key and certificate) for an identity. */
export type CertificateLoader = (identity: IdentityConfig) => string;

const CERTIFICATE_BLOCK = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/;

export const certificateLoaders: Record<CertificateSource, CertificateLoader> = {
  file: (identity) => {
    const certificatePath = identity.certificatePath;
    if (!certificatePath) {
      throw new ConfigurationError('CertificatePath is required for the file source.', 'CertificatePath');
    }
    if (!fs.existsSync(certificatePath)) {
      throw new ConfigurationError(`Certificate not found at ${certificatePath}.`, 'CertificatePath');
    }
    return fs.readFileSync(certificatePath, 'utf8');
  },

  env: (identity) => {
    if (!identity.certificatePem) {
      throw new ConfigurationError('CertificatePem is required for the env source.', 'CertificatePem');
    }
    return identity.certificatePem;
  },
};

export function normalizeThumbprint(thumbprint: string): string {
  return thumbprint.replace(/[^0-9a-f]/gi, '').toUpperCase();
}

/**
 * SHA-1 thumbprint of the first certificate in a PEM bundle, as uppercase
 * hex without separators.
 */
export function certificateThumbprint(pem: string): string {
  const block = CERTIFICATE_BLOCK.exec(pem);
  if (!block) {
    throw new ConfigurationError('Certificate not found: the PEM holds no certificate block.');
  }

  let certificate: X509Certificate;
  try {
    certificate = new X509Certificate(block[0]);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Certificate could not be parsed: ${reason}`);
  }
  return normalizeThumbprint(certificate.fingerprint);
}

export function resolveCredential(
  identity: IdentityConfig,
  loaders: Record<CertificateSource, CertificateLoader> = certificateLoaders,
): TokenCredential {
  const pem = loaders[identity.certificateSource](identity);

  const expected = normalizeThumbprint(identity.certificateThumbprint);
  const actual = certificateThumbprint(pem);
  if (actual !== expected) {
    throw new ConfigurationError(
      `Certificate not found: thumbprint ${actual} does not match ${expected}.`,
      'CertificateThumbprint',
    );
  }

  return new ClientCertificateCredential(identity.tenantId, identity.clientId, {
    certificate: pem,
  });
}
