/**
 * Certificate Provisioner
 *
 * Maintains a local root CA and a wildcard leaf certificate for the local
 * domains. Signing goes through the openssl CLI; inspection uses node:crypto.
 */

import { X509Certificate } from 'crypto';
import fs from 'fs';
import path from 'path';
import { CERTIFICATES, LOOPBACK_ADDRESS } from '../config/constants.js';
import { CertificateError, MissingToolError, getErrorMessage } from '../core/errors.js';
import { getComponentLogger } from '../infrastructure/logger/index.js';
import { runOrThrow, type CommandRunner } from '../infrastructure/shell/index.js';
import { pathExists as exists } from '../utils/fs.js';

const logger = getComponentLogger('Certificates');

// =============================================================================
// TYPES
// =============================================================================

export interface CertificatePaths {
  dir: string;
  caKey: string;
  caCert: string;
  serverKey: string;
  serverCsr: string;
  serverCert: string;
  requestConfig: string;
  fullchain: string;
  privkey: string;
}

export type ArtifactState = 'created' | 'existing';

export interface CertificateInspection {
  subject: string;
  issuer: string;
  subjectAltNames: string[];
  validFrom: Date;
  validTo: Date;
  /** Leaf signature verifies against the authority's public key */
  signedByAuthority: boolean;
}

export interface ProvisionResult {
  authority: ArtifactState;
  leaf: ArtifactState;
  inspection: CertificateInspection;
  paths: CertificatePaths;
}

export interface CertificateProvisionerOptions {
  certDir: string;
  domainSuffix: string;
  keyBits: number;
  /** Regenerate artifacts that already exist */
  force?: boolean;
}

export function certificatePaths(dir: string): CertificatePaths {
  const at = (name: string) => path.join(dir, name);
  return {
    dir,
    caKey: at('ca-key.pem'),
    caCert: at('ca.pem'),
    serverKey: at('server-key.pem'),
    serverCsr: at('server.csr'),
    serverCert: at('server.pem'),
    requestConfig: at('server.conf'),
    fullchain: at('fullchain.pem'),
    privkey: at('privkey.pem'),
  };
}

// =============================================================================
// REQUEST CONFIG
// =============================================================================

function subjectFields(commonName: string): string[] {
  const { C, ST, L, O, OU } = CERTIFICATES.SUBJECT;
  return [`C = ${C}`, `ST = ${ST}`, `L = ${L}`, `O = ${O}`, `OU = ${OU}`, `CN = ${commonName}`];
}

/**
 * OpenSSL request config for the leaf: the bare domain, its wildcard,
 * localhost and the loopback address.
 */
export function renderRequestConfig(domainSuffix: string): string {
  return [
    '[req]',
    'distinguished_name = req_distinguished_name',
    'req_extensions = v3_req',
    'prompt = no',
    '',
    '[req_distinguished_name]',
    ...subjectFields(domainSuffix),
    '',
    '[v3_req]',
    'keyUsage = keyEncipherment, dataEncipherment',
    'extendedKeyUsage = serverAuth',
    'subjectAltName = @alt_names',
    '',
    '[alt_names]',
    `DNS.1 = ${domainSuffix}`,
    `DNS.2 = *.${domainSuffix}`,
    'DNS.3 = localhost',
    `IP.1 = ${LOOPBACK_ADDRESS}`,
    '',
  ].join('\n');
}

function authoritySubject(): string {
  const { C, ST, L, O, OU } = CERTIFICATES.SUBJECT;
  return `/C=${C}/ST=${ST}/L=${L}/O=${O}/OU=${OU}/CN=${CERTIFICATES.CA_COMMON_NAME}`;
}

// =============================================================================
// PROVISIONER
// =============================================================================

export class CertificateProvisioner {
  readonly paths: CertificatePaths;

  constructor(
    private readonly runner: CommandRunner,
    private readonly options: CertificateProvisionerOptions
  ) {
    this.paths = certificatePaths(options.certDir);
  }

  /**
   * Ensures the authority and leaf exist, then inspects the leaf.
   *
   * @throws {MissingToolError} If openssl is not installed; nothing is written
   */
  async provision(): Promise<ProvisionResult> {
    await this.requireToolchain();
    const authority = await this.ensureAuthority();
    const leaf = await this.ensureLeaf(authority === 'created');
    const inspection = await this.inspect();
    return { authority, leaf, inspection, paths: this.paths };
  }

  /**
   * Creates the root key and self-signed certificate unless both exist.
   */
  async ensureAuthority(): Promise<ArtifactState> {
    const { caKey, caCert } = this.paths;
    if (!this.options.force && (await exists(caKey)) && (await exists(caCert))) {
      logger.debug('Certificate authority already present', { caCert });
      return 'existing';
    }

    await this.requireToolchain();
    await fs.promises.mkdir(this.paths.dir, { recursive: true });

    await this.openssl(['genrsa', '-out', caKey, String(this.options.keyBits)]);
    await this.openssl([
      'req',
      '-new',
      '-x509',
      '-sha256',
      '-days',
      String(CERTIFICATES.CA_VALIDITY_DAYS),
      '-key',
      caKey,
      '-out',
      caCert,
      '-subj',
      authoritySubject(),
    ]);

    logger.info('Certificate authority created', { caCert });
    return 'created';
  }

  /**
   * Creates the leaf key, request and signed certificate unless the key
   * exists. A freshly created authority always gets a fresh leaf.
   */
  async ensureLeaf(authorityRenewed = false): Promise<ArtifactState> {
    const p = this.paths;
    if (!this.options.force && !authorityRenewed && (await exists(p.serverKey))) {
      logger.debug('Leaf certificate already present', { serverCert: p.serverCert });
      return 'existing';
    }

    if (!(await exists(p.caKey)) || !(await exists(p.caCert))) {
      throw new CertificateError('Cannot sign the leaf certificate without an authority', {
        caKey: p.caKey,
        caCert: p.caCert,
      });
    }

    await this.requireToolchain();
    await fs.promises.writeFile(p.requestConfig, renderRequestConfig(this.options.domainSuffix), 'utf8');

    await this.openssl(['genrsa', '-out', p.serverKey, String(this.options.keyBits)]);
    await this.openssl(['req', '-new', '-key', p.serverKey, '-out', p.serverCsr, '-config', p.requestConfig]);
    await this.openssl([
      'x509',
      '-req',
      '-sha256',
      '-in',
      p.serverCsr,
      '-CA',
      p.caCert,
      '-CAkey',
      p.caKey,
      '-CAcreateserial',
      '-out',
      p.serverCert,
      '-days',
      String(CERTIFICATES.LEAF_VALIDITY_DAYS),
      '-extensions',
      'v3_req',
      '-extfile',
      p.requestConfig,
    ]);

    await fs.promises.copyFile(p.serverCert, p.fullchain);
    await fs.promises.copyFile(p.serverKey, p.privkey);

    logger.info('Leaf certificate created', { serverCert: p.serverCert, domain: this.options.domainSuffix });
    return 'created';
  }

  /**
   * Reads the generated pair and checks the leaf's issuer and signature.
   */
  async inspect(): Promise<CertificateInspection> {
    try {
      const leaf = new X509Certificate(await fs.promises.readFile(this.paths.serverCert));
      const authority = new X509Certificate(await fs.promises.readFile(this.paths.caCert));

      return {
        subject: leaf.subject,
        issuer: leaf.issuer,
        subjectAltNames: parseSubjectAltNames(leaf.subjectAltName),
        validFrom: new Date(leaf.validFrom),
        validTo: new Date(leaf.validTo),
        signedByAuthority: leaf.checkIssued(authority) && leaf.verify(authority.publicKey),
      };
    } catch (error) {
      throw new CertificateError(`Cannot inspect certificates: ${getErrorMessage(error)}`, {
        serverCert: this.paths.serverCert,
        caCert: this.paths.caCert,
      });
    }
  }

  // ---------------------------------------------------------------------------
  // Internal Methods
  // ---------------------------------------------------------------------------

  private async requireToolchain(): Promise<void> {
    if (!(await this.runner.which('openssl'))) {
      throw new MissingToolError('openssl', 'Install OpenSSL to generate development certificates');
    }
  }

  private async openssl(args: readonly string[]): Promise<void> {
    await runOrThrow(this.runner, 'openssl', args, { cwd: this.paths.dir });
  }
}

/**
 * Splits `DNS:a, DNS:*.a, IP Address:127.0.0.1` into `DNS:a`, `DNS:*.a`, `IP:127.0.0.1`.
 */
export function parseSubjectAltNames(raw: string | undefined): string[] {
  if (!raw) {
    return [];
  }
  return raw
    .split(',')
    .map((part) => part.trim().replace(/^IP Address:/, 'IP:'))
    .filter(Boolean);
}
