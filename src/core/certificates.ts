/**
 * Certificate Store and Provider
 * File-backed certificate store plus self-signed certificate provisioning
 */

import fs from 'fs';
import path from 'path';
import * as forge from 'node-forge';
import {
  CertificateDescriptor,
  CertificatePlan,
  KeyExportPolicy,
  StoreLocation,
  StoredCertificate,
} from '../types';
import { DEFAULTS, PATHS } from '../utils/constants';
import { encrypt, decrypt } from '../utils/crypto';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors';
import { PATTERNS, normalizeThumbprint } from '../utils/validation';
import { logger } from '../utils/logger';
import { AuditLog } from './audit-log';

export interface GeneratedCertificate {
  descriptor: CertificateDescriptor;
  certPem: string;
  keyPem: string;
}

export type CertificateGenerator = (
  subject: string,
  exportPolicy: KeyExportPolicy,
  storeLocation: StoreLocation
) => GeneratedCertificate;

/**
 * Normalise a subject to its "CN=<name>" form
 */
export function toSubjectName(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) {
    throw new ValidationError('Certificate subject must not be empty');
  }
  return /^CN=/i.test(trimmed) ? `CN=${trimmed.slice(3)}` : `CN=${trimmed}`;
}

function derBytes(cert: forge.pki.Certificate): string {
  return forge.asn1.toDer(forge.pki.certificateToAsn1(cert)).getBytes();
}

function thumbprintOf(cert: forge.pki.Certificate): string {
  const md = forge.md.sha1.create();
  md.update(derBytes(cert));
  return md.digest().toHex().toUpperCase();
}

export interface CertificateGeneratorOptions {
  keyBits?: number;
  validityDays?: number;
}

/**
 * RSA, SHA-256 signed, signature-only self-signed certificates
 */
export function createCertificateGenerator(options?: CertificateGeneratorOptions): CertificateGenerator {
  const keyBits = options?.keyBits ?? DEFAULTS.CERT_KEY_BITS;
  const validityDays = options?.validityDays ?? DEFAULTS.CERT_VALIDITY_DAYS;

  return (subject, exportPolicy, storeLocation) => {
    const subjectName = toSubjectName(subject);
    const keys = forge.pki.rsa.generateKeyPair({ bits: keyBits, e: 0x10001 });
    const cert = forge.pki.createCertificate();

    cert.publicKey = keys.publicKey;
    cert.serialNumber = `01${forge.util.bytesToHex(forge.random.getBytesSync(15))}`;

    const notBefore = new Date();
    const notAfter = new Date(notBefore.getTime() + validityDays * 24 * 60 * 60 * 1000);
    cert.validity.notBefore = notBefore;
    cert.validity.notAfter = notAfter;

    const attrs = [{ name: 'commonName', value: subjectName.slice(3) }];
    cert.setSubject(attrs);
    cert.setIssuer(attrs);
    cert.setExtensions([
      { name: 'basicConstraints', cA: false },
      { name: 'keyUsage', critical: true, digitalSignature: true },
    ]);
    cert.sign(keys.privateKey, forge.md.sha256.create());

    return {
      descriptor: {
        thumbprint: thumbprintOf(cert),
        subjectName,
        notBefore: notBefore.toISOString(),
        expiryTimestamp: notAfter.toISOString(),
        exportPolicy,
        storeLocation,
      },
      certPem: forge.pki.certificateToPem(cert),
      keyPem: forge.pki.privateKeyToPem(keys.privateKey),
    };
  };
}

export const generateSelfSignedCertificate: CertificateGenerator = createCertificateGenerator();

export class CertificateStore {
  private rootDir: string;

  constructor(rootDir?: string) {
    this.rootDir = rootDir || path.resolve(PATHS.CERT_DIR);
  }

  private locationDir(location: StoreLocation): string {
    return path.join(this.rootDir, location);
  }

  private certFile(location: StoreLocation, thumbprint: string): string {
    return path.join(this.locationDir(location), `${thumbprint}.json`);
  }

  private read(location: StoreLocation, thumbprint: string): StoredCertificate | undefined {
    const file = this.certFile(location, normalizeThumbprint(thumbprint));
    if (!fs.existsSync(file)) {
      return undefined;
    }
    const stored: StoredCertificate = JSON.parse(fs.readFileSync(file, 'utf-8'));
    return stored;
  }

  private require(location: StoreLocation, thumbprint: string): StoredCertificate {
    const stored = this.read(location, thumbprint);
    if (!stored) {
      throw new NotFoundError(`Certificate with thumbprint ${thumbprint} not found`, {
        thumbprint,
        storeLocation: location,
      });
    }
    return stored;
  }

  /**
   * Get a certificate by thumbprint
   */
  get(location: StoreLocation, thumbprint: string): CertificateDescriptor | undefined {
    const stored = this.read(location, thumbprint);
    return stored ? toDescriptor(stored) : undefined;
  }

  /**
   * List all certificates in a store location
   */
  list(location: StoreLocation): CertificateDescriptor[] {
    const dir = this.locationDir(location);
    if (!fs.existsSync(dir)) {
      return [];
    }
    return fs
      .readdirSync(dir)
      .filter((f) => f.endsWith('.json'))
      .map((f) => path.basename(f, '.json'))
      .filter((name) => PATTERNS.THUMBPRINT.test(name))
      .map((thumbprint) => this.require(location, thumbprint))
      .map(toDescriptor)
      .sort((a, b) => a.subjectName.localeCompare(b.subjectName));
  }

  findBySubject(location: StoreLocation, subject: string): CertificateDescriptor | undefined {
    const wanted = toSubjectName(subject).toLowerCase();
    return this.list(location).find((c) => c.subjectName.toLowerCase() === wanted);
  }

  add(generated: GeneratedCertificate): CertificateDescriptor {
    const { descriptor } = generated;
    const dir = this.locationDir(descriptor.storeLocation);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const stored: StoredCertificate = {
      ...descriptor,
      certPem: generated.certPem,
      keyPem: encrypt(generated.keyPem),
    };
    fs.writeFileSync(
      this.certFile(descriptor.storeLocation, descriptor.thumbprint),
      JSON.stringify(stored, null, 2),
      { mode: 0o600 }
    );

    logger.debug(`Stored certificate ${descriptor.subjectName} (${descriptor.thumbprint})`);
    return { ...descriptor };
  }

  remove(location: StoreLocation, thumbprint: string): boolean {
    const file = this.certFile(location, normalizeThumbprint(thumbprint));
    if (!fs.existsSync(file)) {
      return false;
    }
    fs.unlinkSync(file);
    logger.debug(`Removed certificate ${thumbprint} from ${location}`);
    return true;
  }

  /**
   * DER encoding of the certificate, base64 encoded
   */
  getRawData(location: StoreLocation, thumbprint: string): string {
    const stored = this.require(location, thumbprint);
    return forge.util.encode64(derBytes(forge.pki.certificateFromPem(stored.certPem)));
  }

  /**
   * Private key for signing in this process; not subject to the export policy
   */
  getPrivateKeyPem(location: StoreLocation, thumbprint: string): string {
    return decrypt(this.require(location, thumbprint).keyPem);
  }

  /**
   * Export certificate and key as PEM, honouring the key export policy
   */
  exportPem(location: StoreLocation, thumbprint: string): { certPem: string; keyPem: string } {
    const stored = this.require(location, thumbprint);
    if (stored.exportPolicy === 'NonExportable') {
      throw new ConflictError(
        `Private key of certificate ${stored.thumbprint} is marked NonExportable`,
        { thumbprint: stored.thumbprint }
      );
    }
    return { certPem: stored.certPem, keyPem: decrypt(stored.keyPem) };
  }
}

function toDescriptor(stored: StoredCertificate): CertificateDescriptor {
  return {
    thumbprint: stored.thumbprint,
    subjectName: stored.subjectName,
    notBefore: stored.notBefore,
    expiryTimestamp: stored.expiryTimestamp,
    exportPolicy: stored.exportPolicy,
    storeLocation: stored.storeLocation,
  };
}

export interface CertificateRequest {
  thumbprint?: string;
  subject: string;
  storeLocation: StoreLocation;
  exportPolicy: KeyExportPolicy;
  replaceExisting?: boolean;
}

export class CertificateProvider {
  private store: CertificateStore;
  private audit: AuditLog;
  private generate: CertificateGenerator;

  constructor(store: CertificateStore, audit: AuditLog, generate?: CertificateGenerator) {
    this.store = store;
    this.audit = audit;
    this.generate = generate || generateSelfSignedCertificate;
  }

  /**
   * Describe what resolve() would do, without touching the store
   */
  plan(request: CertificateRequest): CertificatePlan {
    if (request.thumbprint) {
      const existing = this.store.get(request.storeLocation, request.thumbprint);
      if (!existing) {
        throw new NotFoundError(`Certificate with thumbprint ${request.thumbprint} not found`, {
          thumbprint: request.thumbprint,
        });
      }
      return {
        action: 'use-existing',
        thumbprint: existing.thumbprint,
        subjectName: existing.subjectName,
        expiryTimestamp: existing.expiryTimestamp,
      };
    }

    const subject = toSubjectName(request.subject);
    const collision = this.store.findBySubject(request.storeLocation, subject);
    if (!collision) {
      return { action: 'create', subject };
    }
    if (!request.replaceExisting) {
      throw new ConflictError(
        `Certificate with subject ${subject} already exists (${collision.thumbprint}). ` +
          'Pass its thumbprint to reuse it or opt into replacing it.',
        { subject, thumbprint: collision.thumbprint }
      );
    }
    return { action: 'replace', subject, existingThumbprint: collision.thumbprint };
  }

  /**
   * Fetch an existing certificate by thumbprint or create a new self-signed one
   */
  async resolve(request: CertificateRequest): Promise<CertificateDescriptor> {
    return this.audit.track('CertificateProvider.resolve', async () => {
      const plan = this.plan(request);

      if (plan.action === 'use-existing') {
        const existing = this.store.get(request.storeLocation, plan.thumbprint);
        if (!existing) {
          throw new NotFoundError(`Certificate with thumbprint ${plan.thumbprint} not found`);
        }
        this.audit.log(`Using existing certificate ${existing.subjectName} (${existing.thumbprint})`);
        return existing;
      }

      if (plan.action === 'replace') {
        this.store.remove(request.storeLocation, plan.existingThumbprint);
        this.audit.log(
          `Removed certificate ${plan.existingThumbprint} with subject ${plan.subject}`,
          'Warning'
        );
      }

      const created = this.store.add(
        this.generate(plan.subject, request.exportPolicy, request.storeLocation)
      );
      this.audit.log(
        `Created self-signed certificate ${created.subjectName} (${created.thumbprint}), ` +
          `expires ${created.expiryTimestamp}`
      );
      return created;
    });
  }
}
