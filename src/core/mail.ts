/**
 * Email Sender
 * Sends mail through Graph as a published email app, authenticated by its certificate
 */

import fs from 'fs';
import path from 'path';
import {
  EmailAppResult,
  MailAttachment,
  MailContentType,
  OutgoingMessage,
  StoreLocation,
} from '../types';
import { DEFAULTS } from '../utils/constants';
import { NotFoundError, ValidationError } from '../utils/errors';
import { assertEmail, assertGuid, normalizeThumbprint } from '../utils/validation';
import { AppTokenSource } from './auth';
import { AuditLog } from './audit-log';
import { CertificateStore, toSubjectName } from './certificates';
import { GraphClient, MailApi } from './graph';
import { SecretVault } from './vault';

export interface SendEmailOptions {
  appName?: string;
  appId?: string;
  tenantId?: string;
  certThumbprint?: string;
  vaultName?: string;
  storeLocation?: StoreLocation;
  // Defaults to the app's send-as mailbox when the app comes from the vault
  from?: string;
  to: string[];
  cc?: string[];
  bcc?: string[];
  subject: string;
  body: string;
  contentType?: MailContentType;
  attachments?: string[];
  saveToSentItems?: boolean;
}

export interface SendEmailResult {
  from: string;
  appId: string;
  recipients: number;
  attachments: number;
}

interface SenderIdentity {
  appId: string;
  tenantId: string;
  thumbprint: string;
  from?: string;
  storeLocation?: StoreLocation;
}

const CONTENT_TYPES: Record<string, string> = {
  '.csv': 'text/csv',
  '.htm': 'text/html',
  '.html': 'text/html',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.json': 'application/json',
  '.pdf': 'application/pdf',
  '.png': 'image/png',
  '.txt': 'text/plain',
  '.zip': 'application/zip',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isEmailAppResult(value: unknown): value is EmailAppResult {
  if (!isRecord(value) || value.kind !== 'email') {
    return false;
  }
  return (
    ['appId', 'tenantId', 'certificateThumbprint', 'sendAsUserEmail'].every(
      (key) => typeof value[key] === 'string'
    ) &&
    (value.certificateStoreLocation === 'CurrentUser' || value.certificateStoreLocation === 'LocalMachine')
  );
}

/**
 * Parse a vault payload; anything other than an email app result is rejected
 */
export function parsePublishedApp(json: string, secretName: string): EmailAppResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new ValidationError(`Secret ${secretName} does not contain JSON`, { secretName, cause: String(error) });
  }
  if (!isEmailAppResult(parsed)) {
    throw new ValidationError(`Secret ${secretName} does not describe an email app`, { secretName });
  }
  return parsed;
}

export function readAttachment(filePath: string): MailAttachment {
  if (!fs.existsSync(filePath)) {
    throw new NotFoundError(`Attachment ${filePath} not found`, { path: filePath });
  }
  const ext = path.extname(filePath).toLowerCase();
  return {
    name: path.basename(filePath),
    contentType: CONTENT_TYPES[ext] || 'application/octet-stream',
    contentBytes: fs.readFileSync(filePath).toString('base64'),
  };
}

export class EmailSender {
  private vault: SecretVault;
  private certificates: CertificateStore;
  private tokens: AppTokenSource;
  private audit: AuditLog;
  private createMailClient: (accessToken: string) => MailApi;

  constructor(options: {
    vault: SecretVault;
    certificates: CertificateStore;
    tokens: AppTokenSource;
    audit: AuditLog;
    createMailClient?: (accessToken: string) => MailApi;
  }) {
    this.vault = options.vault;
    this.certificates = options.certificates;
    this.tokens = options.tokens;
    this.audit = options.audit;
    this.createMailClient = options.createMailClient || ((token) => new GraphClient(token));
  }

  async send(options: SendEmailOptions): Promise<SendEmailResult> {
    return this.audit.track('EmailSender.send', async () => {
      const identity = this.resolveIdentity(options);
      const from = options.from || identity.from;
      if (!from) {
        throw new ValidationError('A sender mailbox is required when no app name is given');
      }
      assertEmail(from, 'sender');

      const message = this.buildMessage(options);
      const storeLocation = options.storeLocation || identity.storeLocation || DEFAULTS.STORE_LOCATION;
      const privateKey = this.certificates.getPrivateKeyPem(storeLocation, identity.thumbprint);

      const accessToken = await this.tokens.getAccessToken({
        tenantId: identity.tenantId,
        clientId: identity.appId,
        thumbprint: identity.thumbprint,
        privateKey,
      });

      await this.createMailClient(accessToken).sendMail(from, message, options.saveToSentItems !== false);

      const recipients =
        message.toRecipients.length + message.ccRecipients.length + message.bccRecipients.length;
      this.audit.log(`Sent "${message.subject}" from ${from} to ${recipients} recipient(s)`);

      return {
        from,
        appId: identity.appId,
        recipients,
        attachments: message.attachments.length,
      };
    });
  }

  private resolveIdentity(options: SendEmailOptions): SenderIdentity {
    if (options.appName) {
      const secretName = toSubjectName(options.appName);
      const vaultName = options.vaultName || DEFAULTS.VAULT_NAME;
      const secret = this.vault.getSecret(vaultName, secretName);
      if (!secret) {
        throw new NotFoundError(`Secret ${secretName} not found in vault ${vaultName}`, {
          secretName,
          vaultName,
        });
      }
      const app = parsePublishedApp(secret.value, secretName);
      this.audit.log(`Using ${app.displayName} (${app.appId}) from vault ${vaultName}`, 'Verbose');
      return {
        appId: app.appId,
        tenantId: app.tenantId,
        thumbprint: normalizeThumbprint(app.certificateThumbprint),
        from: app.sendAsUserEmail,
        storeLocation: app.certificateStoreLocation,
      };
    }

    const { appId, tenantId, certThumbprint } = options;
    if (!appId || !tenantId || !certThumbprint) {
      throw new ValidationError('Provide an app name, or an app id with tenant id and certificate thumbprint');
    }
    assertGuid(appId, 'app id');
    assertGuid(tenantId, 'tenant id');
    return { appId, tenantId, thumbprint: normalizeThumbprint(certThumbprint) };
  }

  private buildMessage(options: SendEmailOptions): OutgoingMessage {
    const to = options.to;
    const cc = options.cc || [];
    const bcc = options.bcc || [];
    if (to.length === 0) {
      throw new ValidationError('At least one recipient is required');
    }
    to.forEach((address) => assertEmail(address, 'recipient'));
    cc.forEach((address) => assertEmail(address, 'cc recipient'));
    bcc.forEach((address) => assertEmail(address, 'bcc recipient'));

    return {
      subject: options.subject,
      body: { contentType: options.contentType || 'HTML', content: options.body },
      toRecipients: to,
      ccRecipients: cc,
      bccRecipients: bcc,
      attachments: (options.attachments || []).map(readAttachment),
    };
  }
}
