/**
 * Microsoft Graph API Client
 * Directory and mail operations used by the publish and send-mail workflows
 */

import { Client } from '@microsoft/microsoft-graph-client';
import 'isomorphic-fetch';
import {
  Application,
  DirectoryRole,
  DirectoryUser,
  KeyCredential,
  NewApplication,
  OAuth2PermissionGrant,
  Organization,
  OutgoingMessage,
  ServicePrincipal,
} from '../types';
import { GRAPH_API } from '../utils/constants';
import { NotFoundError, statusCodeOf } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Directory operations the toolkit performs against Graph
 */
export interface DirectoryApi {
  getOrganization(): Promise<Organization>;
  getServicePrincipalByDisplayName(displayName: string): Promise<ServicePrincipal | null>;
  getServicePrincipalByAppId(appId: string): Promise<ServicePrincipal | null>;
  createServicePrincipal(appId: string): Promise<ServicePrincipal>;
  createApplication(app: NewApplication): Promise<Application>;
  getApplication(objectId: string): Promise<Application | null>;
  updateApplicationKeyCredentials(objectId: string, keyCredentials: KeyCredential[]): Promise<void>;
  createOAuth2PermissionGrant(grant: OAuth2PermissionGrant): Promise<OAuth2PermissionGrant>;
  getUser(idOrUserPrincipalName: string): Promise<DirectoryUser | null>;
  getDirectoryRoleByTemplateId(roleTemplateId: string): Promise<DirectoryRole | null>;
  activateDirectoryRole(roleTemplateId: string): Promise<DirectoryRole>;
  addDirectoryRoleMember(roleId: string, directoryObjectId: string): Promise<void>;
}

export interface MailApi {
  sendMail(from: string, message: OutgoingMessage, saveToSentItems: boolean): Promise<void>;
}

interface GraphCollection<T> {
  value: T[];
}

export class GraphClient implements DirectoryApi, MailApi {
  private client: Client;

  constructor(accessToken: string) {
    this.client = Client.init({
      authProvider: (done) => {
        done(null, accessToken);
      },
    });
  }

  /**
   * Tenant the signed-in session belongs to
   */
  async getOrganization(): Promise<Organization> {
    const orgs: GraphCollection<Organization> = await this.client
      .api('/organization')
      .select('id,displayName,verifiedDomains')
      .get();

    const org = orgs.value[0];
    if (!org) {
      throw new NotFoundError('No organization returned for the current session');
    }
    return org;
  }

  async getServicePrincipalByDisplayName(displayName: string): Promise<ServicePrincipal | null> {
    const result: GraphCollection<ServicePrincipal> = await this.client
      .api('/servicePrincipals')
      .filter(`displayName eq '${escapeODataString(displayName)}'`)
      .select('id,appId,displayName,appRoles')
      .get();
    return result.value[0] || null;
  }

  async getServicePrincipalByAppId(appId: string): Promise<ServicePrincipal | null> {
    const result: GraphCollection<ServicePrincipal> = await this.client
      .api('/servicePrincipals')
      .filter(`appId eq '${escapeODataString(appId)}'`)
      .select('id,appId,displayName,appRoles')
      .get();
    return result.value[0] || null;
  }

  async createServicePrincipal(appId: string): Promise<ServicePrincipal> {
    const sp: ServicePrincipal = await this.client.api('/servicePrincipals').post({ appId });
    logger.debug(`Created service principal ${sp.id} for app ${appId}`);
    return sp;
  }

  async createApplication(app: NewApplication): Promise<Application> {
    const created: Application = await this.client.api('/applications').post(app);
    logger.debug(`Created application ${created.displayName} (${created.appId})`);
    return created;
  }

  async getApplication(objectId: string): Promise<Application | null> {
    try {
      const app: Application = await this.client
        .api(`/applications/${objectId}`)
        .select('id,appId,displayName,notes,keyCredentials,requiredResourceAccess')
        .get();
      return app;
    } catch (error) {
      if (statusCodeOf(error) === 404) {
        return null;
      }
      throw error;
    }
  }

  async updateApplicationKeyCredentials(
    objectId: string,
    keyCredentials: KeyCredential[]
  ): Promise<void> {
    await this.client.api(`/applications/${objectId}`).patch({ keyCredentials });
  }

  async createOAuth2PermissionGrant(
    grant: OAuth2PermissionGrant
  ): Promise<OAuth2PermissionGrant> {
    const created: OAuth2PermissionGrant = await this.client
      .api('/oauth2PermissionGrants')
      .post(grant);
    return created;
  }

  async getUser(idOrUserPrincipalName: string): Promise<DirectoryUser | null> {
    try {
      const user: DirectoryUser = await this.client
        .api(`/users/${encodeURIComponent(idOrUserPrincipalName)}`)
        .select('id,displayName,userPrincipalName,mail')
        .get();
      return user;
    } catch (error) {
      if (statusCodeOf(error) === 404) {
        return null;
      }
      throw error;
    }
  }

  async getDirectoryRoleByTemplateId(roleTemplateId: string): Promise<DirectoryRole | null> {
    const result: GraphCollection<DirectoryRole> = await this.client
      .api('/directoryRoles')
      .filter(`roleTemplateId eq '${escapeODataString(roleTemplateId)}'`)
      .get();
    return result.value[0] || null;
  }

  async activateDirectoryRole(roleTemplateId: string): Promise<DirectoryRole> {
    const role: DirectoryRole = await this.client.api('/directoryRoles').post({ roleTemplateId });
    logger.debug(`Activated directory role ${role.displayName} (${role.id})`);
    return role;
  }

  async addDirectoryRoleMember(roleId: string, directoryObjectId: string): Promise<void> {
    await this.client.api(`/directoryRoles/${roleId}/members/$ref`).post({
      '@odata.id': `${GRAPH_API.DIRECTORY_OBJECTS_URL}/${directoryObjectId}`,
    });
  }

  async sendMail(from: string, message: OutgoingMessage, saveToSentItems: boolean): Promise<void> {
    const toAddresses = (list: string[]) =>
      list.map((address) => ({ emailAddress: { address } }));

    await this.client.api(`/users/${encodeURIComponent(from)}/sendMail`).post({
      message: {
        subject: message.subject,
        body: message.body,
        toRecipients: toAddresses(message.toRecipients),
        ccRecipients: toAddresses(message.ccRecipients),
        bccRecipients: toAddresses(message.bccRecipients),
        attachments: message.attachments.map((a) => ({
          '@odata.type': '#microsoft.graph.fileAttachment',
          name: a.name,
          contentType: a.contentType,
          contentBytes: a.contentBytes,
        })),
      },
      saveToSentItems,
    });

    logger.debug(`Sent mail "${message.subject}" from ${from}`);
  }
}

function escapeODataString(value: string): string {
  return value.replace(/'/g, "''");
}
