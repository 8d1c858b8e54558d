/**
 * Permission Resolver
 * Maps application permission names to resource app / role id pairs
 */

import {
  PermissionScenario,
  RequiredPermissionSet,
  RequiredResourceAccess,
  ResourcePermissionBlock,
} from '../types';
import {
  EXCHANGE_AUDIT_PERMISSIONS,
  GRAPH_API,
  RESOURCE_APPS,
  SHAREPOINT_AUDIT_PERMISSIONS,
} from '../utils/constants';
import { NotFoundError, ValidationError } from '../utils/errors';
import { AuditLog } from './audit-log';
import { DirectoryApi } from './graph';

function fixedBlock(
  resource: ResourcePermissionBlock['resource'],
  resourceAppId: string,
  permissions: Array<{ id: string; name: string }>
): ResourcePermissionBlock {
  return {
    resource,
    resourceAppId,
    resourceAccess: permissions.map((p) => ({ id: p.id, type: 'Role' as const })),
    permissionNames: permissions.map((p) => p.name),
  };
}

/**
 * Wire shape for application.requiredResourceAccess
 */
export function toRequiredResourceAccess(set: RequiredPermissionSet): RequiredResourceAccess[] {
  return set.map((block) => ({
    resourceAppId: block.resourceAppId,
    resourceAccess: block.resourceAccess.map((a) => ({ ...a })),
  }));
}

export function permissionNamesOf(set: RequiredPermissionSet): string[] {
  return set.flatMap((block) => block.permissionNames);
}

export class PermissionResolver {
  private directory: DirectoryApi;
  private audit: AuditLog;

  constructor(directory: DirectoryApi, audit: AuditLog) {
    this.directory = directory;
    this.audit = audit;
  }

  async resolve(
    permissionNames: string[],
    scenario?: PermissionScenario
  ): Promise<RequiredPermissionSet> {
    return this.audit.track('PermissionResolver.resolve', async () => {
      const graph = await this.directory.getServicePrincipalByDisplayName(
        GRAPH_API.SERVICE_PRINCIPAL_NAME
      );
      if (!graph) {
        throw new NotFoundError(
          `Service principal "${GRAPH_API.SERVICE_PRINCIPAL_NAME}" not found`
        );
      }

      const appRoles = (graph.appRoles || []).filter((r) =>
        r.allowedMemberTypes.includes('Application')
      );

      const block: ResourcePermissionBlock = {
        resource: 'graph',
        resourceAppId: graph.appId,
        resourceAccess: [],
        permissionNames: [],
      };

      for (const name of permissionNames) {
        const role = appRoles.find((r) => r.value === name);
        if (!role) {
          this.audit.log(`Permission "${name}" not found on ${graph.displayName}`, 'Warning');
          continue;
        }
        if (block.permissionNames.includes(role.value)) {
          continue;
        }
        block.resourceAccess.push({ id: role.id, type: 'Role' });
        block.permissionNames.push(role.value);
        this.audit.log(`Resolved ${role.value} -> ${role.id}`, 'Verbose');
      }

      if (block.resourceAccess.length === 0) {
        throw new ValidationError(
          `None of the requested permissions resolved against ${graph.displayName}: ${permissionNames.join(', ')}`,
          { permissionNames }
        );
      }

      const set: RequiredPermissionSet = [block];

      if (scenario === '365Audit') {
        set.push(fixedBlock('sharepoint', RESOURCE_APPS.SHAREPOINT, SHAREPOINT_AUDIT_PERMISSIONS));
        set.push(fixedBlock('exchange', RESOURCE_APPS.EXCHANGE, EXCHANGE_AUDIT_PERMISSIONS));
        this.audit.log('Added SharePoint and Exchange resource blocks for 365Audit');
      }

      return set;
    });
  }
}
