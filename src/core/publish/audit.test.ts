import { beforeEach, describe, expect, it } from 'vitest';
import { DIRECTORY_ROLES } from '../../utils/constants';
import { TENANT_ID, TestContext, createTestContext } from '../../test-support/fakes';
import { AuditAppPublisher } from './audit';

describe('AuditAppPublisher', () => {
  let ctx: TestContext;
  let publisher: AuditAppPublisher;

  beforeEach(() => {
    ctx = createTestContext({ USERDNSDOMAIN: 'CORP.contoso.com' });
    publisher = new AuditAppPublisher(ctx);
  });

  it('names the app with the Audit scenario and asks for role management', async () => {
    const plan = await publisher.plan({ prefix: 'CTA' });

    expect(plan.appName).toBe('GraphToolKit-CTA-Audit-CORP');
    expect(plan.secret.name).toBe('CN=GraphToolKit-CTA-Audit-CORP');
    expect(ctx.graphAuth.acquired[0]).toContain('RoleManagement.ReadWrite.Directory');
  });

  it('grants all three resources and assigns the reader roles', async () => {
    const outcome = await publisher.publish({ prefix: 'CTA' });
    const sp = ctx.directory.servicePrincipals.find((s) => s.appId === outcome.result.appId);

    expect(ctx.directory.grants.map((g) => g.resourceId)).toEqual(['sp-graph', 'sp-sharepoint', 'sp-exchange']);
    expect(ctx.directory.roles.map((r) => r.roleTemplateId)).toEqual([
      DIRECTORY_ROLES.EXCHANGE_ADMINISTRATOR,
      DIRECTORY_ROLES.GLOBAL_READER,
    ]);
    expect(ctx.directory.roleMembers.map((m) => m.memberId)).toEqual([sp?.id, sp?.id]);
    expect(outcome.result).toMatchObject({
      kind: 'audit',
      displayName: 'GraphToolKit-CTA-Audit-CORP',
      tenantId: TENANT_ID,
      permissions: 'AuditLog.Read.All, Directory.Read.All, Group.Read.All',
      directoryRoles: ['Role 29232cdf', 'Role f2ef992c'],
    });
  });
});
