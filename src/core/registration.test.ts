import { beforeEach, describe, expect, it } from 'vitest';
import { CertificateDescriptor, RequiredPermissionSet, ResourcePermissionBlock } from '../types';
import { DIRECTORY_ROLES, RESOURCE_APPS } from '../utils/constants';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors';
import { FakeDirectory, TENANT_ID, fastCertificateGenerator, tempDir, testAudit } from '../test-support/fakes';
import { AuditLog } from './audit-log';
import { CertificateProvider, CertificateStore } from './certificates';
import { AppRegistrar, buildConsentUrl } from './registration';

const graphBlock: ResourcePermissionBlock = {
  resource: 'graph',
  resourceAppId: RESOURCE_APPS.GRAPH,
  resourceAccess: [{ id: '12345', type: 'Role' }],
  permissionNames: ['Mail.Send'],
};

describe('buildConsentUrl', () => {
  it('points at the tenant admin consent endpoint', () => {
    expect(buildConsentUrl(TENANT_ID, 'app-1')).toBe(
      `https://login.microsoftonline.com/${TENANT_ID}/adminconsent?client_id=app-1`
    );
  });
});

describe('AppRegistrar', () => {
  let directory: FakeDirectory;
  let store: CertificateStore;
  let audit: AuditLog;
  let registrar: AppRegistrar;
  let certificate: CertificateDescriptor;

  beforeEach(async () => {
    directory = new FakeDirectory();
    store = new CertificateStore(tempDir('certs'));
    audit = testAudit();
    registrar = new AppRegistrar(directory, store, audit, { grantDelayMs: 0 });
    certificate = await new CertificateProvider(store, audit, fastCertificateGenerator).resolve({
      subject: 'GraphToolKit-MSN',
      storeLocation: 'CurrentUser',
      exportPolicy: 'NonExportable',
    });
  });

  it('registers the app with the certificate as its key credential', async () => {
    const registration = await registrar.register({
      displayName: 'GraphToolKit-MSN',
      certificate,
      permissions: [graphBlock],
      tenantId: TENANT_ID,
      notes: 'test app',
    });

    const [app] = directory.applications;
    expect(registration).toMatchObject({ displayName: 'GraphToolKit-MSN', appId: app.appId, objectId: app.id });
    expect(app.keyCredentials).toEqual([
      {
        type: 'AsymmetricX509Cert',
        usage: 'Verify',
        key: store.getRawData('CurrentUser', certificate.thumbprint),
        displayName: 'CN=GraphToolKit-MSN',
      },
    ]);
    expect(app.requiredResourceAccess).toEqual([
      { resourceAppId: RESOURCE_APPS.GRAPH, resourceAccess: [{ id: '12345', type: 'Role' }] },
    ]);
  });

  it('requires a certificate', async () => {
    await expect(
      registrar.register({ displayName: 'x', permissions: [graphBlock], tenantId: TENANT_ID, notes: '' })
    ).rejects.toThrow(ValidationError);
  });

  it('grants each resource block against its own service principal', async () => {
    const permissions: RequiredPermissionSet = [
      graphBlock,
      {
        resource: 'exchange',
        resourceAppId: RESOURCE_APPS.EXCHANGE,
        resourceAccess: [{ id: 'dc50a0fb-09a3-484d-be87-e023b12c6440', type: 'Role' }],
        permissionNames: ['Exchange.ManageAsApp'],
      },
    ];
    const registration = await registrar.register({
      displayName: 'GraphToolKit-MSN',
      certificate,
      permissions,
      tenantId: TENANT_ID,
      notes: '',
    });

    const outcome = await registrar.grant(registration, permissions);

    expect(directory.grants.map((g) => [g.clientId, g.resourceId, g.scope])).toEqual([
      [outcome.servicePrincipal.id, 'sp-graph', 'Mail.Send'],
      [outcome.servicePrincipal.id, 'sp-exchange', 'Exchange.ManageAsApp'],
    ]);
    expect(outcome.grantedScopes).toEqual({ graph: 'Mail.Send', exchange: 'Exchange.ManageAsApp' });
    expect(outcome.consentUrl).toBe(buildConsentUrl(TENANT_ID, registration.appId));
  });

  it('rejects more than three resource blocks before creating anything', async () => {
    const registration = await registrar.register({
      displayName: 'GraphToolKit-MSN',
      certificate,
      permissions: [graphBlock],
      tenantId: TENANT_ID,
      notes: '',
    });
    const spCount = directory.servicePrincipals.length;

    const four = [graphBlock, graphBlock, graphBlock, graphBlock];
    await expect(registrar.grant(registration, four)).rejects.toThrow(ConflictError);
    await expect(registrar.grant(registration, four)).rejects.toThrow(
      'Too many resources in RequiredResourceAccessList.'
    );
    expect(directory.servicePrincipals).toHaveLength(spCount);
    expect(directory.grants).toHaveLength(0);
  });

  it('activates missing directory roles before adding members', async () => {
    directory.roles.push({
      id: 'role-reader',
      displayName: 'Global Reader',
      roleTemplateId: DIRECTORY_ROLES.GLOBAL_READER,
    });

    const roles = await registrar.assignDirectoryRoles('sp-9', [
      DIRECTORY_ROLES.EXCHANGE_ADMINISTRATOR,
      DIRECTORY_ROLES.GLOBAL_READER,
    ]);

    expect(roles.map((r) => r.roleTemplateId)).toEqual([
      DIRECTORY_ROLES.EXCHANGE_ADMINISTRATOR,
      DIRECTORY_ROLES.GLOBAL_READER,
    ]);
    expect(directory.roleMembers).toEqual([
      { roleId: roles[0].id, memberId: 'sp-9' },
      { roleId: 'role-reader', memberId: 'sp-9' },
    ]);
  });

  it('appends a certificate to an existing application', async () => {
    const registration = await registrar.register({
      displayName: 'GraphToolKit-MSN',
      certificate,
      permissions: [graphBlock],
      tenantId: TENANT_ID,
      notes: 'existing',
    });
    await registrar.grant(registration, [graphBlock]);

    const updated = await registrar.addCertificateToApplication(registration.objectId, certificate, TENANT_ID);

    expect(updated.appId).toBe(registration.appId);
    expect(directory.keyCredentialUpdates[0].keyCredentials).toHaveLength(2);
  });

  it('fails to extend an unknown application', async () => {
    await expect(registrar.addCertificateToApplication('missing', certificate, TENANT_ID)).rejects.toThrow(
      NotFoundError
    );
  });
});
