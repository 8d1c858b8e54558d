import { beforeEach, describe, expect, it } from 'vitest';
import { ConflictError, NotFoundError } from '../../utils/errors';
import { TENANT_ID, TestContext, createTestContext } from '../../test-support/fakes';
import { EmailAppOptions, EmailAppPublisher } from './email';

const options: EmailAppOptions = {
  prefix: 'MSN',
  authorizedSenderUserName: 'helpdesk@contoso.com',
  mailEnabledSendingGroup: 'senders@contoso.com',
};

const APP_NAME = 'GraphToolKit-MSN-MyDomain-As-helpdesk';

describe('EmailAppPublisher', () => {
  let ctx: TestContext;
  let publisher: EmailAppPublisher;

  beforeEach(() => {
    ctx = createTestContext();
    ctx.directory.users.push({
      id: 'user-1',
      displayName: 'Help Desk',
      userPrincipalName: 'helpdesk@contoso.com',
      mail: 'helpdesk@contoso.com',
    });
    ctx.exchange.groups.push({
      identity: 'Senders',
      name: 'Senders',
      alias: 'senders',
      primarySmtpAddress: 'senders@contoso.com',
    });
    publisher = new EmailAppPublisher(ctx);
  });

  it('plans without changing anything', async () => {
    const plan = await publisher.plan(options);

    expect(plan).toMatchObject({
      kind: 'email',
      mode: 'new',
      appName: APP_NAME,
      tenantId: TENANT_ID,
      certificate: { action: 'create', subject: `CN=${APP_NAME}` },
      permissions: ['Mail.Send'],
      secret: { name: `CN=${APP_NAME}`, vaultName: 'GraphEmailAppLocalStore', action: 'create' },
    });
    expect(plan.changes).toEqual([
      `Create self-signed certificate CN=${APP_NAME}`,
      `Register application ${APP_NAME} with Mail.Send`,
      'Create its service principal and grant tenant-wide consent',
      'Restrict the application to members of senders@contoso.com',
      'Ensure helpdesk@contoso.com is a member of senders@contoso.com',
      `Store secret CN=${APP_NAME} in vault GraphEmailAppLocalStore`,
    ]);
    expect(ctx.directory.applications).toHaveLength(0);
    expect(ctx.certificates.list('CurrentUser')).toHaveLength(0);
    expect(ctx.vault.listVaults()).toEqual([]);
  });

  it('registers, restricts and stores the email app', async () => {
    const outcome = await publisher.publish(options);
    const [app] = ctx.directory.applications;

    expect(outcome.secretName).toBe(`CN=${APP_NAME}`);
    expect(outcome.splat).toBeUndefined();
    expect(outcome.result).toMatchObject({
      kind: 'email',
      displayName: APP_NAME,
      appId: app.appId,
      objectId: app.id,
      tenantId: TENANT_ID,
      consentUrl: `https://login.microsoftonline.com/${TENANT_ID}/adminconsent?client_id=${app.appId}`,
      sendAsUser: 'helpdesk@contoso.com',
      sendAsUserEmail: 'helpdesk@contoso.com',
      restrictedSendGroup: 'senders@contoso.com',
      defaultDomain: 'contoso.com',
      certificateStoreLocation: 'CurrentUser',
    });
    expect(ctx.directory.grants.map((g) => g.scope)).toEqual(['Mail.Send']);
    expect(ctx.exchange.policies).toEqual([
      {
        appId: app.appId,
        policyScopeGroupId: 'senders@contoso.com',
        accessRight: 'RestrictAccess',
        description: `Restrict ${APP_NAME} to senders@contoso.com`,
      },
    ]);
    expect(ctx.exchange.members.Senders).toEqual(['helpdesk@contoso.com']);

    const stored = ctx.vault.getSecret('GraphEmailAppLocalStore', `CN=${APP_NAME}`);
    expect(stored && JSON.parse(stored.value)).toEqual(outcome.result);
  });

  it('records the store location of a LocalMachine certificate', async () => {
    const outcome = await publisher.publish({ ...options, storeLocation: 'LocalMachine' });

    expect(outcome.result.certificateStoreLocation).toBe('LocalMachine');
    expect(ctx.certificates.list('LocalMachine').map((c) => c.thumbprint)).toEqual([
      outcome.result.certificateThumbprint,
    ]);
  });

  it('does not re-add an existing group member', async () => {
    ctx.exchange.members.Senders = ['HelpDesk@contoso.com'];
    await publisher.publish(options);

    expect(ctx.exchange.members.Senders).toEqual(['HelpDesk@contoso.com']);
  });

  it('returns a parameter splat on request', async () => {
    const outcome = await publisher.publish({ ...options, returnParamSplat: true });

    expect(outcome.splat?.split('\n').slice(0, 3)).toEqual([
      '$params = @{',
      '    kind = "email"',
      `    displayName = "${APP_NAME}"`,
    ]);
  });

  it('warns when the access check is denied', async () => {
    ctx.exchange.accessVerdict = 'Denied';
    const outcome = await publisher.publish(options);

    const warnings = ctx.audit.entries().filter((e) => e.severity === 'Warning');
    expect(warnings.map((e) => e.message)).toContain(
      `Access policy test: ${outcome.result.appId} is denied for helpdesk@contoso.com; retry after replication completes`
    );
  });

  it('fails for an unknown sender', async () => {
    await expect(publisher.plan({ ...options, authorizedSenderUserName: 'ghost@contoso.com' })).rejects.toThrow(
      NotFoundError
    );
  });

  it('fails for an unknown group', async () => {
    await expect(publisher.plan({ ...options, mailEnabledSendingGroup: 'nobody@contoso.com' })).rejects.toThrow(
      'Mail-enabled group nobody@contoso.com not found'
    );
  });

  it('refuses to overwrite a stored result unless asked', async () => {
    await publisher.publish(options);
    ctx.certificates.list('CurrentUser').forEach((c) => ctx.certificates.remove('CurrentUser', c.thumbprint));

    await expect(publisher.plan(options)).rejects.toThrow(ConflictError);
    const plan = await publisher.plan({ ...options, overwriteVaultSecret: true });
    expect(plan.secret.action).toBe('overwrite');
  });

  it('reuses a certificate given by thumbprint', async () => {
    const first = await publisher.publish(options);
    const plan = await publisher.plan({
      ...options,
      prefix: 'MSX',
      certThumbprint: first.result.certificateThumbprint,
    });

    expect(plan.certificate).toMatchObject({
      action: 'use-existing',
      thumbprint: first.result.certificateThumbprint,
    });
  });

  it('adds a certificate for the sender to an existing app', async () => {
    const first = await publisher.publish(options);

    const plan = await publisher.plan({ ...options, prefix: 'MSX', existingAppObjectId: first.result.objectId });
    expect(plan.mode).toBe('existing');
    expect(plan.appName).toBe(APP_NAME);
    expect(plan.secret.name).toBe('CN=GraphToolKit-MSX-MyDomain-As-helpdesk');

    const outcome = await publisher.apply(plan);

    expect(outcome.result.appId).toBe(first.result.appId);
    expect(outcome.result.certificateThumbprint).not.toBe(first.result.certificateThumbprint);
    expect(ctx.directory.keyCredentialUpdates[0].keyCredentials).toHaveLength(2);
    expect(ctx.exchange.policies).toHaveLength(1);
    expect(outcome.secretName).toBe('CN=GraphToolKit-MSX-MyDomain-As-helpdesk');
  });

  it('fails for an unknown existing app', async () => {
    await expect(
      publisher.plan({ ...options, existingAppObjectId: '99999999-9999-9999-9999-999999999999' })
    ).rejects.toThrow(NotFoundError);
  });
});
