import { beforeEach, describe, expect, it } from 'vitest';
import { FakeDirectory, FakeExchange, FakeTokenProvider, TENANT_ID, testAudit } from '../test-support/fakes';
import { SessionConnector, missingScopes, normalizeScope } from './session';

describe('scope helpers', () => {
  it('normalises resource-qualified scopes', () => {
    expect(normalizeScope('https://graph.microsoft.com/User.Read.All')).toBe('user.read.all');
    expect(normalizeScope('Mail.Send')).toBe('mail.send');
  });

  it('lists requested scopes the session lacks', () => {
    expect(missingScopes(['User.Read.All', 'Mail.Send'], ['https://graph.microsoft.com/user.read.all'])).toEqual([
      'Mail.Send',
    ]);
  });
});

describe('SessionConnector', () => {
  let directory: FakeDirectory;
  let exchange: FakeExchange;
  let graphAuth: FakeTokenProvider;
  let exchangeAuth: FakeTokenProvider;
  let connector: SessionConnector;

  beforeEach(() => {
    directory = new FakeDirectory();
    exchange = new FakeExchange();
    graphAuth = new FakeTokenProvider();
    exchangeAuth = new FakeTokenProvider();
    connector = new SessionConnector({
      graphAuth,
      exchangeAuth,
      audit: testAudit(),
      createGraphClient: () => directory,
      createExchangeClient: () => exchange,
    });
  });

  it('connects to Graph and reads the tenant from the organization', async () => {
    const session = await connector.connectGraph(['Application.ReadWrite.All']);

    expect(session.tenantId).toBe(TENANT_ID);
    expect(session.account).toBe('admin@contoso.com');
    expect(graphAuth.acquired).toEqual([['Application.ReadWrite.All']]);
  });

  it('reuses a live session that holds every requested scope', async () => {
    const first = await connector.connectGraph(['Application.ReadWrite.All', 'User.Read.All']);
    const second = await connector.connectGraph(['user.read.all']);

    expect(second).toBe(first);
    expect(graphAuth.acquired).toHaveLength(1);
  });

  it('reconnects when a scope is missing', async () => {
    await connector.connectGraph(['Application.ReadWrite.All']);
    await connector.connectGraph(['Application.ReadWrite.All', 'RoleManagement.ReadWrite.Directory']);

    expect(graphAuth.acquired).toEqual([
      ['Application.ReadWrite.All'],
      ['Application.ReadWrite.All', 'RoleManagement.ReadWrite.Directory'],
    ]);
  });

  it('reconnects when the probe fails', async () => {
    await connector.connectGraph(['Application.ReadWrite.All']);
    directory.failOrganization = true;

    await expect(connector.connectGraph(['Application.ReadWrite.All'])).rejects.toThrow('session expired');
    expect(graphAuth.acquired).toHaveLength(2);
  });

  it('reuses any answering Exchange session', async () => {
    const first = await connector.connectExchange();
    const second = await connector.connectExchange();

    expect(second).toBe(first);
    expect(first.organization).toBe('contoso.onmicrosoft.com');
    expect(exchangeAuth.acquired).toEqual([['https://outlook.office365.com/.default']]);
    expect(exchange.organizationCalls).toBe(2);
  });

  it('signs out of both services', async () => {
    await connector.connectGraph(['Application.ReadWrite.All']);
    await connector.disconnect();

    expect(graphAuth.signedOut).toBe(true);
    expect(exchangeAuth.signedOut).toBe(true);
    await connector.connectGraph(['Application.ReadWrite.All']);
    expect(graphAuth.acquired).toHaveLength(2);
  });
});
