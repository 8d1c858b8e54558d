import { describe, expect, it } from 'vitest';
import { UpstreamError } from '../utils/errors';
import { TENANT_ID } from '../test-support/fakes';
import { ExchangeOnlineClient } from './exchange';

interface RecordedCall {
  url: string;
  init: RequestInit;
}

function fakeFetch(responses: Response[]) {
  const calls: RecordedCall[] = [];
  const fetchImpl = async (url: string, init: RequestInit): Promise<Response> => {
    calls.push({ url, init });
    const next = responses.shift();
    if (!next) {
      throw new Error('unexpected request');
    }
    return next;
  };
  return { calls, fetchImpl };
}

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('ExchangeOnlineClient', () => {
  it('posts cmdlet input to the tenant InvokeCommand endpoint', async () => {
    const { calls, fetchImpl } = fakeFetch([json({ value: [] })]);
    const client = new ExchangeOnlineClient('test-token', TENANT_ID, fetchImpl);

    await client.invoke('Get-DistributionGroupMember', { Identity: 'senders' });

    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe(`https://outlook.office365.com/adminapi/beta/${TENANT_ID}/InvokeCommand`);
    expect(calls[0].init.method).toBe('POST');
    expect(calls[0].init.headers).toMatchObject({ Authorization: 'Bearer test-token' });
    expect(JSON.parse(String(calls[0].init.body))).toEqual({
      CmdletInput: { CmdletName: 'Get-DistributionGroupMember', Parameters: { Identity: 'senders' } },
    });
  });

  it('maps distribution group records', async () => {
    const { fetchImpl } = fakeFetch([
      json({
        value: [
          {
            Identity: 'Senders',
            Name: 'Senders',
            Alias: 'senders',
            PrimarySmtpAddress: 'senders@contoso.com',
          },
        ],
      }),
    ]);
    const client = new ExchangeOnlineClient('test-token', TENANT_ID, fetchImpl);

    expect(await client.getDistributionGroup('senders@contoso.com')).toEqual({
      identity: 'Senders',
      name: 'Senders',
      alias: 'senders',
      primarySmtpAddress: 'senders@contoso.com',
      externalDirectoryObjectId: undefined,
    });
  });

  it('returns null for a group that does not exist', async () => {
    const { fetchImpl } = fakeFetch([
      json({ error: { message: "The operation couldn't be performed because object 'x' couldn't be found" } }, 404),
    ]);
    const client = new ExchangeOnlineClient('test-token', TENANT_ID, fetchImpl);

    expect(await client.getDistributionGroup('x')).toBeNull();
  });

  it('raises the service message for failed cmdlets', async () => {
    const { fetchImpl } = fakeFetch([json({ error: { message: 'Alias is already in use' } }, 400)]);
    const client = new ExchangeOnlineClient('test-token', TENANT_ID, fetchImpl);

    const attempt = client.newDistributionGroup({
      name: 'Senders',
      alias: 'senders',
      primarySmtpAddress: 'senders@contoso.com',
    });

    await expect(attempt).rejects.toBeInstanceOf(UpstreamError);
    await expect(attempt).rejects.toMatchObject({
      message: 'New-DistributionGroup failed: Alias is already in use',
      statusCode: 400,
    });
  });

  it('reads the default accepted domain', async () => {
    const { fetchImpl } = fakeFetch([
      json({
        value: [
          { DomainName: 'contoso.onmicrosoft.com', Default: false },
          { DomainName: 'contoso.com', Default: true },
        ],
      }),
    ]);
    const client = new ExchangeOnlineClient('test-token', TENANT_ID, fetchImpl);

    expect(await client.getAcceptedDomains()).toEqual([
      { domainName: 'contoso.onmicrosoft.com', isDefault: false },
      { domainName: 'contoso.com', isDefault: true },
    ]);
  });

  it('reports the access check verdict', async () => {
    const { fetchImpl } = fakeFetch([
      json({ value: [{ AccessCheckResult: 'Granted' }] }),
      json({ value: [{ AccessCheckResult: 'Denied' }] }),
    ]);
    const client = new ExchangeOnlineClient('test-token', TENANT_ID, fetchImpl);

    expect(await client.testApplicationAccessPolicy('helpdesk@contoso.com', 'app-1')).toBe('Granted');
    expect(await client.testApplicationAccessPolicy('helpdesk@contoso.com', 'app-1')).toBe('Denied');
  });
});
