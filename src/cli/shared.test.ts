import { InvalidArgumentError } from 'commander';
import { describe, expect, it } from 'vitest';
import { collectEmail, parseGuid, parsePrefix, toPublishOptions } from './shared';

describe('CLI argument parsers', () => {
  it('accepts values matching the core patterns', () => {
    expect(parsePrefix('MSN')).toBe('MSN');
    expect(parseGuid('11111111-2222-3333-4444-555555555555')).toBe('11111111-2222-3333-4444-555555555555');
  });

  it('rejects values the core would reject', () => {
    expect(() => parsePrefix('msn')).toThrow(InvalidArgumentError);
    expect(() => parseGuid('abc')).toThrow('Expected a GUID.');
  });

  it('collects repeated addresses', () => {
    expect(collectEmail('b@contoso.com', collectEmail('a@contoso.com'))).toEqual(['a@contoso.com', 'b@contoso.com']);
    expect(() => collectEmail('nope')).toThrow(InvalidArgumentError);
  });
});

describe('toPublishOptions', () => {
  it('maps the negated domain flag onto includeDomainSuffix', () => {
    expect(
      toPublishOptions({
        prefix: 'MSN',
        keyExportPolicy: 'NonExportable',
        storeLocation: 'CurrentUser',
        domainSuffix: false,
        confirm: true,
      })
    ).toEqual({
      prefix: 'MSN',
      certThumbprint: undefined,
      keyExportPolicy: 'NonExportable',
      storeLocation: 'CurrentUser',
      vaultName: undefined,
      overwriteVaultSecret: undefined,
      replaceCertificate: undefined,
      returnParamSplat: undefined,
      includeDomainSuffix: false,
    });
  });
});
