import { describe, expect, it } from 'vitest';
import { ValidationError } from '../utils/errors';
import { buildAppName, domainSuffix } from './app-name';

describe('domainSuffix', () => {
  it('uses the first label of USERDNSDOMAIN', () => {
    expect(domainSuffix({ USERDNSDOMAIN: 'CORP.contoso.com' })).toBe('CORP');
  });

  it('falls back to MyDomain when the variable is unset or blank', () => {
    expect(domainSuffix({})).toBe('MyDomain');
    expect(domainSuffix({ USERDNSDOMAIN: '   ' })).toBe('MyDomain');
  });
});

describe('buildAppName', () => {
  it('builds an email app name from the sender local part', () => {
    expect(buildAppName({ prefix: 'MSN', userEmail: 'helpdesk@contoso.com' }, {})).toBe(
      'GraphToolKit-MSN-MyDomain-As-helpdesk'
    );
  });

  it('places the scenario before the domain label', () => {
    expect(
      buildAppName({ prefix: 'CTA', scenarioName: 'Audit' }, { USERDNSDOMAIN: 'CORP.contoso.com' })
    ).toBe('GraphToolKit-CTA-Audit-CORP');
  });

  it('omits the domain label on request', () => {
    expect(
      buildAppName({ prefix: 'MSN', userEmail: 'helpdesk@contoso.com', includeDomainSuffix: false }, {})
    ).toBe('GraphToolKit-MSN-As-helpdesk');
  });

  it.each(['msn', 'A', 'ABCDE', 'AB-1', ''])('rejects prefix "%s"', (prefix) => {
    expect(() => buildAppName({ prefix }, {})).toThrow(ValidationError);
  });

  it('rejects a malformed sender address', () => {
    expect(() => buildAppName({ prefix: 'MSN', userEmail: 'helpdesk' }, {})).toThrow(ValidationError);
  });
});
