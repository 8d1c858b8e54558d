/**
 * App display name builder
 */

import { APP_NAMING } from '../utils/constants';
import { assertAppPrefix, assertEmail } from '../utils/validation';

export interface AppNameOptions {
  prefix: string;
  scenarioName?: string;
  userEmail?: string;
  includeDomainSuffix?: boolean;
}

/**
 * First label of the environment's DNS domain, or the fallback literal
 */
export function domainSuffix(env: NodeJS.ProcessEnv = process.env): string {
  const domain = (env[APP_NAMING.DOMAIN_ENV_VAR] || '').trim();
  const label = domain.split('.')[0];
  return label || APP_NAMING.FALLBACK_DOMAIN;
}

/**
 * GraphToolKit-{prefix}[-{scenario}][-{domain}][-As-{user}]
 */
export function buildAppName(options: AppNameOptions, env: NodeJS.ProcessEnv = process.env): string {
  assertAppPrefix(options.prefix);
  if (options.userEmail !== undefined) {
    assertEmail(options.userEmail, 'user email');
  }

  const parts = [APP_NAMING.BASE, options.prefix];
  if (options.scenarioName) {
    parts.push(options.scenarioName);
  }
  if (options.includeDomainSuffix !== false) {
    parts.push(domainSuffix(env));
  }
  if (options.userEmail) {
    parts.push('As', options.userEmail.split('@')[0]);
  }
  return parts.join('-');
}
