/**
 * Domain Set
 *
 * The ordered list of local domains mapped to loopback.
 */

import { DOMAIN_LABELS } from '../config/constants.js';
import { ConfigurationError } from '../core/errors.js';

export type DomainSet = readonly string[];

/**
 * True when `domain` is the suffix itself or one of its subdomains.
 */
export function isUnderSuffix(domain: string, suffix: string): boolean {
  const normalized = domain.toLowerCase();
  return normalized === suffix || normalized.endsWith(`.${suffix}`);
}

/**
 * Builds a domain set from labels under a suffix.
 *
 * @throws {ConfigurationError} On duplicates or names outside the suffix
 */
export function createDomainSet(
  suffix: string,
  labels: readonly string[] = DOMAIN_LABELS.map((entry) => entry.label)
): DomainSet {
  const domains = labels.map((label) => (label ? `${label}.${suffix}` : suffix).toLowerCase());
  return validateDomainSet(domains, suffix);
}

export function validateDomainSet(domains: readonly string[], suffix: string): DomainSet {
  const seen = new Set<string>();
  const issues: string[] = [];

  for (const domain of domains) {
    if (!isUnderSuffix(domain, suffix)) {
      issues.push(`${domain} is not under .${suffix}`);
    }
    if (seen.has(domain)) {
      issues.push(`${domain} is listed twice`);
    }
    seen.add(domain);
  }

  if (issues.length > 0) {
    throw new ConfigurationError(
      `Invalid domain set: ${issues.join('; ')}`,
      issues,
      `Every domain must be unique and end in .${suffix}`
    );
  }

  return Object.freeze([...domains]);
}
