/**
 * Root domain normalization and validation
 */

import { InvalidDomainError } from './errors.js';
import type { Domain } from './types.js';

const DOMAIN_PATTERN = /^[a-z0-9.-]+\.[a-z]{2,}$/;

/**
 * Lowercase, trim, and drop any URL scheme and path
 */
export function normalizeDomain(input: string): string {
  let domain = input.trim().toLowerCase();

  const scheme = /^https?:\/\//.exec(domain);
  if (scheme) {
    domain = domain.slice(scheme[0].length);
  }

  const slash = domain.indexOf('/');
  if (slash !== -1) {
    domain = domain.slice(0, slash);
  }

  return domain;
}

function isDomain(value: string): value is Domain {
  return DOMAIN_PATTERN.test(value);
}

export function isValidDomain(input: string): boolean {
  return isDomain(normalizeDomain(input));
}

/**
 * Validate user input and brand it as a Domain
 * @throws InvalidDomainError when the input is not a root domain
 */
export function parseDomain(input: string): Domain {
  const domain = normalizeDomain(input);
  if (!isDomain(domain)) {
    throw new InvalidDomainError(input);
  }
  return domain;
}
