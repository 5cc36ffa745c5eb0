/**
 * Built-in word lists for candidate generation
 */

import { readFileSync } from 'fs';
import type { GeneratorDictionary } from './types.js';

const COMMON_SUBDOMAINS_URL = new URL(
  '../../templates/wordlists/common-subdomains.txt',
  import.meta.url
);

/**
 * High-probability single labels, always emitted
 */
export const BASE_PREFIXES: readonly string[] = Object.freeze([
  'www',
  'mail',
  'api',
  'admin',
  'blog',
  'dev',
  'staging',
  'test',
  'mobile',
  'static',
  'cdn',
  'portal',
  'app',
  'secure',
  'vpn',
  'm',
  'old',
  'new',
]);

/**
 * Ordered: the normal mode only takes the first three, geo crosses the first four.
 */
export const ENVIRONMENTS: readonly string[] = Object.freeze([
  'dev',
  'test',
  'staging',
  'prod',
  'production',
  'uat',
  'qa',
]);

export const GEO_CODES: readonly string[] = Object.freeze([
  'us',
  'uk',
  'eu',
  'de',
  'fr',
  'jp',
  'sg',
  'au',
  'in',
]);

/**
 * Role prefixes crossed with environments (ultimate)
 */
export const ROLE_PREFIXES: readonly string[] = Object.freeze(['app', 'web', 'api', 'service']);

/**
 * Host prefixes for numbered machines. The first three drive normal mode,
 * the first four medium, all six ultimate.
 */
export const HOST_PREFIXES: readonly string[] = Object.freeze([
  'web',
  'app',
  'api',
  'server',
  'node',
  'host',
]);

export const SPECIAL_TOKENS: readonly string[] = Object.freeze([
  'alpha',
  'beta',
  'gamma',
  'internal',
  'external',
  'legacy',
  'modern',
  'cloud',
  'aws',
  'azure',
  'office',
  'home',
  'remote',
]);

export const COMBINATION_WORDS: readonly string[] = Object.freeze([
  'admin',
  'api',
  'web',
  'app',
  'dev',
  'test',
]);

/**
 * Parse a wordlist: one label per line, `#` comments and blanks skipped,
 * duplicates dropped with first occurrence kept.
 */
export function parseWordlist(content: string): string[] {
  const words = content
    .split('\n')
    .map((line) => line.trim().toLowerCase())
    .filter((line) => line && !line.startsWith('#'));

  return Array.from(new Set(words));
}

let commonPrefixes: readonly string[] | undefined;

/**
 * Extended dictionary shipped in templates/wordlists. Read once.
 */
export function loadCommonPrefixes(): readonly string[] {
  if (!commonPrefixes) {
    const content = readFileSync(COMMON_SUBDOMAINS_URL, 'utf-8');
    commonPrefixes = Object.freeze(parseWordlist(content));
  }
  return commonPrefixes;
}

export function defaultDictionary(): GeneratorDictionary {
  return {
    basePrefixes: BASE_PREFIXES,
    commonPrefixes: loadCommonPrefixes(),
    environments: ENVIRONMENTS,
    geoCodes: GEO_CODES,
    rolePrefixes: ROLE_PREFIXES,
    hostPrefixes: HOST_PREFIXES,
    specialTokens: SPECIAL_TOKENS,
    combinationWords: COMBINATION_WORDS,
  };
}
