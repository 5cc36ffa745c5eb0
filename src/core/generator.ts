/**
 * Rule-based subdomain candidate generator
 */

import { arrangements } from '../utils/combinatorics.js';
import { defaultDictionary } from './wordlists.js';
import { estimateCount } from './modes.js';
import type { CandidateCategory, Domain, GeneratorDictionary, Mode } from './types.js';

const NORMAL_NUMBERS = ['1', '2', '3', '01', '02'];
const ENV_PREFIX_STYLES = ['', 'www-', 'web-', 'app-', 'api-'];
const ENV_NUMBER_VARIANTS = ['', '1', '2', '3'];
const ROLE_NUMBER_VARIANTS = ['', '1', '2'];

const MODE_CATEGORIES: Record<Mode, readonly CandidateCategory[]> = {
  normal: ['base', 'dictionary', 'environment', 'numeric'],
  medium: ['base', 'dictionary', 'environment', 'numeric', 'geographic', 'combination'],
  ultimate: [
    'base',
    'dictionary',
    'environment',
    'numeric',
    'geographic',
    'role',
    'special',
    'combination',
  ],
};

/**
 * Longest word arrangement emitted by the combination layer
 */
const COMBINATION_MAX_SIZE: Record<Mode, number> = {
  normal: 0,
  medium: 2,
  ultimate: 3,
};

/**
 * Two-digit sequence 01..count
 */
function paddedRange(count: number): string[] {
  return Array.from({ length: count }, (_, i) => String(i + 1).padStart(2, '0'));
}

/**
 * Drop a leading `www.` unless that would leave a bare TLD
 */
export function canonicalize(domain: string): string {
  if (domain.startsWith('www.')) {
    const rest = domain.slice(4);
    if (rest.includes('.')) {
      return rest;
    }
  }
  return domain;
}

/**
 * Deterministic, mode-parameterized subdomain name-space expansion.
 * Pure: no I/O, no randomness.
 */
export class CandidateGenerator {
  private dictionary: GeneratorDictionary;

  constructor(dictionary: GeneratorDictionary = defaultDictionary()) {
    this.dictionary = dictionary;
  }

  /**
   * Rule categories applied for a mode, least to most specific
   */
  static categoriesForMode(mode: Mode): readonly CandidateCategory[] {
    return MODE_CATEGORIES[mode];
  }

  static estimateCount(mode: Mode): number {
    return estimateCount(mode);
  }

  /**
   * All candidates for `domain` in `mode`, as fully-qualified names
   */
  generate(domain: Domain, mode: Mode): ReadonlySet<string> {
    const candidates = new Set<string>();
    for (const labels of this.generateByCategory(domain, mode).values()) {
      for (const name of labels) {
        candidates.add(name);
      }
    }
    return candidates;
  }

  /**
   * Candidates grouped by the rule category that produced them.
   * A name produced by several categories appears under each.
   */
  generateByCategory(domain: Domain, mode: Mode): Map<CandidateCategory, ReadonlySet<string>> {
    const root = canonicalize(domain);
    const byCategory = new Map<CandidateCategory, ReadonlySet<string>>();

    for (const category of MODE_CATEGORIES[mode]) {
      const names = new Set<string>();
      for (const label of this.labelsFor(category, mode, root)) {
        names.add(`${label}.${root}`);
      }
      byCategory.set(category, names);
    }

    return byCategory;
  }

  private labelsFor(category: CandidateCategory, mode: Mode, root: string): Iterable<string> {
    switch (category) {
      case 'base':
        return this.dictionary.basePrefixes;
      case 'dictionary':
        return this.dictionary.commonPrefixes;
      case 'environment':
        return this.environmentLabels(mode);
      case 'numeric':
        return this.numericLabels(mode);
      case 'geographic':
        return this.geographicLabels(mode);
      case 'role':
        return this.roleLabels();
      case 'special':
        return this.specialLabels(root);
      case 'combination':
        return this.combinationLabels(mode);
    }
  }

  private *environmentLabels(mode: Mode): Generator<string> {
    const { environments } = this.dictionary;

    if (mode === 'normal') {
      for (const env of environments.slice(0, 3)) {
        yield env;
        yield `${env}-web`;
      }
      return;
    }

    if (mode === 'medium') {
      for (const env of environments) {
        yield env;
        yield `${env}-web`;
        yield `web-${env}`;
        yield `${env}-app`;
      }
      return;
    }

    for (const env of environments) {
      for (const style of ENV_PREFIX_STYLES) {
        for (const num of ENV_NUMBER_VARIANTS) {
          yield `${style}${env}${num}`;
        }
      }
    }
  }

  private *numericLabels(mode: Mode): Generator<string> {
    const { hostPrefixes } = this.dictionary;

    if (mode === 'normal') {
      for (const num of NORMAL_NUMBERS) {
        for (const prefix of hostPrefixes.slice(0, 3)) {
          yield `${prefix}${num}`;
        }
      }
      return;
    }

    if (mode === 'medium') {
      for (const num of paddedRange(10)) {
        for (const prefix of hostPrefixes.slice(0, 4)) {
          yield `${prefix}${num}`;
        }
      }
      return;
    }

    for (const num of paddedRange(20)) {
      for (const prefix of hostPrefixes) {
        yield `${prefix}${num}`;
        yield `${prefix}-${num}`;
      }
    }
  }

  private *geographicLabels(mode: Mode): Generator<string> {
    const { geoCodes, environments } = this.dictionary;

    if (mode === 'medium') {
      for (const geo of geoCodes) {
        yield geo;
        yield `${geo}-web`;
        yield `www-${geo}`;
      }
      return;
    }

    for (const geo of geoCodes) {
      for (const env of environments.slice(0, 4)) {
        yield `${geo}-${env}`;
        yield `${env}-${geo}`;
      }
    }
  }

  private *roleLabels(): Generator<string> {
    const { rolePrefixes, environments } = this.dictionary;

    for (const role of rolePrefixes) {
      for (const env of environments.slice(0, 3)) {
        for (const num of ROLE_NUMBER_VARIANTS) {
          yield `${role}${num}-${env}`;
        }
      }
    }
  }

  private *specialLabels(root: string): Generator<string> {
    yield* this.dictionary.specialTokens;
    yield `prod-${root.replace(/\./g, '-')}`;
  }

  private *combinationLabels(mode: Mode): Generator<string> {
    const maxSize = COMBINATION_MAX_SIZE[mode];
    for (const words of arrangements(this.dictionary.combinationWords, 2, maxSize)) {
      yield words.join('-');
    }
  }
}
