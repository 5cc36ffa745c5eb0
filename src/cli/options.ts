/**
 * Shared commander argument parsers
 */

import { InvalidArgumentError } from 'commander';
import { isMode } from '../core/modes.js';
import type { Mode } from '../core/types.js';

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parseMode(value: string): Mode {
  const mode = value.toLowerCase();
  if (!isMode(mode)) {
    throw new InvalidArgumentError('Use normal, medium, or ultimate.');
  }
  return mode;
}

export function parseFormat(value: string): 'text' | 'json' {
  if (value !== 'text' && value !== 'json') {
    throw new InvalidArgumentError('Use text or json.');
  }
  return value;
}
