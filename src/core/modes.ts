/**
 * Scan modes and the verifier profile each one maps to
 */

import type { Mode, ScanConfig } from './types.js';

export const MODES: readonly Mode[] = ['normal', 'medium', 'ultimate'];

const PROFILES: Record<Mode, ScanConfig> = {
  normal: { concurrency: 20, timeout: 5000 },
  medium: { concurrency: 30, timeout: 8000 },
  ultimate: { concurrency: 50, timeout: 10000 },
};

const ESTIMATES: Record<Mode, number> = {
  normal: 50,
  medium: 150,
  ultimate: 500,
};

const QUICK_SCAN_CONCURRENCY = 20;

export function isMode(value: unknown): value is Mode {
  return MODES.some((mode) => mode === value);
}

/**
 * Negative when `a` is less aggressive than `b`
 */
export function compareModes(a: Mode, b: Mode): number {
  return MODES.indexOf(a) - MODES.indexOf(b);
}

export function scanConfigForMode(mode: Mode): ScanConfig {
  return { ...PROFILES[mode] };
}

/**
 * Same timeout as the mode, lower fixed concurrency
 */
export function quickScanConfig(mode: Mode): ScanConfig {
  return { concurrency: QUICK_SCAN_CONCURRENCY, timeout: PROFILES[mode].timeout };
}

/**
 * Approximate candidate count for display. Not tied to generator output.
 */
export function estimateCount(mode: Mode): number {
  return ESTIMATES[mode];
}
