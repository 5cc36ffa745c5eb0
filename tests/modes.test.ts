/**
 * Tests for mode profiles
 */

import { describe, it, expect } from 'vitest';
import {
  MODES,
  compareModes,
  estimateCount,
  isMode,
  quickScanConfig,
  scanConfigForMode,
} from '../src/core/modes.js';

describe('modes', () => {
  it('should list modes in aggressiveness order', () => {
    expect(MODES).toEqual(['normal', 'medium', 'ultimate']);
    expect(compareModes('normal', 'medium')).toBeLessThan(0);
    expect(compareModes('ultimate', 'medium')).toBeGreaterThan(0);
    expect(compareModes('medium', 'medium')).toBe(0);
  });

  it('should recognise mode tokens', () => {
    expect(isMode('ultimate')).toBe(true);
    expect(isMode('Ultimate')).toBe(false);
    expect(isMode('fast')).toBe(false);
    expect(isMode(3)).toBe(false);
  });

  it('should map modes to scan profiles', () => {
    expect(scanConfigForMode('normal')).toEqual({ concurrency: 20, timeout: 5000 });
    expect(scanConfigForMode('medium')).toEqual({ concurrency: 30, timeout: 8000 });
    expect(scanConfigForMode('ultimate')).toEqual({ concurrency: 50, timeout: 10000 });
  });

  it('should grow concurrency and timeout monotonically', () => {
    for (let i = 1; i < MODES.length; i++) {
      const lower = scanConfigForMode(MODES[i - 1]);
      const higher = scanConfigForMode(MODES[i]);
      expect(higher.concurrency).toBeGreaterThan(lower.concurrency);
      expect(higher.timeout).toBeGreaterThan(lower.timeout);
    }
  });

  it('should hand out copies of the profile', () => {
    const config = scanConfigForMode('normal');
    expect(config).not.toBe(scanConfigForMode('normal'));
  });

  it('should fix quick scans at concurrency 20', () => {
    expect(quickScanConfig('ultimate')).toEqual({ concurrency: 20, timeout: 10000 });
  });

  it('should estimate candidate counts', () => {
    expect(MODES.map(estimateCount)).toEqual([50, 150, 500]);
  });
});
