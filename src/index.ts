/**
 * subsweep - heuristic subdomain discovery
 * Main entry point for programmatic usage
 */

export { App } from './core/app.js';
export { CandidateGenerator, canonicalize } from './core/generator.js';
export { Verifier, assertScanConfig } from './core/verifier.js';
export { DnsResolver } from './core/resolver.js';
export { HttpsProber } from './core/probe.js';
export { ConfigurationError, InvalidDomainError } from './core/errors.js';
export { isValidDomain, normalizeDomain, parseDomain } from './core/domain.js';
export {
  MODES,
  compareModes,
  estimateCount,
  isMode,
  quickScanConfig,
  scanConfigForMode,
} from './core/modes.js';
export { formatJSON, formatSummary, formatText, reportFileName } from './core/report.js';
export type * from './core/types.js';

import { App } from './core/app.js';
import { parseDomain } from './core/domain.js';
import { quickScanConfig } from './core/modes.js';
import type { Verifier } from './core/verifier.js';
import type { Mode, ScanReport } from './core/types.js';

/**
 * Version information
 */
export const VERSION = '1.0.0';

/**
 * Quick scan interface for programmatic usage: the mode's candidates and
 * timeout at a fixed concurrency of 20.
 * @example
 * ```typescript
 * import { quickScan } from 'subsweep';
 *
 * const report = await quickScan('example.com', { mode: 'medium' });
 * console.log(report.httpsAlive);
 * ```
 */
export async function quickScan(
  domain: string,
  options: {
    mode?: Mode;
    resolvers?: string[];
    signal?: AbortSignal;
    /** Replaces the default DNS and HTTPS verifier */
    verifier?: Verifier;
  } = {}
): Promise<ScanReport> {
  const mode = options.mode ?? 'normal';
  const { concurrency, timeout } = quickScanConfig(mode);
  const app = new App(
    {
      domain: parseDomain(domain),
      mode,
      concurrency,
      timeout,
      format: 'json',
      quiet: true,
      resolvers: options.resolvers,
    },
    { verifier: options.verifier }
  );

  return await app.scan({ signal: options.signal });
}
