/**
 * Concurrent candidate verifier: DNS resolution, then HTTPS liveness
 */

import { createAdmissionGate, settleAll } from '../utils/concurrency.js';
import { logger } from '../utils/logger.js';
import { ConfigurationError } from './errors.js';
import { HttpsProber } from './probe.js';
import { DnsResolver } from './resolver.js';
import type { HostResolver, LivenessProbe, ScanConfig, ScanOptions, ScanResult } from './types.js';

export interface VerifierOptions {
  /** Nameservers for the default resolver */
  resolvers?: string[];
  createResolver?: (config: ScanConfig) => HostResolver;
  createProbe?: (config: ScanConfig) => LivenessProbe;
}

/**
 * Reject settings that cannot drive a scan
 * @throws ConfigurationError
 */
export function assertScanConfig(config: ScanConfig): void {
  if (!Number.isInteger(config.concurrency) || config.concurrency <= 0) {
    throw new ConfigurationError(
      `concurrency must be a positive integer, got ${String(config.concurrency)}`
    );
  }
  if (!Number.isFinite(config.timeout) || config.timeout <= 0) {
    throw new ConfigurationError(`timeout must be a positive number of milliseconds, got ${String(config.timeout)}`);
  }
}

export class Verifier {
  private createResolver: (config: ScanConfig) => HostResolver;
  private createProbe: (config: ScanConfig) => LivenessProbe;

  constructor(options: VerifierOptions = {}) {
    const servers = options.resolvers;
    this.createResolver =
      options.createResolver ??
      ((config) => new DnsResolver({ timeout: config.timeout, servers }));
    this.createProbe =
      options.createProbe ??
      ((config) => new HttpsProber({ timeout: config.timeout, connections: config.concurrency }));
  }

  /**
   * Check every candidate once. Individual failures only mean absence from
   * the result sets. When `options.signal` aborts, checks that have not
   * started are skipped and the sets gathered so far are returned.
   * @throws ConfigurationError before any I/O when the config is invalid
   */
  async scan(
    candidates: Iterable<string>,
    config: ScanConfig,
    options: ScanOptions = {}
  ): Promise<ScanResult> {
    assertScanConfig(config);

    const hostnames = Array.from(new Set(candidates));
    const dnsResolved = new Set<string>();
    const httpsAlive = new Set<string>();

    if (hostnames.length === 0) {
      return { dnsResolved, httpsAlive };
    }

    const { signal, onProgress } = options;
    const resolver = this.createResolver(config);
    const probe = this.createProbe(config);
    const gate = createAdmissionGate(config.concurrency);
    const total = hostnames.length;
    let done = 0;

    const onAbort = () => {
      logger.warn(`Scan aborted with ${total - done} checks outstanding`);
      resolver.cancel();
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    logger.info(
      `Verifying ${total} candidates (concurrency ${config.concurrency}, timeout ${config.timeout}ms)`
    );

    const check = async (hostname: string): Promise<void> => {
      try {
        if (signal?.aborted) {
          return;
        }
        if (!(await resolver.resolves(hostname))) {
          return;
        }
        dnsResolved.add(hostname);

        if (signal?.aborted) {
          return;
        }
        if (await probe.isAlive(hostname, signal)) {
          httpsAlive.add(hostname);
        }
      } catch (error) {
        logger.debug(
          `Check failed for ${hostname}: ${error instanceof Error ? error.message : String(error)}`
        );
      } finally {
        done++;
        onProgress?.(done, total);
      }
    };

    try {
      await settleAll(hostnames, check, gate);
    } finally {
      signal?.removeEventListener('abort', onAbort);
      await probe.close();
    }

    logger.info(`${dnsResolved.size} resolved in DNS, ${httpsAlive.size} alive over HTTPS`);

    return { dnsResolved, httpsAlive };
  }
}
