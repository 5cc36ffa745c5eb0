/**
 * DNS existence check: A record first, CNAME as fallback
 */

import { promises as dns } from 'dns';
import { logger } from '../utils/logger.js';
import type { HostResolver } from './types.js';

export interface DnsResolverOptions {
  /** Per-query timeout in milliseconds */
  timeout: number;
  /** Nameservers to query instead of the system configuration */
  servers?: string[];
}

export class DnsResolver implements HostResolver {
  private resolver: dns.Resolver;

  constructor(options: DnsResolverOptions) {
    this.resolver = new dns.Resolver({ timeout: options.timeout, tries: 1 });
    if (options.servers && options.servers.length > 0) {
      this.resolver.setServers(options.servers);
    }
  }

  /**
   * True when the name has at least one A or CNAME record. Never rejects.
   */
  async resolves(hostname: string): Promise<boolean> {
    try {
      const addresses = await this.resolver.resolve4(hostname);
      if (addresses.length > 0) {
        return true;
      }
    } catch (error) {
      logger.debug(`A lookup failed for ${hostname}: ${describe(error)}`);
    }

    try {
      const aliases = await this.resolver.resolveCname(hostname);
      return aliases.length > 0;
    } catch (error) {
      logger.debug(`CNAME lookup failed for ${hostname}: ${describe(error)}`);
      return false;
    }
  }

  /**
   * Abort outstanding queries; they settle as failures
   */
  cancel(): void {
    this.resolver.cancel();
  }
}

function describe(error: unknown): string {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return code ?? error.message;
  }
  return String(error);
}
