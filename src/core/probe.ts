/**
 * HTTPS liveness probe
 *
 * Tests reachability, not trust: certificate validation is off and any
 * status below 400 after redirects counts as alive.
 */

import { HttpClient } from '../utils/http.js';
import { logger } from '../utils/logger.js';
import type { LivenessProbe } from './types.js';

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36';

const MAX_REDIRECTS = 5;

export interface HttpsProberOptions {
  timeout: number;
  /** Pool size; matches the scan concurrency */
  connections: number;
}

export class HttpsProber implements LivenessProbe {
  private client: HttpClient;

  constructor(options: HttpsProberOptions) {
    this.client = new HttpClient({
      timeout: options.timeout,
      insecure: true,
      userAgent: BROWSER_USER_AGENT,
      maxRedirections: MAX_REDIRECTS,
      connections: options.connections,
    });
  }

  /**
   * HEAD https://<hostname>/. Never rejects.
   */
  async isAlive(hostname: string, signal?: AbortSignal): Promise<boolean> {
    try {
      const { statusCode } = await this.client.head(`https://${hostname}/`, { signal });
      logger.debug(`HTTPS ${hostname} -> ${statusCode}`);
      return statusCode < 400;
    } catch (error) {
      logger.debug(`HTTPS probe failed for ${hostname}: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
