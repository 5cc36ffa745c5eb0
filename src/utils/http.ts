/**
 * HTTP utilities with connection pooling
 */

import { request, Agent } from 'undici';

export interface HttpClientOptions {
  /** Whole-request deadline in milliseconds */
  timeout?: number;
  /** Skip TLS certificate validation */
  insecure?: boolean;
  userAgent?: string;
  maxRedirections?: number;
  connections?: number;
}

export interface HeadResponse {
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
}

/**
 * Create a persistent HTTP agent with connection pooling
 */
export function createHttpAgent(options: { insecure: boolean; timeout: number; connections: number }) {
  return new Agent({
    connections: options.connections,
    keepAliveTimeout: 10000,
    keepAliveMaxTimeout: 60000,
    connect: {
      rejectUnauthorized: !options.insecure,
      timeout: options.timeout,
    },
  });
}

/**
 * HTTP client with a per-request deadline
 */
export class HttpClient {
  private agent: Agent;
  private timeout: number;
  private userAgent?: string;
  private maxRedirections: number;

  constructor(options: HttpClientOptions = {}) {
    this.timeout = options.timeout ?? 5000;
    this.userAgent = options.userAgent;
    this.maxRedirections = options.maxRedirections ?? 5;
    this.agent = createHttpAgent({
      insecure: options.insecure ?? false,
      timeout: this.timeout,
      connections: options.connections ?? 100,
    });
  }

  /**
   * Make an HTTP HEAD request, following redirects.
   * Rejects on transport failure or when the deadline passes.
   */
  async head(url: string, options: { signal?: AbortSignal } = {}): Promise<HeadResponse> {
    const deadline = AbortSignal.timeout(this.timeout);
    const signal = options.signal ? AbortSignal.any([options.signal, deadline]) : deadline;

    try {
      const response = await request(url, {
        method: 'HEAD',
        headers: this.userAgent ? { 'user-agent': this.userAgent } : undefined,
        maxRedirections: this.maxRedirections,
        headersTimeout: this.timeout,
        bodyTimeout: this.timeout,
        dispatcher: this.agent,
        throwOnError: false,
        signal,
      });

      // Consume body (should be empty for HEAD)
      await response.body.text();

      return {
        statusCode: response.statusCode,
        headers: response.headers,
      };
    } catch (error) {
      throw new Error(
        `HTTP HEAD failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
        { cause: error }
      );
    }
  }

  /**
   * Close the agent and cleanup connections
   */
  async close() {
    await this.agent.close();
  }
}
