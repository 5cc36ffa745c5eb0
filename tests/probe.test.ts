/**
 * Tests for HttpsProber
 */

import { describe, it, expect, vi, beforeEach, beforeAll } from 'vitest';
import { logger } from '../src/utils/logger.js';
import type { HeadResponse, HttpClientOptions } from '../src/utils/http.js';

const httpMock = vi.hoisted(() => {
  const constructed: unknown[] = [];
  return {
    constructed,
    head: vi.fn<(url: string, options?: { signal?: AbortSignal }) => Promise<HeadResponse>>(),
    close: vi.fn<() => Promise<void>>(),
  };
});

vi.mock('../src/utils/http.js', () => ({
  HttpClient: class {
    constructor(options: unknown) {
      httpMock.constructed.push(options);
    }
    head = httpMock.head;
    close = httpMock.close;
  },
}));

const { HttpsProber, BROWSER_USER_AGENT } = await import('../src/core/probe.js');

function status(statusCode: number): HeadResponse {
  return { statusCode, headers: {} };
}

describe('HttpsProber', () => {
  beforeAll(() => {
    logger.setQuiet(true);
  });

  beforeEach(() => {
    vi.clearAllMocks();
    httpMock.constructed.length = 0;
  });

  it('should configure an insecure client with a browser user agent', () => {
    new HttpsProber({ timeout: 4000, connections: 25 });

    const expected: HttpClientOptions = {
      timeout: 4000,
      insecure: true,
      userAgent: BROWSER_USER_AGENT,
      maxRedirections: 5,
      connections: 25,
    };
    expect(httpMock.constructed).toEqual([expected]);
  });

  it('should HEAD the https root of the host', async () => {
    httpMock.head.mockResolvedValueOnce(status(200));
    const controller = new AbortController();

    await new HttpsProber({ timeout: 1000, connections: 1 }).isAlive(
      'api.example.com',
      controller.signal
    );

    expect(httpMock.head).toHaveBeenCalledWith('https://api.example.com/', {
      signal: controller.signal,
    });
  });

  it.each([200, 204, 301, 399])('should treat status %i as alive', async (code) => {
    httpMock.head.mockResolvedValueOnce(status(code));

    await expect(
      new HttpsProber({ timeout: 1000, connections: 1 }).isAlive('www.example.com')
    ).resolves.toBe(true);
  });

  it.each([400, 403, 404, 500, 503])('should treat status %i as not alive', async (code) => {
    httpMock.head.mockResolvedValueOnce(status(code));

    await expect(
      new HttpsProber({ timeout: 1000, connections: 1 }).isAlive('www.example.com')
    ).resolves.toBe(false);
  });

  it('should treat transport failures as not alive', async () => {
    httpMock.head.mockRejectedValueOnce(new Error('HTTP HEAD failed: certificate has expired'));

    await expect(
      new HttpsProber({ timeout: 1000, connections: 1 }).isAlive('old.example.com')
    ).resolves.toBe(false);
  });

  it('should close the underlying client', async () => {
    httpMock.close.mockResolvedValueOnce(undefined);

    await new HttpsProber({ timeout: 1000, connections: 1 }).close();

    expect(httpMock.close).toHaveBeenCalledTimes(1);
  });
});
