/**
 * Type definitions for subsweep
 */

/**
 * Root domain that passed validation. Only `parseDomain` produces one.
 */
export type Domain = string & { readonly __brand: 'Domain' };

/**
 * Scan aggressiveness, ordered normal < medium < ultimate
 */
export type Mode = 'normal' | 'medium' | 'ultimate';

/**
 * Structural rule families the generator draws candidates from
 */
export type CandidateCategory =
  | 'base'
  | 'dictionary'
  | 'environment'
  | 'numeric'
  | 'geographic'
  | 'role'
  | 'special'
  | 'combination';

/**
 * Word lists consumed by the candidate generator.
 */
export interface GeneratorDictionary {
  readonly basePrefixes: readonly string[];
  readonly commonPrefixes: readonly string[];
  readonly environments: readonly string[];
  readonly geoCodes: readonly string[];
  readonly rolePrefixes: readonly string[];
  readonly hostPrefixes: readonly string[];
  readonly specialTokens: readonly string[];
  readonly combinationWords: readonly string[];
}

/**
 * Verifier settings. Timeout is in milliseconds.
 */
export interface ScanConfig {
  readonly concurrency: number;
  readonly timeout: number;
}

/**
 * Outcome of one verifier run. `httpsAlive` is always a subset of `dnsResolved`.
 */
export interface ScanResult {
  readonly dnsResolved: ReadonlySet<string>;
  readonly httpsAlive: ReadonlySet<string>;
}

export interface ScanOptions {
  signal?: AbortSignal;
  onProgress?: (done: number, total: number) => void;
}

/**
 * Answers whether a hostname has an A or CNAME record
 */
export interface HostResolver {
  resolves(hostname: string): Promise<boolean>;
  cancel(): void;
}

/**
 * Answers whether a hostname serves HTTPS with a non-error status
 */
export interface LivenessProbe {
  isAlive(hostname: string, signal?: AbortSignal): Promise<boolean>;
  close(): Promise<void>;
}

/**
 * Application configuration
 */
export interface AppConfig {
  domain: Domain;
  mode: Mode;
  concurrency?: number;
  timeout?: number;
  format: 'text' | 'json';
  export?: string;
  quiet: boolean;
  resolvers?: string[];
}

/**
 * Complete scan report handed to the presentation layer
 */
export interface ScanReport {
  domain: Domain;
  mode: Mode;
  candidates: number;
  dnsResolved: string[];
  httpsAlive: string[];
  metadata: ScanMetadata;
}

/**
 * Scan metadata
 */
export interface ScanMetadata {
  startTime: Date;
  endTime: Date;
  duration: number;
  concurrency: number;
  timeout: number;
  aborted: boolean;
}

/**
 * Logger levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
