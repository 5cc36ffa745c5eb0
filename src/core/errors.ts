/**
 * Error types surfaced to callers of the core
 */

/**
 * Rejected scan settings. Raised before any network work starts.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class InvalidDomainError extends Error {
  readonly input: string;

  constructor(input: string) {
    super(`Invalid domain: ${input}`);
    this.name = 'InvalidDomainError';
    this.input = input;
  }
}
