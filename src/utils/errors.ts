/**
 * Base error for key management failures.
 */
export class KeyManagementError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'KeyManagementError';
  }
}

/**
 * Error thrown when an algorithm has no key generator or importer.
 */
export class UnsupportedAlgorithmError extends KeyManagementError {
  readonly algorithm: string;

  constructor(algorithm: string) {
    super(`Unsupported algorithm: ${algorithm}`);
    this.name = 'UnsupportedAlgorithmError';
    this.algorithm = algorithm;
  }
}

/**
 * Error thrown when options or environment variables are malformed.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
