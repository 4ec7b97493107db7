/**
 * Raised for setup mistakes: an unknown engine type, or a registry-backed
 * engine selected without a profile URL.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * The remote validator did not answer before the request deadline.
 */
export class RemoteTimeoutError extends Error {
  constructor(url: string, timeoutMs: number) {
    super(`Remote validator at ${url} did not respond within ${timeoutMs}ms`);
    this.name = 'RemoteTimeoutError';
  }
}
