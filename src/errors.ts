/**
 * Raised at registration when a pipeline is wired incorrectly: a dependency
 * that was never registered on it, or a reused label.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
