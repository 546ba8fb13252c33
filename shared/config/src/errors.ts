/**
 * Raised when the service environment cannot be turned into a valid config.
 * Services treat it as fatal at startup.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: ReadonlyArray<{ path: string; message: string }> = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
