/**
 * Error thrown when configuration cannot be loaded or is invalid.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly value?: unknown
  ) {
    super(message)
    this.name = 'ConfigError'
  }
}
