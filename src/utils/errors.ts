/**
 * Missing or invalid settings. Raised before anything is fetched.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
