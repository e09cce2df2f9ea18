/**
 * Invalid invocation. Raised before any process is sampled or signalled.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class UnknownSignalError extends ConfigurationError {
  constructor(readonly input: string) {
    super(`Unknown signal: ${input}`);
    this.name = "UnknownSignalError";
  }
}
