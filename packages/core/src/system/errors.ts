export type MemSimErrorCode = 'Configuration' | 'InputUnavailable';

export class MemSimError extends Error {
  constructor(public readonly code: MemSimErrorCode, message: string) {
    super(message);
    this.name = 'MemSimError';
  }
}

// Bad frame count or algorithm name; raised before any address is processed
export class ConfigurationError extends MemSimError {
  constructor(message: string) {
    super('Configuration', message);
    this.name = 'ConfigurationError';
  }
}

export class InputUnavailableError extends MemSimError {
  constructor(public readonly path: string, cause?: unknown) {
    super('InputUnavailable', `Cannot read reference file ${path}`);
    this.name = 'InputUnavailableError';
    if (cause !== undefined) this.cause = cause;
  }
}
