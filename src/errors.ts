// ── Error taxonomy ─────────────────────────────────────────────────
// Every failure a tool can report maps to one of these kinds. The call
// wrapper turns them into JSON error envelopes; nothing is rethrown to
// the transport.

export const ERROR_KINDS = [
  'NotFound',
  'UnsupportedOperation',
  'BackendFailure',
  'ValidationError',
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export class MemoryToolError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends MemoryToolError {
  constructor(message: string) {
    super('NotFound', message);
  }

  static memory(id: string): NotFoundError {
    return new NotFoundError(`Memory ${id} not found`);
  }
}

export class UnsupportedOperationError extends MemoryToolError {
  constructor(message: string) {
    super('UnsupportedOperation', message);
  }
}

export class BackendFailure extends MemoryToolError {
  constructor(message: string) {
    super('BackendFailure', message);
  }
}

export class ValidationError extends MemoryToolError {
  constructor(message: string) {
    super('ValidationError', message);
  }
}

/** Raised while reading configuration at start-up. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
