export class IngestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IngestError';
  }
}

export class ConnectionError extends IngestError {
  readonly code = 'CONNECTION_FAILED';
  readonly host: string;

  constructor(host: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
    this.host = host;
  }
}

export class TransportError extends IngestError {
  readonly code = 'TRANSPORT_FAILED';
  readonly command: string;

  constructor(command: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
    this.command = command;
  }
}

export class ParseError extends IngestError {
  readonly code = 'PARSE_FAILED';
  readonly issues: unknown;

  constructor(message: string, issues: unknown = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ParseError';
    this.issues = issues;
  }
}

export class IngestConfigError extends IngestError {
  readonly code = 'INVALID_CONFIG';
  readonly issues: unknown;

  constructor(message: string, issues: unknown) {
    super(message);
    this.name = 'IngestConfigError';
    this.issues = issues;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
