import type { ServiceResponse } from './types';

export type TableErrorKind =
  | 'MissingIdentifier'
  | 'InvalidIdentifierShape'
  | 'InvalidStringIdentifier'
  | 'InvalidNumericIdentifier'
  | 'EncodingFailure'
  | 'TransportFailure'
  | 'InvalidArgument'
  | 'InvalidResponse';

export class TableError extends Error {
  readonly kind: TableErrorKind;

  constructor(kind: TableErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TableError';
    this.kind = kind;
  }
}

export type IdentifierErrorKind = Extract<
  TableErrorKind,
  'MissingIdentifier' | 'InvalidIdentifierShape' | 'InvalidStringIdentifier' | 'InvalidNumericIdentifier'
>;

export class IdentifierError extends TableError {
  constructor(kind: IdentifierErrorKind, message: string) {
    super(kind, message);
    this.name = 'IdentifierError';
  }
}

/** Raised for a rejected fetch or a non-2xx answer; carries whatever the service sent back. */
export class TransportError extends TableError {
  readonly status?: number;
  readonly body?: string;

  constructor(message: string, options: { status?: number; body?: string; cause?: unknown } = {}) {
    super('TransportFailure', message, { cause: options.cause });
    this.name = 'TransportError';
    this.status = options.status;
    this.body = options.body;
  }

  static fromResponse(response: ServiceResponse, context: string): TransportError {
    const detail = response.body ? ` - ${response.body}` : '';
    return new TransportError(`${context} failed: ${response.status} ${response.statusText}${detail}`, {
      status: response.status,
      body: response.body,
    });
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
