import { GaxiosError } from 'gaxios';

export type ProviderOperation = 'search' | 'get' | 'send' | 'modify';

/** Raised when a reply recipient cannot be recovered from a From/To header. */
export class AddressParseError extends Error {
  input: string;

  constructor(input: string, message = "Couldn't parse the original sender address.") {
    super(message);
    this.name = 'AddressParseError';
    this.input = input;
  }
}

export class DecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DecodeError';
  }
}

/**
 * A failed Gmail call. `status` is the HTTP status when Google answered at all.
 */
export class ProviderError extends Error {
  operation: ProviderOperation;
  status: number | null;

  constructor(operation: ProviderOperation, message: string, opts: { status?: number | null; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = 'ProviderError';
    this.operation = operation;
    this.status = opts.status ?? null;
  }

  get isAuthFailure() {
    return this.status === 401 || this.status === 403;
  }

  static from(operation: ProviderOperation, err: unknown): ProviderError {
    if (err instanceof ProviderError) return err;
    const gaxios = err instanceof GaxiosError ? err : undefined;
    const status = gaxios?.response?.status ?? null;
    const message = err instanceof Error ? err.message : String(err);
    return new ProviderError(operation, message || `Gmail ${operation} failed`, { status, cause: err });
  }
}

export class GenerationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'GenerationError';
  }
}

/** Base for anything that must stop a request before a mail call is attempted. */
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PreconditionError';
  }
}

export class MissingCredentialsError extends PreconditionError {
  constructor(message = 'Missing Google credentials. Connect your Gmail account first.') {
    super(message);
    this.name = 'MissingCredentialsError';
  }
}

export class MissingScopeError extends PreconditionError {
  missingScopes: string[];

  constructor(missingScopes: string[]) {
    super('Missing required Google scopes');
    this.name = 'MissingScopeError';
    this.missingScopes = missingScopes;
  }
}

export function errorMessage(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}
