/**
 * Economy error taxonomy.
 *
 * Every failure a service raises on purpose is an AppError carrying a kind.
 * The kind fixes the HTTP status and the tRPC code; the code string may be
 * narrowed by a subclass (e.g. APPEAL_WINDOW_CLOSED under validation).
 */

export type ErrorKind =
  | 'validation'
  | 'authentication'
  | 'authorization'
  | 'not_found'
  | 'state_conflict'
  | 'persistence';

interface KindTraits {
  code: string;
  statusCode: 400 | 401 | 403 | 404 | 409 | 500;
  /** Expected in normal operation; false means the caller saw a server fault. */
  operational: boolean;
}

export const ERROR_KINDS: Readonly<Record<ErrorKind, KindTraits>> = {
  validation: { code: 'VALIDATION_ERROR', statusCode: 400, operational: true },
  authentication: { code: 'AUTHENTICATION_ERROR', statusCode: 401, operational: true },
  authorization: { code: 'AUTHORIZATION_ERROR', statusCode: 403, operational: true },
  not_found: { code: 'NOT_FOUND', statusCode: 404, operational: true },
  state_conflict: { code: 'STATE_CONFLICT', statusCode: 409, operational: true },
  persistence: { code: 'PERSISTENCE_ERROR', statusCode: 500, operational: false },
};

export interface ErrorBody {
  code: string;
  message: string;
  statusCode: number;
}

export class AppError extends Error {
  public readonly kind: ErrorKind;
  public readonly code: string;
  public readonly statusCode: KindTraits['statusCode'];
  public readonly isOperational: boolean;

  constructor(kind: ErrorKind, message: string, options: { code?: string; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    const traits = ERROR_KINDS[kind];
    this.kind = kind;
    this.code = options.code ?? traits.code;
    this.statusCode = traits.statusCode;
    this.isOperational = traits.operational;
    this.name = new.target.name;
  }

  toJSON(): ErrorBody {
    return { code: this.code, message: this.message, statusCode: this.statusCode };
  }

  static notFound(resource: string, id: string): NotFoundError {
    return new NotFoundError(`${resource} with id '${id}' not found`);
  }

  static conflict(message: string): StateConflictError {
    return new StateConflictError(message);
  }

  static persistence(message: string, cause?: unknown): PersistenceError {
    return new PersistenceError(message, cause);
  }
}

/** Rejected before any mutation: bad amount, empty reason or photo, malformed input. */
export class ValidationError extends AppError {
  constructor(message: string, code?: string) {
    super('validation', message, { code });
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string) {
    super('authentication', message);
  }
}

/** Not the claiming child, or not a guardian over that child. */
export class AuthorizationError extends AppError {
  constructor(message: string) {
    super('authorization', message);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('not_found', message);
  }
}

/** The assignment moved on since it was read. Refetch and retry. */
export class StateConflictError extends AppError {
  constructor(message: string, code?: string) {
    super('state_conflict', message, { code });
  }
}

/** The store failed mid-transaction and the whole unit was rolled back. */
export class PersistenceError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('persistence', message, { cause });
  }
}
