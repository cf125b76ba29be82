// web/src/app/errors.ts

/** Fehler mit HTTP-Status und einer Meldung, die der Nutzer sehen darf. */
export class AppError extends Error {
  constructor(message: string, readonly status: number) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class AuthError extends AppError {
  constructor(message = 'Invalid username or password.') {
    super(message, 401);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

/** Supabase nicht erreichbar oder Anfrage abgelehnt – die Ursache bleibt im Log. */
export class StorageError extends AppError {
  constructor(readonly operation: string, readonly reason?: unknown) {
    super('Could not reach the database. Please try again.', 503);
  }
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration:\n  ${problems.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}
