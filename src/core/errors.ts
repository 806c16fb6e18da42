/**
 * Relay error taxonomy.
 *
 * Validation, not-found and permission errors are surfaced to whoever
 * invoked the operation. Transport errors are logged by the caller and
 * never retried.
 */

export type ValidationCode =
  | 'same_server'
  | 'duplicate_connection'
  | 'quota_exceeded'
  | 'invalid_setting'
  | 'invalid_argument';

export class RelayError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends RelayError {
  readonly code: ValidationCode;

  constructor(code: ValidationCode, message: string) {
    super(message);
    this.code = code;
  }
}

export class NotFoundError extends RelayError {
  readonly resource: string;
  readonly id: string;

  constructor(resource: string, id: string | number) {
    super(`${resource} ${id} not found`);
    this.resource = resource;
    this.id = String(id);
  }
}

export class PermissionDeniedError extends RelayError {
  /** Capabilities the actor (or the bot) lacked, when known. */
  readonly missing: string[];

  constructor(message: string, missing: string[] = [], options?: { cause?: unknown }) {
    super(message, options);
    this.missing = missing;
  }
}

export class TransportError extends RelayError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
