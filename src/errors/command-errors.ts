/**
 * Error codes surfaced to callers. Every failure the pipeline reports carries
 * one of these instead of a stack trace.
 */
export type CommandErrorCode =
  | 'parse_error'
  | 'ambiguous_reference'
  | 'reference_error'
  | 'validation_error'
  | 'store_io_error'
  | 'external_service_error'
  | 'timeout';

/**
 * Serializable error shape attached to call outcomes and responses
 */
export interface ErrorPayload {
  code: CommandErrorCode | 'execution_error';
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Base class for every failure raised by the command pipeline
 */
export abstract class CommandError extends Error {
  abstract readonly code: CommandErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /**
   * Structured details safe to return to the tutor
   */
  details(): Record<string, unknown> | undefined {
    return undefined;
  }

  toPayload(): ErrorPayload {
    const details = this.details();
    return details
      ? { code: this.code, message: this.message, details }
      : { code: this.code, message: this.message };
  }
}

/**
 * The language capability returned something that is not a valid call list,
 * even after the stricter retry.
 */
export class ParseError extends CommandError {
  readonly code = 'parse_error';

  constructor(readonly issues: string[], options?: { cause?: unknown }) {
    super(`Could not interpret the instruction: ${issues.join('; ')}`, options);
  }

  override details(): Record<string, unknown> {
    return { issues: this.issues };
  }
}

export interface ReferenceCandidate {
  id: string;
  label: string;
  score: number;
}

export type EntityKind = 'student' | 'learning_object' | 'assignment';

/**
 * A reference matched several roster entries with comparable confidence
 */
export class AmbiguousReferenceError extends CommandError {
  readonly code = 'ambiguous_reference';

  constructor(
    readonly kind: EntityKind,
    readonly reference: string,
    readonly candidates: ReferenceCandidate[]
  ) {
    super(
      `"${reference}" matches more than one ${entityLabel(kind)}: ` +
        candidates.map(c => `${c.label} (${c.id})`).join(', ')
    );
  }

  override details(): Record<string, unknown> {
    return { kind: this.kind, reference: this.reference, candidates: this.candidates };
  }
}

/**
 * A referenced student, learning object or assignment does not exist
 */
export class EntityReferenceError extends CommandError {
  readonly code = 'reference_error';

  constructor(readonly kind: EntityKind, readonly reference: string) {
    super(`Unknown ${entityLabel(kind)}: "${reference}"`);
  }

  override details(): Record<string, unknown> {
    return { kind: this.kind, reference: this.reference };
  }
}

/**
 * An argument is missing, mistyped or violates a domain constraint
 */
export class ValidationError extends CommandError {
  readonly code = 'validation_error';

  constructor(readonly field: string, reason: string) {
    super(`Invalid argument '${field}': ${reason}`);
  }

  override details(): Record<string, unknown> {
    return { field: this.field };
  }
}

/**
 * A collection file could not be read or written. Store state must be treated
 * as unverified.
 */
export class StoreIOError extends CommandError {
  readonly code = 'store_io_error';

  constructor(readonly path: string, message: string, options?: { cause?: unknown }) {
    super(`${message} (${path})`, options);
  }

  override details(): Record<string, unknown> {
    return { path: this.path };
  }
}

/**
 * The language capability failed or was cancelled
 */
export class ExternalServiceError extends CommandError {
  readonly code = 'external_service_error';
}

/**
 * The language capability did not answer within the configured timeout
 */
export class TimeoutError extends CommandError {
  readonly code = 'timeout';

  constructor(readonly timeoutMs: number) {
    super(`Language capability did not respond within ${timeoutMs}ms`);
  }

  override details(): Record<string, unknown> {
    return { timeoutMs: this.timeoutMs };
  }
}

/**
 * Converts any thrown value into the payload returned to callers
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof CommandError) {
    return error.toPayload();
  }
  return {
    code: 'execution_error',
    message: error instanceof Error ? error.message : String(error),
  };
}

function entityLabel(kind: EntityKind): string {
  switch (kind) {
    case 'student':
      return 'student';
    case 'learning_object':
      return 'learning object';
    case 'assignment':
      return 'assignment';
  }
}
