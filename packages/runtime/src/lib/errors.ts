export type DeskErrorCode =
  | 'not_found'
  | 'invalid_transition'
  | 'upstream_unavailable'
  | 'lookup_failed'
  | 'validation';

/**
 * Base class for failures the engine reports to its callers.
 */
export class DeskError extends Error {
  readonly code: DeskErrorCode;

  constructor(code: DeskErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NotFoundError extends DeskError {
  constructor(kind: string, id: string) {
    super('not_found', `${kind} ${id} not found`);
  }
}

export class InvalidTransitionError extends DeskError {
  constructor(id: string, from: string, to: string) {
    super('invalid_transition', `Help request ${id} cannot move from ${from} to ${to}`);
  }
}

export class ValidationError extends DeskError {
  constructor(message: string) {
    super('validation', message);
  }
}

/**
 * Store, oracle or notification backend could not be reached (or answered
 * with something unusable).
 */
export class UpstreamUnavailableError extends DeskError {
  constructor(
    message: string,
    options?: { cause?: unknown },
    code: 'upstream_unavailable' | 'lookup_failed' = 'upstream_unavailable'
  ) {
    super(code, message, options);
  }
}

/**
 * The store-backed fallback of a knowledge search failed. Callers treat it
 * as "no match".
 */
export class KnowledgeLookupError extends UpstreamUnavailableError {
  constructor(options?: { cause?: unknown }) {
    super('Knowledge lookup failed', options, 'lookup_failed');
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
