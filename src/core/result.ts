import { errorMessage } from './errors.js';

/**
 * Failures that end a cycle or drop a plan. Probe failures travel as
 * ProbeErrorKind inside the findings; store writes report a boolean.
 */
export type ErrorKind = 'execution_failure' | 'phase_failure';

export interface Failure {
  kind: ErrorKind;
  message: string;
}

export type Result<T, E = Failure> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E = Failure>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Run an async operation and turn a rejection into a Failure value.
 */
export async function attempt<T>(fn: () => Promise<T>, kind: ErrorKind): Promise<Result<T>> {
  try {
    return ok(await fn());
  } catch (err) {
    return fail({ kind, message: errorMessage(err) });
  }
}
