import { z } from 'zod';

export type ErrorKind =
  | 'invalid_argument'
  | 'invalid_graph'
  | 'overflow'
  | 'does_not_converge'
  | 'negative_cycle';

export class AlgorithmError extends Error {
  readonly kind: ErrorKind;
  readonly detail: string;

  constructor(kind: ErrorKind, detail: string) {
    super(`${kind}: ${detail}`);
    this.name = 'AlgorithmError';
    this.kind = kind;
    this.detail = detail;
  }
}

export const invalidArgument = (detail: string) => new AlgorithmError('invalid_argument', detail);
export const invalidGraph = (detail: string) => new AlgorithmError('invalid_graph', detail);
export const overflow = (detail: string) => new AlgorithmError('overflow', detail);
export const doesNotConverge = (detail: string) => new AlgorithmError('does_not_converge', detail);
export const negativeCycle = (detail: string) => new AlgorithmError('negative_cycle', detail);

export function isAlgorithmError(error: unknown, kind?: ErrorKind): error is AlgorithmError {
  if (!(error instanceof AlgorithmError)) return false;
  return kind === undefined || error.kind === kind;
}

/** Outcome of routines whose failure is an expected result rather than a bug. */
export type Result<T, E extends AlgorithmError = AlgorithmError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });
export const fail = (error: AlgorithmError): Result<never> => ({ ok: false, error });

export function unwrap<T>(result: Result<T>): T {
  if (result.ok) return result.value;
  throw result.error;
}

export function assertIndex(i: number, n: number, what = 'index'): void {
  if (!Number.isInteger(i) || i < 0 || i >= n) {
    throw invalidArgument(`${what} ${i} is outside [0, ${n})`);
  }
}

/**
 * Runs a zod schema over untrusted input and reports the first issue as an
 * `invalid_argument` error naming the offending path.
 */
export function parseWith<S extends z.ZodTypeAny>(schema: S, raw: unknown, what: string): z.infer<S> {
  try {
    return schema.parse(raw);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issue = error.issues[0];
      const path = issue?.path.length ? `${what}.${issue.path.join('.')}` : what;
      throw invalidArgument(`Missing or invalid ${path}: ${issue?.message ?? 'unknown error'}`);
    }
    throw error;
  }
}
