
export type EngineErrorKind = 'not_found' | 'validation' | 'division_degenerate';

export interface EngineError {
  kind: EngineErrorKind;
  message: string;
  details?: Record<string, unknown>;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: EngineError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(kind: EngineErrorKind, message: string, details?: Record<string, unknown>): Result<T> {
  return { ok: false, error: details ? { kind, message, details } : { kind, message } };
}

export function httpStatusFor(kind: EngineErrorKind): number {
  switch (kind) {
    case 'not_found': return 404;
    case 'validation':
    case 'division_degenerate':
      return 400;
  }
}
