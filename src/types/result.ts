/** Outcome of an operation whose recoverable failures are returned instead of thrown */
export type Result<T, E extends Error> = { ok: true; value: T } | { ok: false; error: E }

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value }
}

export function fail<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error }
}
