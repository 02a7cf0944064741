export type ErrorCode = 'INSUFFICIENT_DATA' | 'READ_FAILED' | 'INTERNAL_ERROR';

export type Result<T> = { ok: true; value: T } | { ok: false; code: ErrorCode; message: string };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T = never>(code: ErrorCode, message: string): Result<T> {
  return { ok: false, code, message };
}

/**
 * Runs `fn`, folding anything it throws into a `READ_FAILED` result.
 *
 * Used at the collaborator boundary: replay reads can fail per observation point, and the
 * timeline treats those failures as "not observed here" rather than aborting.
 */
export function safeResult<T>(fn: () => T): Result<T> {
  try {
    return ok(fn());
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return err('READ_FAILED', message);
  }
}
