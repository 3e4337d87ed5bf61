/**
 * Result\<T, E\> — Success/Failure Values Without Throwing
 *
 * Every step that can fail for reasons outside the dashboard's control
 * (a missing binary, a garbled payload) returns a `Result` instead of
 * throwing. Callers narrow on `ok`.
 *
 * @example
 * ```typescript
 * const parsed = parseStatus(raw);
 * if (!parsed.ok) return keepPrevious(parsed.error);
 * publish(parsed.value);
 * ```
 *
 * @module
 */

// ── Discriminated Union ──────────────────────────────────

/** Successful result containing a typed value. */
export interface Success<T> {
    readonly ok: true;
    readonly value: T;
}

/** Failed result carrying the reason. */
export interface Failure<E> {
    readonly ok: false;
    readonly error: E;
}

/** Either `Success<T>` or `Failure<E>`. Check `result.ok` to narrow. */
export type Result<T, E> = Success<T> | Failure<E>;

// ── Constructors ─────────────────────────────────────────

export function succeed<T>(value: T): Success<T> {
    return { ok: true, value };
}

export function fail<E>(error: E): Failure<E> {
    return { ok: false, error };
}
