import type { Cursor } from './cursor.js';
import type { Poll, Result } from './outcome.js';

/**
 * A parsing closure.
 *
 * On `complete` the cursor has moved past exactly what was recognised. On
 * `suspended` or `failed` it must be where it was on entry.
 */
export type Parser<C extends Cursor, T, E> = (cursor: C) => Poll<T, E>;

/**
 * Drives a repetition. Receives every settled element and answers with
 * `complete` to finish, `failed` to abort or `suspended` to ask for another
 * element.
 */
export type Combine<R, E, S, F> = (item: Result<R, E>) => Poll<S, F>;

export type InferValue<T> = T extends Parser<never, infer U, unknown> ? U : never;

export type InferError<T> = T extends Parser<never, unknown, infer U> ? U : never;
