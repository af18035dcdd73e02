import type { Cursor } from '../cursor.js';
import type { Poll } from '../outcome.js';
import type { Combine, Parser } from '../type.js';
import { drive } from './drive.js';
import { group } from './group.js';

/**
 * Repetition.
 *
 * `parse` reads one element at a time. If it cannot decide, the whole
 * repetition rewinds and suspends, so a retry starts again from the first
 * element. Otherwise its result is handed to `combine`, which ends the
 * repetition with `complete` or `failed` (the latter rewinds) or asks for
 * another element with `suspended`.
 *
 * Element failures are never surfaced directly. A `combine` that maps the
 * first failure to `complete` gives an empty repetition that consumed
 * nothing.
 */
export const repeat = <C extends Cursor, R, E, S, F>(
	cursor: C,
	parse: Parser<C, R, E>,
	combine: Combine<R, E, S, F>,
): Poll<S, F> => {
	return group(cursor, (cursor) => drive(cursor, parse, combine));
};
