import type { Cursor } from '../cursor.js';
import type { Poll } from '../outcome.js';
import type { Parser } from '../type.js';

/**
 * Runs `parse` and rewinds the cursor unless it completes.
 *
 * Any rule that runs more than one inner step has to go through here, or
 * an inner step that succeeded before a later one gave up leaves its bytes
 * consumed.
 */
export const group = <C extends Cursor, T, E>(
	cursor: C,
	parse: Parser<C, T, E>,
): Poll<T, E> => {
	const snapshot = cursor.snapshot();
	const result = parse(cursor);

	if (result.status !== 'complete') {
		cursor.restore(snapshot);
	}

	return result;
};

/**
 * Turns `parse` into a rule that can be used as a sub-rule without
 * further care.
 */
export const atomic = <C extends Cursor, T, E>(
	parse: Parser<C, T, E>,
): Parser<C, T, E> => {
	return (cursor) => group(cursor, parse);
};
