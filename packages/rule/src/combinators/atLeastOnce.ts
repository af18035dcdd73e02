import type { Cursor } from '../cursor.js';
import { failed, type Poll } from '../outcome.js';
import type { Combine, Parser } from '../type.js';
import { drive } from './drive.js';
import { group } from './group.js';

/**
 * Repetition that needs at least one element.
 *
 * Works like `repeat()`, except that when `parse` fails on the first element
 * `combine` is not called at all and the repetition fails with
 * `adapt(error)` instead.
 */
export const atLeastOnce = <C extends Cursor, R, E, S, F>(
	cursor: C,
	parse: Parser<C, R, E>,
	combine: Combine<R, E, S, F>,
	adapt: (error: E) => F,
): Poll<S, F> => {
	return group(cursor, (cursor): Poll<S, F> => {
		const first = parse(cursor);
		if (first.status === 'suspended') return first;
		if (first.status === 'failed') return failed(adapt(first.error));

		const next = combine({ ok: true, value: first.value });
		if (next.status !== 'suspended') return next;

		return drive(cursor, parse, combine);
	});
};
