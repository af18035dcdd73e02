import type { Cursor } from '../cursor.js';
import { intoResult, type Poll } from '../outcome.js';
import type { Combine, Parser } from '../type.js';

/**
 * The repetition loop shared by `repeat()` and `atLeastOnce()`. Does not
 * rewind; callers run it inside `group()`.
 */
export const drive = <C extends Cursor, R, E, S, F>(
	cursor: C,
	parse: Parser<C, R, E>,
	combine: Combine<R, E, S, F>,
): Poll<S, F> => {
	for (;;) {
		const item = parse(cursor);
		if (item.status === 'suspended') return item;

		const next = combine(intoResult(item));
		if (next.status !== 'suspended') return next;
	}
};
