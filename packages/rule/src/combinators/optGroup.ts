import type { Cursor } from '../cursor.js';
import { complete, type Poll } from '../outcome.js';
import type { Parser } from '../type.js';

/**
 * Like `group()`, but a `complete` result of `null` rewinds as well.
 */
export const optGroup = <C extends Cursor, T extends {}, E>(
	cursor: C,
	parse: Parser<C, T | null, E>,
): Poll<T | null, E> => {
	const snapshot = cursor.snapshot();
	const result = parse(cursor);

	if (result.status !== 'complete' || result.value === null) {
		cursor.restore(snapshot);
	}

	return result;
};

/**
 * Alternation over rules that report "not here" as `null`.
 *
 * Returns the first alternative that found something, could not decide or
 * failed. Only when every alternative came back empty is the result empty.
 */
export const firstSome = <C extends Cursor, T extends {}, E>(
	cursor: C,
	alternatives: Parser<C, T | null, E>[],
): Poll<T | null, E> => {
	for (const alternative of alternatives) {
		const result = optGroup(cursor, alternative);
		if (result.status !== 'complete' || result.value !== null) return result;
	}

	return complete(null);
};
