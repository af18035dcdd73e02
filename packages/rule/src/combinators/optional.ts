import type { Cursor } from '../cursor.js';
import { complete, type Poll } from '../outcome.js';
import type { Parser } from '../type.js';

/**
 * Applies `parse` at most once. A failure becomes `null` and its error is
 * dropped.
 *
 * There is no rewind here: a failing rule never consumes anything, so there
 * is nothing to undo. Only pass rules that keep to that.
 */
export const optional = <C extends Cursor, T extends {}, E>(
	cursor: C,
	parse: Parser<C, T, E>,
): Poll<T | null, never> => {
	const result = parse(cursor);

	switch (result.status) {
		case 'complete': {
			return result;
		}
		case 'suspended': {
			return result;
		}
		case 'failed': {
			return complete(null);
		}
	}
};
