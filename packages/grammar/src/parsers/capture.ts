import { complete } from '@abnfkit/rule';
import type { Rule } from '../type.js';
import { latin1 } from '../utils/latin1.js';

/**
 * Yields the input `rule` matched instead of its value.
 */
export const capture = <T, E>(rule: Rule<T, E>): Rule<string, E> => {
	return (cursor) => {
		const start = cursor.position;
		const result = rule(cursor);
		if (result.status !== 'complete') return result;

		return complete(latin1(cursor.slice(start)));
	};
};
