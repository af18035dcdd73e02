import type { Rule } from '../type.js';

/**
 * Alternation: `Rule1 / Rule2 / ...`.
 *
 * The first rule that matches wins. A rule that cannot decide yet ends the
 * search, since a later one must not win over it. If every rule fails, so
 * does the choice, with the last error.
 */
export const choice = <T, E>(rules: [Rule<T, E>, ...Rule<T, E>[]]): Rule<T, E> => {
	const [first, ...rest] = rules;

	return (cursor) => {
		let result = first(cursor);

		for (const rule of rest) {
			if (result.status !== 'failed') return result;
			result = rule(cursor);
		}

		return result;
	};
};
