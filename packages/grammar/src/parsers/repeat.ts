import {
	atLeastOnce,
	complete,
	failed,
	repeat,
	suspended,
	type Combine,
} from '@abnfkit/rule';
import type { Rule } from '../type.js';

const collect = <T, E>(values: T[]): Combine<T, E, T[], never> => {
	return (item) => {
		if (!item.ok) return complete(values);

		values.push(item.value);
		return suspended();
	};
};

/** `*Rule` */
export const many = <T, E>(rule: Rule<T, E>): Rule<T[], never> => {
	return (cursor) => repeat(cursor, rule, collect<T, E>([]));
};

/**
 * `1*Rule`. When not even one element matches, fails with `adapt()` applied
 * to the element's error.
 */
export const many1 = <T, E, F>(
	rule: Rule<T, E>,
	adapt: (error: E) => F,
): Rule<T[], F> => {
	return (cursor) => atLeastOnce(cursor, rule, collect<T, E>([]), adapt);
};

/**
 * `<min>*<max>Rule`. Below `min` elements the element's error is returned.
 */
export const bounded = <T, E>(
	min: number,
	max: number,
	rule: Rule<T, E>,
): Rule<T[], E> => {
	if (min < 0 || max < min) {
		throw new RangeError(`Invalid repetition bounds ${min}*${max}`);
	}

	return (cursor) => {
		if (max === 0) return complete([]);

		const values: T[] = [];
		const combine: Combine<T, E, T[], E> = (item) => {
			if (!item.ok) {
				return values.length >= min ? complete(values) : failed(item.error);
			}

			values.push(item.value);
			return values.length >= max ? complete(values) : suspended();
		};

		return repeat(cursor, rule, combine);
	};
};

/** `<n>Rule` */
export const count = <T, E>(n: number, rule: Rule<T, E>): Rule<T[], E> => {
	return bounded(n, n, rule);
};
