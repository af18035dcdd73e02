import { complete, failed } from '@abnfkit/rule';
import type { Rule } from '../type.js';

export const map = <T, U, E>(
	rule: Rule<T, E>,
	fn: (value: T) => U,
): Rule<U, E> => {
	return (cursor) => {
		const result = rule(cursor);

		if (result.status === 'complete') {
			return complete(fn(result.value));
		} else {
			return result;
		}
	};
};

export const mapError = <T, E, F>(
	rule: Rule<T, E>,
	fn: (error: E) => F,
): Rule<T, F> => {
	return (cursor) => {
		const result = rule(cursor);

		if (result.status === 'failed') {
			return failed(fn(result.error));
		} else {
			return result;
		}
	};
};
