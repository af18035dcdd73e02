import { complete, failed, suspended } from '@abnfkit/rule';
import { SyntaxMismatchError } from '../errors.js';
import type { Rule } from '../type.js';
import { hex } from '../utils/latin1.js';

/**
 * Matches a single byte. Suspends when no byte is buffered yet and more
 * input may follow.
 */
export const byte = (
	predicate: (value: number) => boolean,
	expected: string,
): Rule<number> => {
	return (cursor) => {
		const value = cursor.peek();

		if (value === undefined) {
			if (cursor.ended) {
				return failed(new SyntaxMismatchError(expected, cursor.position));
			} else {
				return suspended();
			}
		}
		if (!predicate(value)) {
			return failed(new SyntaxMismatchError(expected, cursor.position));
		}

		cursor.advance(1);
		return complete(value);
	};
};

/** `%xMM-NN` */
export const range = (min: number, max: number, expected?: string): Rule<number> => {
	return byte(
		(value) => value >= min && value <= max,
		expected ?? `%x${hex(min)}-${hex(max)}`,
	);
};

/** `%xNN` */
export const char = (code: number, expected?: string): Rule<number> => {
	return byte((value) => value === code, expected ?? `%x${hex(code)}`);
};
