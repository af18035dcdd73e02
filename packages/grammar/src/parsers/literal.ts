import { complete, failed, suspended } from '@abnfkit/rule';
import { SyntaxMismatchError } from '../errors.js';
import type { Rule } from '../type.js';
import { latin1 } from '../utils/latin1.js';

export type LiteralOption = {
	/**
	 * Match the exact case, as `%s"..."` does.
	 *
	 * @default false
	 */
	caseSensitive?: boolean;
};

const fold = (value: number): number => {
	return value >= 0x41 && value <= 0x5a ? value + 0x20 : value;
};

/**
 * A quoted ABNF string. Yields the bytes as they appeared in the input.
 *
 * Only US-ASCII text is accepted, since string chunks reach the cursor as
 * UTF-8.
 */
export const literal = (
	text: string,
	options: LiteralOption | undefined = {},
): Rule<string> => {
	const caseSensitive = options.caseSensitive ?? false;
	const codes = Array.from(text, (c) => c.charCodeAt(0));
	if (codes.some((code) => code > 0x7f)) {
		throw new RangeError(`Literal ${JSON.stringify(text)} is not US-ASCII`);
	}

	const expected = (caseSensitive ? '%s' : '') + JSON.stringify(text);
	const equals = caseSensitive
		? (a: number, b: number) => a === b
		: (a: number, b: number) => fold(a) === fold(b);

	return (cursor) => {
		for (const [i, code] of codes.entries()) {
			const value = cursor.peek(i);

			if (value === undefined) {
				if (cursor.ended) {
					return failed(new SyntaxMismatchError(expected, cursor.position));
				} else {
					return suspended();
				}
			}
			if (!equals(value, code)) {
				return failed(new SyntaxMismatchError(expected, cursor.position));
			}
		}

		const bytes = cursor.read(codes.length);
		if (bytes === undefined) return suspended();
		return complete(latin1(bytes));
	};
};
