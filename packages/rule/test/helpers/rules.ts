import {
	complete,
	failed,
	suspended,
	type Combine,
	type Parser,
} from '../../src/index.js';
import type { CharCursor } from './CharCursor.js';

export const digit: Parser<CharCursor, string, string> = (cursor) => {
	const c = cursor.peek();
	if (c === undefined) {
		return cursor.ended ? failed('end of input') : suspended();
	}
	if (c < '0' || c > '9') return failed(`unexpected ${c}`);

	cursor.position++;
	return complete(c);
};

/** Consumes one byte and then fails. Breaks the parser contract on purpose. */
export const leaky: Parser<CharCursor, string, string> = (cursor) => {
	cursor.position++;
	return failed('leaky');
};

export const collect = (): Combine<string, string, string[], never> => {
	const values: string[] = [];

	return (item) => {
		if (item.ok) {
			values.push(item.value);
			return suspended();
		} else {
			return complete(values);
		}
	};
};
