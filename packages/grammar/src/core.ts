/**
 * Core rules of RFC 5234, Appendix B.1.
 *
 * Single-byte rules yield the matched character.
 */

import type { Rule } from './type.js';
import { byte, char } from './parsers/byte.js';
import { capture } from './parsers/capture.js';
import { choice } from './parsers/choice.js';
import { map } from './parsers/map.js';
import { many } from './parsers/repeat.js';
import { sequence } from './parsers/sequence.js';

const single = (
	expected: string,
	predicate: (value: number) => boolean,
): Rule<string> => {
	return map(byte(predicate, expected), (value) => String.fromCharCode(value));
};

const isDigit = (value: number) => value >= 0x30 && value <= 0x39;

export const ALPHA = single(
	'ALPHA',
	(value) => (value >= 0x41 && value <= 0x5a) || (value >= 0x61 && value <= 0x7a),
);

export const BIT = single('BIT', (value) => value === 0x30 || value === 0x31);

export const CHAR = single('CHAR', (value) => value >= 0x01 && value <= 0x7f);

export const CR = single('CR', (value) => value === 0x0d);

export const LF = single('LF', (value) => value === 0x0a);

export const CRLF: Rule<string> = map(sequence([CR, LF]), () => '\r\n');

export const CTL = single('CTL', (value) => value <= 0x1f || value === 0x7f);

export const DIGIT = single('DIGIT', isDigit);

export const DQUOTE = map(char(0x22, 'DQUOTE'), () => '"');

// quoted ABNF strings are case-insensitive, so "A" to "F" admit lower case
export const HEXDIG = single(
	'HEXDIG',
	(value) =>
		isDigit(value) || (value >= 0x41 && value <= 0x46) || (value >= 0x61 && value <= 0x66),
);

export const HTAB = single('HTAB', (value) => value === 0x09);

export const SP = single('SP', (value) => value === 0x20);

export const WSP: Rule<string> = choice([SP, HTAB]);

export const OCTET = single('OCTET', () => true);

export const VCHAR = single('VCHAR', (value) => value >= 0x21 && value <= 0x7e);

/**
 * `*(WSP / CRLF WSP)`. Yields the whitespace as matched.
 */
export const LWSP: Rule<string, never> = capture(
	many(choice([WSP, map(sequence([CRLF, WSP]), ([crlf, wsp]) => crlf + wsp)])),
);
