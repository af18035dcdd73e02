import {
	ALPHA,
	DIGIT,
	DQUOTE,
	capture,
	choice,
	expectedAtLeastOne,
	literal,
	many1,
	map,
	range,
	separated,
	sequence,
	type Rule,
} from '@abnfkit/grammar';
import type { SignatureParam } from '../types.js';

const name = capture(many1(ALPHA, expectedAtLeastOne('ALPHA')));

/** `%x20-21 / %x23-7E` */
const quotedChar = choice([range(0x20, 0x21), range(0x23, 0x7e)]);

const quotedText = capture(many1(quotedChar, expectedAtLeastOne('quoted character')));

const quoted = map(sequence([DQUOTE, quotedText, DQUOTE]), ([, value]) => value);

const number = capture(many1(DIGIT, expectedAtLeastOne('DIGIT')));

/**
 * `param = 1*ALPHA "=" ( DQUOTE 1*(%x20-21 / %x23-7E) DQUOTE / 1*DIGIT )`
 */
export const signatureParam: Rule<SignatureParam> = map(
	sequence([name, literal('='), choice([quoted, number])]),
	([key, , value]) => ({ key, value }),
);

/**
 * `param *( "," param )`
 *
 * The list has no terminator of its own, so on open input it suspends after
 * every parameter until the next byte shows whether a comma follows.
 */
export const signatureParams: Rule<SignatureParam[]> = separated(
	signatureParam,
	literal(','),
);
