import * as assert from 'assert';

import { ByteCursor } from '@abnfkit/buffer';
import { complete, failed, suspended } from '@abnfkit/rule';
import {
	ALPHA,
	DIGIT,
	SP,
	SyntaxMismatchError,
	bounded,
	capture,
	char,
	choice,
	count,
	expectedAtLeastOne,
	literal,
	many,
	many1,
	map,
	mapError,
	maybe,
	range,
	separated,
	sequence,
} from '../src/index.js';

const open = (input: string) => {
	const cursor = new ByteCursor();
	cursor.append(input);
	return cursor;
};

describe('terminals', () => {
	test('range', () => {
		const rule = range(0x61, 0x63);

		assert.deepStrictEqual(rule(ByteCursor.from('b')), complete(0x62));
		assert.deepStrictEqual(
			rule(ByteCursor.from('d')),
			failed(new SyntaxMismatchError('%x61-63', 0)),
		);
		assert.deepStrictEqual(rule(open('')), suspended());
	});

	test('char names its expectation', () => {
		const cursor = ByteCursor.from('');
		const result = char(0x2c, 'comma')(cursor);

		assert.strictEqual(result.status, 'failed');
		if (result.status !== 'failed') return;
		assert.strictEqual(result.error.message, 'Expected comma at 0');
	});

	test('literal is case-insensitive by default', () => {
		const cursor = ByteCursor.from('SIGNATURE ');

		assert.deepStrictEqual(literal('Signature')(cursor), complete('SIGNATURE'));
		assert.strictEqual(cursor.position, 9);
	});

	test('case-sensitive literal', () => {
		const cursor = ByteCursor.from('abc');
		const result = literal('ABC', { caseSensitive: true })(cursor);

		assert.deepStrictEqual(result, failed(new SyntaxMismatchError('%s"ABC"', 0)));
		assert.strictEqual(cursor.position, 0);
	});

	test('literal suspends on a matching prefix only', () => {
		assert.deepStrictEqual(literal('hello')(open('hel')), suspended());
		assert.strictEqual(literal('hello')(open('hex')).status, 'failed');
		assert.strictEqual(literal('hello')(ByteCursor.from('hel')).status, 'failed');
	});

	test('literal rejects text that is not US-ASCII', () => {
		assert.throws(() => literal('あ'), RangeError);
		assert.throws(
			() => literal('café'),
			(e: unknown) => e instanceof RangeError && e.message === 'Literal "café" is not US-ASCII',
		);
		assert.doesNotThrow(() => literal('~\x7f'));
	});
});

describe('sequence', () => {
	const pair = sequence([ALPHA, literal('='), DIGIT]);

	test('yields a tuple', () => {
		const cursor = ByteCursor.from('a=1;');

		assert.deepStrictEqual(pair(cursor), complete(['a', '=', '1']));
		assert.strictEqual(cursor.position, 3);
	});

	test('consumes nothing when a later rule fails', () => {
		const cursor = ByteCursor.from('a=x');
		const result = pair(cursor);

		assert.deepStrictEqual(result, failed(new SyntaxMismatchError('DIGIT', 2)));
		assert.strictEqual(cursor.position, 0);
	});

	test('consumes nothing while undecided', () => {
		const cursor = open('a=');

		assert.deepStrictEqual(pair(cursor), suspended());
		assert.strictEqual(cursor.position, 0);
	});
});

describe('choice', () => {
	const rule = choice([literal('GET'), literal('GOT'), DIGIT]);

	test('takes the first match', () => {
		const cursor = ByteCursor.from('GOT');

		assert.deepStrictEqual(rule(cursor), complete('GOT'));
		assert.strictEqual(cursor.position, 3);
	});

	test('fails with the last error', () => {
		assert.deepStrictEqual(
			rule(ByteCursor.from('x')),
			failed(new SyntaxMismatchError('DIGIT', 0)),
		);
	});

	test('an undecided alternative stops the search', () => {
		assert.deepStrictEqual(rule(open('GE')), suspended());
		assert.deepStrictEqual(rule(open('G')), suspended());
	});
});

describe('repetition builders', () => {
	test('many', () => {
		const cursor = ByteCursor.from('ab1');

		assert.deepStrictEqual(many(ALPHA)(cursor), complete(['a', 'b']));
		assert.strictEqual(cursor.position, 2);
	});

	test('many1', () => {
		const rule = many1(DIGIT, expectedAtLeastOne('DIGIT'));

		assert.deepStrictEqual(rule(ByteCursor.from('42')), complete(['4', '2']));
		assert.deepStrictEqual(
			rule(ByteCursor.from('x')),
			failed(new SyntaxMismatchError('at least one DIGIT', 0)),
		);
	});

	test('count', () => {
		const rule = count(3, DIGIT);
		const cursor = ByteCursor.from('12345');

		assert.deepStrictEqual(rule(cursor), complete(['1', '2', '3']));
		assert.strictEqual(cursor.position, 3);

		const short = ByteCursor.from('12a');
		assert.deepStrictEqual(rule(short), failed(new SyntaxMismatchError('DIGIT', 2)));
		assert.strictEqual(short.position, 0);
	});

	test('bounded', () => {
		const rule = bounded(1, 2, DIGIT);

		assert.deepStrictEqual(rule(ByteCursor.from('9a')), complete(['9']));
		assert.deepStrictEqual(rule(ByteCursor.from('987')), complete(['9', '8']));
		assert.deepStrictEqual(rule(ByteCursor.from('')), failed(new SyntaxMismatchError('DIGIT', 0)));
	});

	test('bounded with a zero maximum reads nothing', () => {
		const cursor = open('');

		assert.deepStrictEqual(bounded(0, 0, DIGIT)(cursor), complete([]));
		assert.throws(() => bounded(2, 1, DIGIT), RangeError);
	});

	test('unbounded upper limit', () => {
		const rule = bounded(2, Infinity, DIGIT);

		assert.deepStrictEqual(rule(ByteCursor.from('1234.')), complete(['1', '2', '3', '4']));
	});

	test('builders keep no state between calls', () => {
		const rule = many(DIGIT);
		const cursor = open('12');

		assert.deepStrictEqual(rule(cursor), suspended());
		cursor.append('3 ');
		assert.deepStrictEqual(rule(cursor), complete(['1', '2', '3']));
	});
});

describe('separated', () => {
	const list = separated(DIGIT, literal(','));

	test('collects every element', () => {
		const cursor = ByteCursor.from('1,2,3;');

		assert.deepStrictEqual(list(cursor), complete(['1', '2', '3']));
		assert.strictEqual(cursor.position, 5);
	});

	test('leaves a dangling separator', () => {
		const cursor = ByteCursor.from('1,2,x');

		assert.deepStrictEqual(list(cursor), complete(['1', '2']));
		assert.strictEqual(cursor.position, 3);
	});

	test('fails without a first element', () => {
		assert.deepStrictEqual(
			list(ByteCursor.from(',1')),
			failed(new SyntaxMismatchError('DIGIT', 0)),
		);
	});
});

describe('maybe, map, capture', () => {
	test('maybe', () => {
		const rule = sequence([ALPHA, maybe(SP), DIGIT]);

		assert.deepStrictEqual(rule(ByteCursor.from('a 1')), complete(['a', ' ', '1']));
		assert.deepStrictEqual(rule(ByteCursor.from('a1')), complete(['a', null, '1']));
	});

	test('map and mapError', () => {
		const number = map(many1(DIGIT, expectedAtLeastOne('DIGIT')), (values) =>
			Number(values.join('')),
		);
		const labelled = mapError(number, (error) => error.expected);

		assert.deepStrictEqual(number(ByteCursor.from('204 ')), complete(204));
		assert.deepStrictEqual(labelled(ByteCursor.from('-1')), failed('at least one DIGIT'));
	});

	test('capture', () => {
		const token = capture(sequence([ALPHA, many(choice([ALPHA, DIGIT]))]));
		const cursor = ByteCursor.from('abc12 rest');

		assert.deepStrictEqual(token(cursor), complete('abc12'));
		assert.strictEqual(cursor.position, 5);
	});
});
