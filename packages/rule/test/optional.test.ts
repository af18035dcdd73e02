import * as assert from 'assert';

import { complete, optional, suspended } from '../src/index.js';
import { CharCursor } from './helpers/CharCursor.js';
import { digit, leaky } from './helpers/rules.js';

describe('optional', () => {
	test('wraps a match', () => {
		const cursor = new CharCursor('5x');

		assert.deepStrictEqual(optional(cursor, digit), complete('5'));
		assert.strictEqual(cursor.position, 1);
	});

	test('turns a failure into null', () => {
		const cursor = new CharCursor('x5');

		assert.deepStrictEqual(optional(cursor, digit), complete(null));
		assert.strictEqual(cursor.position, 0);
	});

	test('passes a suspension through', () => {
		const cursor = new CharCursor('', false);

		assert.deepStrictEqual(optional(cursor, digit), suspended());
		assert.strictEqual(cursor.position, 0);
	});

	test('does not rewind by itself', () => {
		const cursor = new CharCursor('abc');

		assert.deepStrictEqual(optional(cursor, leaky), complete(null));
		assert.strictEqual(cursor.position, 1);
		assert.strictEqual(cursor.restores, 0);
	});
});
