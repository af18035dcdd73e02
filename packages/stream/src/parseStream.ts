import type { ByteCursor } from '@abnfkit/buffer';
import type { Parser } from '@abnfkit/rule';
import { StreamParser } from './StreamParser.js';
import type { StreamParserOption } from './types.js';

/**
 * Yields every value `rule` parses from `source`, in order.
 */
export async function* parseStream<T, E>(
	source: AsyncIterable<string | Uint8Array>,
	rule: Parser<ByteCursor, T, E>,
	options?: StreamParserOption,
): AsyncGenerator<T, void, undefined> {
	const parser = new StreamParser(rule, options);

	for await (const chunk of source) {
		yield* parser.push(chunk);
	}

	yield* parser.end();
}
