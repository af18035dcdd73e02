import { ByteCursor } from '@abnfkit/buffer';
import { group, type Parser } from '@abnfkit/rule';
import {
	BufferLimitExceededError,
	IncompleteInputError,
	NoProgressError,
	ParseFailedError,
} from './errors.js';
import Logger from './logger.js';
import type { StreamParserOption } from './types.js';

const logger = new Logger('stream', 'cyan');

/**
 * Applies a rule over and over to input that arrives in chunks.
 *
 * Whenever the rule suspends, the parser waits for the next chunk and then
 * runs the rule again from where the unfinished value began. Bytes of
 * completed values are released right away.
 */
export class StreamParser<T, E> {
	private readonly cursor = new ByteCursor();
	private readonly logger: Logger;
	private readonly maxBufferSize: number;
	private failure: Error | null = null;

	constructor(
		private readonly rule: Parser<ByteCursor, T, E>,
		options: StreamParserOption | undefined = {},
	) {
		this.logger = logger.createSubLogger(options.name ?? 'rule');
		this.maxBufferSize = options.maxBufferSize ?? 65536;
	}

	/** Absolute offset of the first byte not yet parsed. */
	public get position(): number {
		return this.cursor.position;
	}

	/** Bytes waiting for the rule to decide. */
	public get pending(): number {
		return this.cursor.available;
	}

	/**
	 * Once this throws, every later call throws the same error.
	 *
	 * @throws {ParseFailedError}
	 * @throws {NoProgressError}
	 * @throws {BufferLimitExceededError}
	 */
	public push(chunk: string | Uint8Array): T[] {
		if (this.failure !== null) throw this.failure;

		this.cursor.append(chunk);
		return this.drain();
	}

	/**
	 * Signals that no more input follows and parses what is left.
	 *
	 * @throws {ParseFailedError}
	 * @throws {IncompleteInputError}
	 * @throws {NoProgressError}
	 */
	public end(): T[] {
		if (this.failure !== null) throw this.failure;

		this.cursor.end();
		return this.drain();
	}

	private fail(error: Error, data: Record<string, unknown> | null = null): never {
		this.failure = error;
		this.logger.error(error, data);
		throw error;
	}

	private drain(): T[] {
		const values: T[] = [];

		while (this.cursor.available > 0) {
			const start = this.cursor.position;
			const result = group(this.cursor, this.rule);

			switch (result.status) {
				case 'suspended': {
					if (this.cursor.ended) {
						return this.fail(new IncompleteInputError(start, this.cursor.available));
					}
					if (this.cursor.available > this.maxBufferSize) {
						return this.fail(new BufferLimitExceededError(start, this.maxBufferSize));
					}

					this.logger.debug('waiting for more input', {
						position: start,
						pending: this.cursor.available,
					});
					return values;
				}
				case 'failed': {
					return this.fail(new ParseFailedError(start, result.error), { cause: result.error });
				}
				case 'complete': {
					if (this.cursor.position === start) {
						return this.fail(new NoProgressError(start));
					}

					values.push(result.value);
					const released = this.cursor.release();
					this.logger.debug('parsed value', {
						from: start,
						to: this.cursor.position,
						released,
					});
				}
			}
		}

		return values;
	}
}
