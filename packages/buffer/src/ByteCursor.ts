import type { Cursor } from '@abnfkit/rule';
import { InputEndedError } from './errors.js';
import { SegmentChain } from './SegmentChain.js';

export type ByteCursorSnapshot = {
	readonly position: number;
};

const encoder = new TextEncoder();

const toBytes = (input: string | Uint8Array): Uint8Array => {
	return typeof input === 'string' ? encoder.encode(input) : input;
};

/**
 * Read position over a stream of bytes that may still be growing.
 *
 * Positions are absolute offsets from the start of the stream and stay
 * meaningful after consumed bytes have been released. A snapshot is just a
 * position, so taking and restoring one is constant time.
 */
export class ByteCursor implements Cursor<ByteCursorSnapshot> {
	private readonly chain = new SegmentChain();
	private offset = 0;
	private closed = false;

	/**
	 * Creates a cursor over input that is already complete.
	 */
	public static from(input: string | Uint8Array): ByteCursor {
		const cursor = new ByteCursor();
		cursor.append(input);
		cursor.end();
		return cursor;
	}

	public get position(): number {
		return this.offset;
	}

	/** Bytes buffered after the current position. */
	public get available(): number {
		return this.chain.end - this.offset;
	}

	/** Bytes held, including consumed ones that have not been released. */
	public get buffered(): number {
		return this.chain.end - this.chain.start;
	}

	/** Whether no more input will be appended. */
	public get ended(): boolean {
		return this.closed;
	}

	public append(chunk: string | Uint8Array): void {
		if (this.closed) throw new InputEndedError('Cannot append to an ended input');
		this.chain.append(toBytes(chunk));
	}

	public end(): void {
		this.closed = true;
	}

	public peek(offset = 0): number | undefined {
		return this.chain.at(this.offset + offset);
	}

	public advance(count: number): void {
		if (count < 0 || count > this.available) {
			throw new RangeError(`Cannot advance by ${count} with ${this.available} bytes available`);
		}
		this.offset += count;
	}

	/**
	 * Copies the next `count` bytes and moves past them. Returns `undefined`
	 * without moving if fewer are buffered.
	 */
	public read(count: number): Uint8Array | undefined {
		if (count > this.available) return undefined;

		const bytes = this.chain.copy(this.offset, this.offset + count);
		this.offset += count;
		return bytes;
	}

	/** Copies the bytes between two absolute positions. */
	public slice(from: number, to: number = this.offset): Uint8Array {
		return this.chain.copy(from, to);
	}

	public snapshot(): ByteCursorSnapshot {
		return { position: this.offset };
	}

	public restore(snapshot: ByteCursorSnapshot): void {
		if (snapshot.position < this.chain.start || snapshot.position > this.chain.end) {
			throw new RangeError(`Position ${snapshot.position} is no longer buffered`);
		}
		this.offset = snapshot.position;
	}

	/**
	 * Forgets bytes before the current position. Snapshots taken before the
	 * released range can no longer be restored.
	 */
	public release(): number {
		return this.chain.releaseBefore(this.offset);
	}
}
