type Segment = {
	/** absolute offset of the first byte */
	start: number;
	bytes: Uint8Array;
};

/**
 * Append-only list of byte chunks addressed by absolute offset.
 *
 * Chunks are never modified once stored, so every cursor state sharing the
 * chain stays valid while more input is appended.
 */
export class SegmentChain {
	private segments: Segment[] = [];
	private base = 0;
	private total = 0;

	/** Offset of the first byte still held. */
	public get start(): number {
		return this.base;
	}

	/** Offset one past the last byte appended. */
	public get end(): number {
		return this.total;
	}

	public append(chunk: Uint8Array): void {
		if (chunk.length === 0) return;

		this.segments.push({ start: this.total, bytes: chunk.slice() });
		this.total += chunk.length;
	}

	public at(offset: number): number | undefined {
		if (offset < this.base || offset >= this.total) return undefined;

		const segment = this.segments[this.find(offset)];
		if (segment === undefined) return undefined;
		return segment.bytes[offset - segment.start];
	}

	/**
	 * Copies the bytes in `[from, to)`. Both ends must lie within the held
	 * range.
	 */
	public copy(from: number, to: number): Uint8Array {
		if (from < this.base || to > this.total || from > to) {
			throw new RangeError(`Range ${from}..${to} is outside of ${this.base}..${this.total}`);
		}

		const result = new Uint8Array(to - from);
		let written = 0;

		for (let i = this.find(from); written < result.length; i++) {
			const segment = this.segments[i];
			if (segment === undefined) break;

			const begin = Math.max(from, segment.start) - segment.start;
			const finish = Math.min(to, segment.start + segment.bytes.length) - segment.start;
			result.set(segment.bytes.subarray(begin, finish), written);
			written += finish - begin;
		}

		return result;
	}

	/**
	 * Drops every segment that ends at or before `offset`. Returns the number
	 * of bytes dropped.
	 */
	public releaseBefore(offset: number): number {
		let count = 0;

		for (const segment of this.segments) {
			if (segment.start + segment.bytes.length > offset) break;
			count++;
		}
		if (count === 0) return 0;

		this.segments.splice(0, count);
		const previous = this.base;
		this.base = this.segments[0]?.start ?? this.total;

		return this.base - previous;
	}

	private find(offset: number): number {
		let low = 0;
		let high = this.segments.length - 1;

		while (low < high) {
			const middle = (low + high + 1) >> 1;
			const segment = this.segments[middle];
			if (segment !== undefined && segment.start <= offset) {
				low = middle;
			} else {
				high = middle - 1;
			}
		}

		return low;
	}
}
