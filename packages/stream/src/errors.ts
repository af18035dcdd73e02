class StreamError extends Error {
	constructor(caller: { name: string }, message?: string, options?: ErrorOptions) {
		super(message, options);
		this.name = caller.name;
	}
}

/**
 * The rule decided that the input does not match. The rule's own error is
 * the `cause`.
 */
export class ParseFailedError extends StreamError {
	constructor(
		public readonly position: number,
		cause: unknown,
	) {
		super(ParseFailedError, `Parse failed at ${position}`, { cause });
	}
}

export class IncompleteInputError extends StreamError {
	constructor(
		public readonly position: number,
		public readonly remaining: number,
	) {
		super(
			IncompleteInputError,
			`Input ended with ${remaining} unparsed bytes at ${position}`,
		);
	}
}

export class NoProgressError extends StreamError {
	constructor(public readonly position: number) {
		super(NoProgressError, `Rule completed without consuming input at ${position}`);
	}
}

export class BufferLimitExceededError extends StreamError {
	constructor(
		public readonly position: number,
		public readonly limit: number,
	) {
		super(
			BufferLimitExceededError,
			`More than ${limit} bytes buffered without a match at ${position}`,
		);
	}
}
