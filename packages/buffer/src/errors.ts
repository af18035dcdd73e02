class BufferError extends Error {
	constructor(caller: { name: string }, message?: string) {
		super(message);
		this.name = caller.name;
	}
}

export class InputEndedError extends BufferError {
	constructor(message?: string) {
		super(InputEndedError, message);
	}
}
