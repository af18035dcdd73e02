class SignatureHeaderError extends Error {
	constructor(caller: { name: string }, message?: string) {
		super(message);
		this.name = caller.name;
	}
}

export class InvalidParamsError extends SignatureHeaderError {
	constructor(message?: string) {
		super(InvalidParamsError, message);
	}
}
