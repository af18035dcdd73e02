class GrammarError extends Error {
	constructor(caller: { name: string }, message?: string) {
		super(message);
		this.name = caller.name;
	}
}

export class SyntaxMismatchError extends GrammarError {
	constructor(
		public readonly expected: string,
		public readonly position: number,
	) {
		super(SyntaxMismatchError, `Expected ${expected} at ${position}`);
	}
}

/**
 * Error adapter for `many1()` and friends.
 */
export const expectedAtLeastOne = (label: string) => {
	return (error: SyntaxMismatchError): SyntaxMismatchError => {
		return new SyntaxMismatchError(`at least one ${label}`, error.position);
	};
};
