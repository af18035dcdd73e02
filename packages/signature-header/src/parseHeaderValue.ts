import { ByteCursor } from '@abnfkit/buffer';
import type { Rule } from '@abnfkit/grammar';
import { InvalidParamsError } from './errors.js';
import { authorizationParams } from './parsers/authorizationParams.js';
import { signatureParams } from './parsers/signatureParams.js';
import type { SignatureParam } from './types.js';

const parseWhole = (rule: Rule<SignatureParam[]>, value: string): SignatureParam[] => {
	const cursor = ByteCursor.from(value);
	const result = rule(cursor);

	if (result.status === 'failed') {
		throw new InvalidParamsError(result.error.message);
	}
	if (result.status === 'suspended' || cursor.available !== 0) {
		throw new InvalidParamsError(`Unexpected input at ${cursor.position}`);
	}

	return result.value;
};

/**
 * Parses the value of a `Signature` header.
 *
 * @throws {InvalidParamsError}
 */
export const parseSignatureHeaderValue = (value: string): SignatureParam[] => {
	return parseWhole(signatureParams, value);
};

/**
 * Parses the value of an `Authorization` header using the `Signature`
 * scheme.
 *
 * @throws {InvalidParamsError}
 */
export const parseAuthorizationHeaderValue = (value: string): SignatureParam[] => {
	return parseWhole(authorizationParams, value);
};
