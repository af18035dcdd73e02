import type { ByteCursor } from '@abnfkit/buffer';
import type { InferError, InferValue, Parser } from '@abnfkit/rule';
import type { SyntaxMismatchError } from './errors.js';

export type Rule<T, E = SyntaxMismatchError> = Parser<ByteCursor, T, E>;

export type InferRules<T extends Rule<unknown, unknown>[]> = {
	[K in keyof T]: InferValue<T[K]>;
};

export type InferRuleErrors<T extends Rule<unknown, unknown>[]> = InferError<
	T[number]
>;
