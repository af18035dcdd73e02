import { optional } from '@abnfkit/rule';
import type { Rule } from '../type.js';

/** `[Rule]` */
export const maybe = <T extends {}, E>(rule: Rule<T, E>): Rule<T | null, never> => {
	return (cursor) => optional(cursor, rule);
};
