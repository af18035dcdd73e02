import type { ByteCursor } from '@abnfkit/buffer';
import { atomic, complete, type Poll } from '@abnfkit/rule';
import type { Rule } from '../type.js';
import { many } from './repeat.js';

/** `rule *(separator rule)` */
export const separated = <T, E>(
	rule: Rule<T, E>,
	separator: Rule<unknown, unknown>,
): Rule<T[], E> => {
	const next = atomic((cursor: ByteCursor): Poll<T, unknown> => {
		const result = separator(cursor);
		if (result.status !== 'complete') return result;

		return rule(cursor);
	});
	const rest = many(next);

	return atomic((cursor: ByteCursor): Poll<T[], E> => {
		const first = rule(cursor);
		if (first.status !== 'complete') return first;

		const others = rest(cursor);
		if (others.status !== 'complete') return others;

		return complete([first.value, ...others.value]);
	});
};
