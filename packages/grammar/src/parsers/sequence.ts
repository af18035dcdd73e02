import { complete, failed, group, type Poll } from '@abnfkit/rule';
import type { InferRuleErrors, InferRules, Rule } from '../type.js';

/**
 * Concatenation: `Rule1 Rule2 ...`. Consumes nothing unless every rule
 * matched.
 */
export const sequence = <T extends Rule<unknown, unknown>[]>(
	rules: [...T],
): Rule<InferRules<T>, InferRuleErrors<T>> => {
	return (cursor) => {
		return group(cursor, (cursor): Poll<InferRules<T>, InferRuleErrors<T>> => {
			const values: unknown[] = [];

			for (const rule of rules) {
				const result = rule(cursor);
				if (result.status === 'suspended') return result;
				if (result.status === 'failed') {
					return failed(result.error as InferRuleErrors<T>);
				}

				values.push(result.value);
			}

			return complete(values as InferRules<T>);
		});
	};
};
