export type * from './cursor.js';
export type * from './type.js';
export type { Complete, Failed, Poll, Result, Suspended } from './outcome.js';
export {
	complete,
	failed,
	intoResult,
	isComplete,
	isFailed,
	isSuspended,
	suspended,
} from './outcome.js';
export { atLeastOnce } from './combinators/atLeastOnce.js';
export { atomic, group } from './combinators/group.js';
export { firstSome, optGroup } from './combinators/optGroup.js';
export { optional } from './combinators/optional.js';
export { repeat } from './combinators/repeat.js';
