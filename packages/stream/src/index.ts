export type * from './types.js';
export {
	BufferLimitExceededError,
	IncompleteInputError,
	NoProgressError,
	ParseFailedError,
} from './errors.js';
export { envOption } from './env.js';
export { default as Logger } from './logger.js';
export { parseStream } from './parseStream.js';
export { StreamParser } from './StreamParser.js';
