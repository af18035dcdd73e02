export type { ByteCursorSnapshot } from './ByteCursor.js';
export { ByteCursor } from './ByteCursor.js';
export { InputEndedError } from './errors.js';
export { SegmentChain } from './SegmentChain.js';
