export type * from './type.js';
export type { LiteralOption } from './parsers/literal.js';
export { SyntaxMismatchError, expectedAtLeastOne } from './errors.js';
export { atomic } from '@abnfkit/rule';
export { byte, char, range } from './parsers/byte.js';
export { capture } from './parsers/capture.js';
export { choice } from './parsers/choice.js';
export { literal } from './parsers/literal.js';
export { map, mapError } from './parsers/map.js';
export { maybe } from './parsers/maybe.js';
export { bounded, count, many, many1 } from './parsers/repeat.js';
export { separated } from './parsers/separated.js';
export { sequence } from './parsers/sequence.js';
export * from './core.js';
