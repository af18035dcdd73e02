export type * from './types.js';
export { InvalidParamsError } from './errors.js';
export { authorizationParams } from './parsers/authorizationParams.js';
export { signatureParam, signatureParams } from './parsers/signatureParams.js';
export {
	parseAuthorizationHeaderValue,
	parseSignatureHeaderValue,
} from './parseHeaderValue.js';
