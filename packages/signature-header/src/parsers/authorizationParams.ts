import { SP, literal, map, sequence, type Rule } from '@abnfkit/grammar';
import type { SignatureParam } from '../types.js';
import { signatureParams } from './signatureParams.js';

/** `"Signature" SP params` */
export const authorizationParams: Rule<SignatureParam[]> = map(
	sequence([literal('Signature'), SP, signatureParams]),
	([, , params]) => params,
);
