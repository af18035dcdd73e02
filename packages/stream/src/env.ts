/*
 * SPDX-FileCopyrightText: syuilo and misskey-project
 * SPDX-License-Identifier: AGPL-3.0-only
 */

const envOption = {
	isTest: process.env['NODE_ENV'] === 'test',
	isDevelopment: process.env['NODE_ENV'] === 'development',
	isProduction: process.env['NODE_ENV'] === 'production',

	ABNF_QUIET: process.env['ABNF_QUIET'] !== undefined,
	ABNF_VERBOSE: process.env['ABNF_VERBOSE'] !== undefined,
	ABNF_WITH_LOG_TIME: process.env['ABNF_WITH_LOG_TIME'] !== undefined,
};

if (envOption.isTest) {
	envOption.ABNF_QUIET = true;
}

export { envOption };
