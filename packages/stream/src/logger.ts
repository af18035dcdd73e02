/*
 * SPDX-FileCopyrightText: syuilo and misskey-project
 * SPDX-License-Identifier: AGPL-3.0-only
 */

import chalk from 'chalk';
import { format as dateFormat } from 'date-fns';
import { envOption } from './env.js';

type Context = {
	name: string;
	color?: string | undefined;
};

type Level = 'error' | 'warning' | 'debug' | 'info';

export default class Logger {
	private readonly context: Context;
	private parentLogger: Logger | null = null;

	constructor(context: string, color?: string) {
		this.context = {
			name: context,
			color: color,
		};
	}

	public createSubLogger(context: string, color?: string): Logger {
		const logger = new Logger(context, color);
		logger.parentLogger = this;
		return logger;
	}

	private log(
		level: Level,
		message: string,
		data: Record<string, unknown> | null,
		subContexts: Context[] = [],
	): void {
		if (envOption.ABNF_QUIET) return;

		if (this.parentLogger) {
			this.parentLogger.log(level, message, data, [
				this.context,
				...subContexts,
			]);
			return;
		}

		const time = dateFormat(new Date(), 'HH:mm:ss');

		const l = (() => {
			switch (level) {
				case 'error': {
					return chalk.red('ERR ');
				}
				case 'warning': {
					return chalk.yellow('WARN');
				}
				case 'debug': {
					return chalk.gray('VERB');
				}
				case 'info': {
					return chalk.blue('INFO');
				}
			}
		})();

		const contexts = [this.context, ...subContexts].map((d) => {
			return d.color ? chalk.keyword(d.color)(d.name) : chalk.white(d.name);
		});

		const m = (() => {
			switch (level) {
				case 'error': {
					return chalk.red(message);
				}
				case 'warning': {
					return chalk.yellow(message);
				}
				case 'debug': {
					return chalk.gray(message);
				}
				case 'info': {
					return message;
				}
			}
		})();

		let log = [l, `[${contexts.join(' ')}]`, m].join('\t');
		if (envOption.ABNF_WITH_LOG_TIME) {
			log = chalk.gray(time) + ' ' + log;
		}

		const args: unknown[] = [log];
		if (data !== null) {
			args.push(data);
		}
		console.log(...args);
	}

	/** Use when processing cannot continue */
	public error(e: string | Error, data: Record<string, unknown> | null = null): void {
		if (e instanceof Error) {
			this.log('error', e.toString(), { ...data, e });
		} else {
			this.log('error', e, data);
		}
	}

	/** Use when processing can continue but something should be fixed */
	public warn(message: string, data: Record<string, unknown> | null = null): void {
		this.log('warning', message, data);
	}

	/** Details a developer needs but a user does not */
	public debug(message: string, data: Record<string, unknown> | null = null): void {
		if (process.env['NODE_ENV'] !== 'production' || envOption.ABNF_VERBOSE) {
			this.log('debug', message, data);
		}
	}

	public info(message: string, data: Record<string, unknown> | null = null): void {
		this.log('info', message, data);
	}
}
