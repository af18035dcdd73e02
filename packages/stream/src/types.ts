export type StreamParserOption = {
	/**
	 * Name of the rule in log lines.
	 *
	 * @default 'rule'
	 */
	name?: string;

	/**
	 * The number of bytes that may pile up while the rule still cannot
	 * decide.
	 *
	 * @default 65536
	 */
	maxBufferSize?: number;
};
