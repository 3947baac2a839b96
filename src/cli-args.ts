/**
 * Command-line arguments of techdoc-chunk
 */

import { parseArgs } from 'node:util';
import { ConfigError } from './shared/errors.js';

export const USAGE = 'Usage: techdoc-chunk --input <file.md> [--title <t>] [--pages <pages.json>] ' +
	'[--out <chunks.jsonl>] [--config <pipeline.yaml>] [--clean-html] [--report] [--index [--force]]';

export interface CliArgs {
	input: string;
	title?: string;
	pages?: string;
	out?: string;
	config?: string;
	cleanHtml: boolean;
	report: boolean;
	index: boolean;
	force: boolean;
}

function parse(argv: string[]) {
	try {
		return parseArgs({
			args: argv,
			options: {
				input: { type: 'string', short: 'i' },
				title: { type: 'string', short: 't' },
				pages: { type: 'string', short: 'p' },
				out: { type: 'string', short: 'o' },
				config: { type: 'string', short: 'c' },
				'clean-html': { type: 'boolean', default: false },
				report: { type: 'boolean', short: 'r', default: false },
				index: { type: 'boolean', default: false },
				force: { type: 'boolean', short: 'f', default: false },
			},
		}).values;
	} catch (err) {
		const message = err instanceof Error ? err.message : String(err);
		throw new ConfigError(`${message}\n${USAGE}`, err instanceof Error ? err : undefined);
	}
}

/**
 * @throws ConfigError on unknown flags, missing values or a missing --input
 */
export function parseCliArgs(argv: string[]): CliArgs {
	const values = parse(argv);
	if (!values.input) {
		throw new ConfigError(`--input is required\n${USAGE}`);
	}

	return {
		input: values.input,
		title: values.title,
		pages: values.pages,
		out: values.out,
		config: values.config,
		cleanHtml: values['clean-html'] ?? false,
		report: values.report ?? false,
		index: values.index ?? false,
		force: values.force ?? false,
	};
}
