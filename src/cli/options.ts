import _ from 'lodash';
import { error, ok, Result } from '../shared/result';

export type Source = { kind: 'inline'; code: string } | { kind: 'file'; path: string };

export type Options = {
	/** lex lines typed at a prompt */
	repl: boolean;

	/** print the intermediate representation. Accepted, but nothing produces IR yet */
	printIr: boolean;

	/** `-d`: turns on the debug loggers */
	debug: boolean;

	/** `-i <code>` or a file path */
	source: Source | undefined;
};

type BooleanFlag = 'repl' | 'printIr';
const booleanFlags: BooleanFlag[] = ['repl', 'printIr'];

export const usage = 'Usage: eli [--repl] [--print-ir] [-d] [-i <code> | <file>]';

/**
 * Parses the command line arguments, sans the node executable and script.
 *
 * Long flags are case insensitive, so the original `--repL` is the same as `--repl`.
 */
export function parseOptions(args: string[]): Result<Options> {
	const options: Options = {
		repl: false,
		printIr: false,
		debug: false,
		source: undefined,
	};

	for (let index = 0; index < args.length; index++) {
		const arg = args[index];

		if (arg === '-d') {
			options.debug = true;
			continue;
		}

		if (arg === '-i') {
			const code = args[index + 1];
			if (typeof code === 'undefined') {
				return error(new Error('No input string provided.'));
			}

			if (typeof options.source !== 'undefined') {
				return error(new Error('Only one source may be given.'));
			}

			options.source = { kind: 'inline', code };
			index++;
			continue;
		}

		if (arg.startsWith('--')) {
			// --print-ir => printIr
			const name = _.camelCase(arg.toLowerCase());
			const flag = booleanFlags.find((booleanFlag) => booleanFlag === name);
			if (typeof flag === 'undefined') {
				return error(new Error(`Unknown option: ${arg}`));
			}

			options[flag] = true;
			continue;
		}

		if (arg.startsWith('-')) {
			return error(new Error(`Unknown option: ${arg}`));
		}

		if (typeof options.source !== 'undefined') {
			return error(new Error('Only one source may be given.'));
		}

		options.source = { kind: 'file', path: arg };
	}

	return ok(options);
}
