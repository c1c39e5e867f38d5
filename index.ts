#!/usr/bin/env node

import Cli from './src/cli/cli';
import { parseOptions, usage } from './src/cli/options';
import loggers from './src/shared/log';

const log = loggers.cli;

async function main(args: string[]): Promise<number> {
	const optionsResult = parseOptions(args);
	if (optionsResult.outcome === 'error') {
		console.error(optionsResult.error.message);
		console.error(usage);

		return 1;
	}

	process.env.DEBUG = optionsResult.value.debug ? '1' : '0';

	return new Cli(optionsResult.value).run();
}

void (async (): Promise<void> => {
	try {
		process.exitCode = await main(process.argv.slice(2));
	} catch (error) {
		console.error(error instanceof Error ? error.message : String(error));
		if (error instanceof Error) {
			log.debug(error.stack);
		}
		console.error('\nExiting...');
		process.exitCode = 1;
	}
})();
