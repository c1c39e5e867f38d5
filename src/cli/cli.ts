import fs from 'fs-extra';
import readline from 'readline';
import LexerError from '../lexer/error';
import Lexer from '../lexer/lexer';
import { LexedToken, TokenType } from '../lexer/types';
import { tokenValue } from '../lexer/util';
import loggers from '../shared/log';
import { Options, Source } from './options';

const log = loggers.cli;

type TokenRow = {
	type: TokenType;
	value: string;
	line: number;
	col: number;
};

type Io = {
	input: NodeJS.ReadableStream;
	output: NodeJS.WritableStream;
};

export const toRows = (tokens: LexedToken[]): TokenRow[] =>
	tokens.map(({ token, line, col }) => ({ type: token.type, value: tokenValue(token), line, col }));

export default class Cli {
	public constructor(
		private options: Options,
		private io: Io = { input: process.stdin, output: process.stdout },
	) {}

	/**
	 * Runs whatever the options ask for.
	 *
	 * @returns The exit code
	 */
	public async run(): Promise<number> {
		log.vars({ repl: this.options.repl, printIr: this.options.printIr, source: this.options.source });

		if (this.options.printIr) {
			log.warn('--print-ir has no effect: there is no IR yet');
		}

		if (this.options.repl) {
			await this.repl();

			return 0;
		}

		if (typeof this.options.source === 'undefined') {
			// nothing to lex, so just show what was asked for
			console.info(JSON.stringify(this.options, undefined, '\t'));

			return 0;
		}

		const code = await this.readSource(this.options.source);
		if (typeof code === 'undefined') {
			return 1;
		}

		return this.handleLexOnly(code);
	}

	private async readSource(source: Source): Promise<string | undefined> {
		if (source.kind === 'inline') {
			return source.code;
		}

		try {
			return await fs.readFile(source.path, 'utf8');
		} catch (err) {
			console.error(`File ${source.path} could not be read.`);
			log.debug(err);

			return undefined;
		}
	}

	/**
	 * Lexes the whole source and prints the tokens
	 *
	 * @returns The exit code
	 */
	private handleLexOnly(code: string): number {
		const tokensResult = new Lexer(code).getAllTokens();

		if (tokensResult.outcome === 'error') {
			const lexerError = tokensResult.error;
			log.error('Lexer', lexerError);

			const tokens = lexerError.getTokens();
			if (tokens.length > 0) {
				console.info('Extracted tokens:');
				console.table(toRows(tokens));
			}

			return 1;
		}

		if (tokensResult.value.length === 0) {
			console.error('No source code found');

			return 1;
		}

		console.table(toRows(tokensResult.value));

		return 0;
	}

	/** Lexes each line on its own until `:quit` or the end of the input */
	private async repl(): Promise<void> {
		const rl = readline.createInterface({ input: this.io.input, output: this.io.output, terminal: false });
		rl.setPrompt('eli> ');
		rl.prompt();

		for await (const line of rl) {
			const trimmed = line.trim();
			if (trimmed === ':quit' || trimmed === ':q') {
				break;
			}

			const tokens = [...new Lexer(line).tokenStream((lexerError: LexerError) => log.error('Lexer', lexerError))];
			if (tokens.length > 0) {
				console.table(toRows(tokens));
			}

			rl.prompt();
		}
	}
}
