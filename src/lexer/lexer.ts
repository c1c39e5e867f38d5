import { contextAt } from '../shared/context';
import loggers from '../shared/log';
import { has, hasNot } from '../shared/maybe';
import { parseNumeric, NumericValue } from '../shared/numbers/utils';
import { error, ok, Result, ResultAndAMaybe } from '../shared/result';
import LexerError from './error';
import { isKeyword, isPunctuation, keywords, LexedToken, patterns, punctuation, Token } from './types';
import { forbidLowercaseL, IdentifierValidator } from './validation';

const log = loggers.lexer;

export type LexerOptions = {
	/** defaults to the ELi Linter's rule, see `forbidLowercaseL` */
	validateIdentifier?: IdentifierValidator;
};

/**
 * - ok(has(token)) for a token
 * - ok(hasNot()) once the source is exhausted
 * - error(lexerError) if the source could not be lexed
 */
export type LexResult = ResultAndAMaybe<LexedToken, LexerError>;

export default class Lexer implements Iterable<LexedToken> {
	/** position begins at 0 and counts till the end of the script */
	cursorPosition = 0;

	/** line begins at 0 and increments for every newline char, so `\r\n` counts twice */
	line = 0;

	/** chars consumed since the beginning, begins at 0 and never resets */
	col = 0;

	/** the source code, one element per code point */
	private readonly chars: string[];

	/** track all tokens */
	private readonly tokens: LexedToken[] = [];

	private readonly validateIdentifier: IdentifierValidator;

	/**
	 * Sets up the lexer. The code is never modified, line endings included.
	 *
	 * @param code - Source code
	 */
	constructor(
		private readonly code: string,
		options: LexerOptions = {},
	) {
		this.chars = Array.from(code);
		this.validateIdentifier = options.validateIdentifier ?? forbidLowercaseL;
	}

	/**
	 * Gets the next token, if any
	 */
	lex(): LexResult {
		for (;;) {
			// ELi ignores whitespace
			this.gobbleAsLongAs((char) => this.isWhitespace(char));

			const char = this.peek();
			if (typeof char === 'undefined') {
				return ok(hasNot());
			}

			// capture where the token begins, for error context
			const start = this.cursorPosition;
			this.next();

			/** Single Character Tokens */
			if (isPunctuation(char)) {
				return this.emit({ type: punctuation[char] });
			}

			/** Numbers */
			if (this.matchesRegex(patterns.DIGITS, char)) {
				const numeric = this.processNumber(start);
				if (numeric.outcome === 'error') {
					return this.fail(LexerError.NumericLiteral, numeric.error.message, start);
				}

				return this.emit(numeric.value);
			}

			/**
			 * Minus
			 *
			 * Either a negative number, or the minus operator. In the latter
			 * case nothing after the minus is consumed.
			 */
			if (char === patterns.MINUS) {
				const [cursorPosition, col] = [this.cursorPosition, this.col];

				const numeric = this.processNumber(this.cursorPosition);
				if (numeric.outcome === 'error') {
					this.cursorPosition = cursorPosition;
					this.col = col;

					return this.emit({ type: 'operator', value: '-' });
				}

				const number = numeric.value;
				return this.emit(
					number.type === 'float' ? { type: 'float', value: -number.value } : { type: 'int', value: -number.value },
				);
			}

			/**
			 * Forward Slash
			 *
			 * Either the beginning of a comment, which lasts until the end of the line, or division
			 */
			if (char === patterns.FORWARD_SLASH) {
				if (this.peek() !== patterns.FORWARD_SLASH) {
					return this.emit({ type: 'operator', value: '/' });
				}

				const comment = char + this.gobbleUntil((next) => this.matchesRegex(patterns.NEWLINE, next));
				log.debug('skipped comment', comment);

				continue;
			}

			if (char === '+' || char === '*') {
				return this.emit({ type: 'operator', value: char });
			}

			/**
			 * Keywords and identifiers
			 *
			 * Anything else runs until whitespace, so `a+b` is a single identifier
			 */
			const value = char + this.gobbleUntil((next) => this.isWhitespace(next));

			// keywords are checked before the validator, which never sees them
			if (isKeyword(value)) {
				return this.emit({ type: keywords[value] });
			}

			const rejection = this.validateIdentifier(value);
			if (rejection.has()) {
				return this.fail(LexerError.IdentifierRejected, rejection.value, start);
			}

			return this.emit({ type: 'ident', value });
		}
	}

	/**
	 * Lazily lexes tokens until the source is exhausted or a token could not be lexed.
	 *
	 * The error is not thrown: it goes to `onError`, if given, and the sequence ends.
	 *
	 * @param onError - receives the error, if any
	 */
	*tokenStream(onError?: (error: LexerError) => void): Generator<LexedToken, void, undefined> {
		for (;;) {
			const lexed = this.lex();
			if (lexed.outcome === 'error') {
				onError?.(lexed.error);

				return;
			}

			const maybeToken = lexed.value;
			if (!maybeToken.has()) {
				return;
			}

			yield maybeToken.value;
		}
	}

	[Symbol.iterator](): Iterator<LexedToken> {
		return this.tokenStream();
	}

	public getAllTokens(): Result<LexedToken[], LexerError> {
		const tokens: LexedToken[] = [];

		let lexed = this.lex();
		while (lexed.outcome === 'ok') {
			const maybeToken = lexed.value;
			if (!maybeToken.has()) {
				// end of the source, and we're done
				return ok(tokens);
			}

			tokens.push(maybeToken.value);

			// get next
			lexed = this.lex();
		}

		return error(lexed.error);
	}

	/**
	 * Gobbles digits and periods beginning at `start`, and parses them.
	 *
	 * On error the chars stay consumed, it's up to the caller to rewind.
	 */
	private processNumber(start: number): Result<NumericValue> {
		this.gobbleAsLongAs((char) => this.matchesRegex(patterns.DIGITS, char) || char === patterns.PERIOD);

		return parseNumeric(this.chars.slice(start, this.cursorPosition).join(''));
	}

	private emit(token: Token): LexResult {
		const lexed: LexedToken = { token, line: this.line, col: this.col };
		this.tokens.push(lexed);
		log.debug('lexed', lexed);

		return ok(has(lexed));
	}

	private fail(errorFactory: typeof LexerError.NumericLiteral, message: string, start: number): LexResult {
		const lexerError = errorFactory(
			message,
			{ line: this.line, col: this.col },
			[...this.tokens],
			contextAt(this.code, start, this.cursorPosition - start),
		);
		log.debug('failed', lexerError.getCode(), lexerError.message);

		return error(lexerError);
	}

	/** Grab chars as long as the predicate evaluates to true */
	private gobbleAsLongAs(predicate: (char: string) => boolean): string {
		let value = '';

		for (let char = this.peek(); typeof char !== 'undefined' && predicate(char); char = this.peek()) {
			value += char;
			if (this.matchesRegex(patterns.NEWLINE, char)) {
				this.line++;
			}

			this.next();
		}

		return value;
	}

	/** Grab chars until the predicate evaluates to true */
	private gobbleUntil(predicate: (char: string) => boolean): string {
		return this.gobbleAsLongAs((char) => !predicate(char));
	}

	private isWhitespace(char: string): boolean {
		return this.matchesRegex(patterns.WHITESPACE, char) || this.matchesRegex(patterns.NEWLINE, char);
	}

	/**
	 * Checks whether the char matches the provided regex.
	 *
	 * This is a thin wrapper around RegExp.test(), which return true if the char is undefined, and we don't want that behavior.
	 */
	private matchesRegex(regex: RegExp, char: string | undefined): boolean {
		if (typeof char === 'undefined') {
			return false;
		}

		return regex.test(char);
	}

	/** Advances the cursorPosition, every char consumed counts as a column */
	private next(): void {
		this.cursorPosition++;
		this.col++;
	}

	/** Peeks at the char at the cursorPosition */
	private peek(): string | undefined {
		return this.chars[this.cursorPosition];
	}
}
