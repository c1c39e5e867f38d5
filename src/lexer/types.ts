import type { ValueOf } from 'type-fest';

/**
 * Single characters that are tokens on their own.
 *
 * Braces and parens are deliberately mapped right-then-left: `{` is `rcurly`, `(` is `rparen`.
 */
export const punctuation = {
	'{': 'rcurly',
	'}': 'lcurly',
	'(': 'rparen',
	')': 'lparen',
	':': 'colon',
	';': 'semicolon',
	',': 'comma',
	'=': 'equals',
	'!': 'exclamation',
} as const;
export type PunctuationChar = keyof typeof punctuation;
export type PunctuationTokenType = ValueOf<typeof punctuation>;

/** keywords in ELi are case sensitive */
export const keywords = {
	function: 'function',
	return: 'return',
} as const;
export type Keyword = keyof typeof keywords;
export type KeywordTokenType = ValueOf<typeof keywords>;

export const operators = ['+', '-', '*', '/'] as const;
export type Operator = (typeof operators)[number];

export const patterns = {
	DIGITS: /[0-9]/,
	FORWARD_SLASH: '/',
	MINUS: '-',
	NEWLINE: /[\n\r]/,
	PERIOD: '.',
	WHITESPACE: /\p{White_Space}/u,
} as const;

export type Token =
	| { type: PunctuationTokenType }
	| { type: KeywordTokenType }
	| { type: 'operator'; value: Operator }
	| { type: 'ident'; value: string }
	| { type: 'float'; value: number }
	| { type: 'int'; value: bigint };

export type TokenType = Token['type'];

/** A token and where the lexer was when it finished scanning it */
export type LexedToken = {
	token: Token;

	/** line the token ends on, counting newline chars from 0 */
	line: number;

	/** chars consumed since the beginning of the source, including this token. Does not reset on new lines. */
	col: number;
};

export function isPunctuation(char: string): char is PunctuationChar {
	return Object.prototype.hasOwnProperty.call(punctuation, char);
}

export function isKeyword(value: string): value is Keyword {
	return Object.prototype.hasOwnProperty.call(keywords, value);
}
