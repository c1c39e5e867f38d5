import _ from 'lodash';
import { Result } from '../shared/result';
import LexerError from './error';
import Lexer from './lexer';
import { LexedToken, punctuation, Token, TokenType } from './types';

/** Shortcut method to `new Lexer(code).getAllTokens()` */
export const lexify = (code: string): Result<LexedToken[], LexerError> => new Lexer(code).getAllTokens();

/** STokens = Simplified Tokens without any positional information */
export type SToken = [
	/** the type of token */
	type: TokenType,

	/** the value, always represented as a string */
	value: string,
];

const punctuationChars = _.invert(punctuation);

/** The value of a token as a string: its payload, or the text it was lexed from */
export const tokenValue = (token: Token): string => {
	switch (token.type) {
		case 'operator':
		case 'ident':
			return token.value;
		case 'float':
		case 'int':
			return token.value.toString();
		case 'function':
		case 'return':
			return token.type;
		default:
			return punctuationChars[token.type];
	}
};

/** Strips positions from tokens, keeping the type and value */
export const simplify = (tokens: LexedToken[]): SToken[] =>
	tokens.map(({ token }): SToken => [token.type, tokenValue(token)]);
