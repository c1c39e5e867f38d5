import assert from 'node:assert/strict';
import { has } from '../shared/maybe';
import LexerError from './error';
import Lexer, { LexResult } from './lexer';
import { LexedToken, punctuation } from './types';
import { lexify, simplify } from './util';
import { allowAllIdentifiers, lowercaseLMessage } from './validation';

/** Unwraps a lexed token, failing the test on an error or the end of the source */
const tokenOf = (lexed: LexResult): LexedToken => {
	assert(lexed.outcome === 'ok', 'expected a token, got an error');
	const maybeToken = lexed.value;
	assert(maybeToken.has(), 'expected a token, got the end of the source');

	return maybeToken.value;
};

const errorOf = (lexed: LexResult): LexerError => {
	assert(lexed.outcome === 'error', 'expected an error');

	return lexed.error;
};

const isEnd = (lexed: LexResult): boolean => lexed.outcome === 'ok' && lexed.value.hasNot();

describe('lexer.ts', (): void => {
	describe('whitespace', (): void => {
		it('is the end of the source when there is nothing else', (): void => {
			const lexer = new Lexer(' \t\n\r\n ');

			expect(isEnd(lexer.lex())).toBe(true);
			expect(isEnd(lexer.lex())).toBe(true);
			expect(lexer.line).toBe(3);
			expect(lexer.col).toBe(6);
		});

		it('is the end of an empty source', (): void => {
			expect(isEnd(new Lexer('').lex())).toBe(true);
		});

		it('keeps returning the end after the last token', (): void => {
			const lexer = new Lexer('x');

			expect(tokenOf(lexer.lex()).token).toEqual({ type: 'ident', value: 'x' });
			for (let i = 0; i < 3; i++) {
				expect(isEnd(lexer.lex())).toBe(true);
			}
		});

		it('counts \\r and \\n as separate lines', (): void => {
			const lexer = new Lexer('a\r\nb');
			tokenOf(lexer.lex());

			expect(tokenOf(lexer.lex())).toEqual({ token: { type: 'ident', value: 'b' }, line: 2, col: 4 });
		});
	});

	describe('punctuation', (): void => {
		it.each(Object.entries(punctuation))('%s is recognized as %s', (char, type) => {
			const lexer = new Lexer(char);

			expect(tokenOf(lexer.lex())).toEqual({ token: { type }, line: 0, col: 1 });
			expect(lexer.cursorPosition).toBe(1);
		});

		it('does not pair braces and parens the usual way', (): void => {
			const result = lexify('{}()');
			assert(result.outcome === 'ok');

			// `{}()` has no whitespace, and `{` is not an identifier char, so each is its own token
			expect(simplify(result.value)).toEqual([
				['rcurly', '{'],
				['lcurly', '}'],
				['rparen', '('],
				['lparen', ')'],
			]);
		});
	});

	describe('operators', (): void => {
		it.each(['+', '*', '/'])('%s is an operator', (char) => {
			expect(tokenOf(new Lexer(char).lex()).token).toEqual({ type: 'operator', value: char });
		});

		it('does not treat a plus as part of a number', (): void => {
			const result = lexify('+5');
			assert(result.outcome === 'ok');

			expect(simplify(result.value)).toEqual([
				['operator', '+'],
				['int', '5'],
			]);
		});

		it('lexes a division', (): void => {
			const result = lexify('10 / 2');
			assert(result.outcome === 'ok');

			expect(simplify(result.value)).toEqual([
				['int', '10'],
				['operator', '/'],
				['int', '2'],
			]);
		});
	});

	describe('minus', (): void => {
		it('is part of a negative int', (): void => {
			expect(tokenOf(new Lexer('-42').lex())).toEqual({ token: { type: 'int', value: -42n }, line: 0, col: 3 });
		});

		it('is part of a negative float', (): void => {
			expect(tokenOf(new Lexer('-.5').lex()).token).toEqual({ type: 'float', value: -0.5 });
		});

		it('is an operator when no number follows, consuming only itself', (): void => {
			const lexer = new Lexer('- x');

			expect(tokenOf(lexer.lex())).toEqual({ token: { type: 'operator', value: '-' }, line: 0, col: 1 });
			expect(lexer.cursorPosition).toBe(1);
			expect(tokenOf(lexer.lex())).toEqual({ token: { type: 'ident', value: 'x' }, line: 0, col: 3 });
		});

		it('is an operator at the end of the source', (): void => {
			const lexer = new Lexer('-');

			expect(tokenOf(lexer.lex()).token).toEqual({ type: 'operator', value: '-' });
			expect(isEnd(lexer.lex())).toBe(true);
		});

		it('rewinds when the number after it is malformed', (): void => {
			const lexer = new Lexer('-.');

			expect(tokenOf(lexer.lex())).toEqual({ token: { type: 'operator', value: '-' }, line: 0, col: 1 });
			expect(tokenOf(lexer.lex())).toEqual({ token: { type: 'ident', value: '.' }, line: 0, col: 2 });
		});

		it('leaves a too large negative number to be reported on the next call', (): void => {
			const lexer = new Lexer('-9223372036854775808');

			expect(tokenOf(lexer.lex()).token).toEqual({ type: 'operator', value: '-' });
			const error = errorOf(lexer.lex());
			expect(error.getCode()).toBe('L001');
			expect(error.message).toBe('number too large to fit in target type');
		});

		it('binds to the number that follows it', (): void => {
			const result = lexify('1-2');
			assert(result.outcome === 'ok');

			expect(result.value).toEqual([
				{ token: { type: 'int', value: 1n }, line: 0, col: 1 },
				{ token: { type: 'int', value: -2n }, line: 0, col: 3 },
			]);
		});
	});

	describe('numbers', (): void => {
		it('lexes a float', (): void => {
			expect(tokenOf(new Lexer('3.14').lex())).toEqual({ token: { type: 'float', value: 3.14 }, line: 0, col: 4 });
		});

		it('lexes a float with a trailing period', (): void => {
			expect(tokenOf(new Lexer('3.').lex()).token).toEqual({ type: 'float', value: 3 });
		});

		it('lexes the largest int', (): void => {
			expect(tokenOf(new Lexer('9223372036854775807').lex()).token).toEqual({
				type: 'int',
				value: 9223372036854775807n,
			});
		});

		it('fails on more than one period', (): void => {
			const error = errorOf(new Lexer('3.1.4').lex());

			expect(error).toBeInstanceOf(LexerError);
			expect(error.getCode()).toBe('L001');
			expect(error.message).toBe('invalid float literal');
			expect([error.line, error.col]).toEqual([0, 5]);
		});

		it('fails on an int too large for 64 bits', (): void => {
			const error = errorOf(new Lexer('9223372036854775808').lex());

			expect(error.getCode()).toBe('L001');
			expect(error.message).toBe('number too large to fit in target type');
		});
	});

	describe('comments', (): void => {
		it('skips a comment but counts its chars', (): void => {
			expect(tokenOf(new Lexer('// comment\nfoo').lex())).toEqual({
				token: { type: 'ident', value: 'foo' },
				line: 1,
				col: 14,
			});
		});

		it('skips a comment after a token', (): void => {
			const result = lexify('a // note\nb');
			assert(result.outcome === 'ok');

			expect(result.value).toEqual([
				{ token: { type: 'ident', value: 'a' }, line: 0, col: 1 },
				{ token: { type: 'ident', value: 'b' }, line: 1, col: 11 },
			]);
		});

		it('skips many comments in a row', (): void => {
			const lexer = new Lexer('// one\n// two\n// three');

			expect(isEnd(lexer.lex())).toBe(true);
			expect(lexer.line).toBe(2);
			expect(lexer.col).toBe(22);
		});

		it('skips thousands of comments without growing the stack', (): void => {
			const lexer = new Lexer('// comment\n'.repeat(50_000) + 'x');

			expect(tokenOf(lexer.lex()).token).toEqual({ type: 'ident', value: 'x' });
		});
	});

	describe('keywords and identifiers', (): void => {
		it.each(['function', 'return'])('%s is a keyword', (keyword) => {
			expect(tokenOf(new Lexer(keyword).lex()).token).toEqual({ type: keyword });
		});

		it('is case sensitive about keywords', (): void => {
			expect(tokenOf(new Lexer('Return').lex()).token).toEqual({ type: 'ident', value: 'Return' });
		});

		it('runs an identifier until whitespace', (): void => {
			expect(tokenOf(new Lexer('a+b(c)').lex())).toEqual({ token: { type: 'ident', value: 'a+b(c)' }, line: 0, col: 6 });
		});

		it('counts code points rather than code units', (): void => {
			expect(tokenOf(new Lexer('\u00e9→😀 x').lex())).toEqual({ token: { type: 'ident', value: '\u00e9→😀' }, line: 0, col: 3 });
		});

		it('rejects an identifier with a lowercase l', (): void => {
			const error = errorOf(new Lexer('hello').lex());

			expect(error.getCode()).toBe('L002');
			expect(error.message).toBe(lowercaseLMessage);
			expect([error.line, error.col]).toEqual([0, 5]);
		});

		it('accepts an identifier with an uppercase L', (): void => {
			expect(tokenOf(new Lexer('HELLO').lex()).token).toEqual({ type: 'ident', value: 'HELLO' });
		});

		it('uses a custom validator', (): void => {
			const lexer = new Lexer('hello', { validateIdentifier: allowAllIdentifiers });

			expect(tokenOf(lexer.lex()).token).toEqual({ type: 'ident', value: 'hello' });
		});

		it('does not run keywords through the validator', (): void => {
			const validateIdentifier = jest.fn(() => has('no identifiers allowed'));
			const lexer = new Lexer('return x', { validateIdentifier });

			expect(tokenOf(lexer.lex()).token).toEqual({ type: 'return' });
			const error = errorOf(lexer.lex());
			expect(error.message).toBe('no identifiers allowed');
			expect(validateIdentifier).toHaveBeenCalledTimes(1);
			expect(validateIdentifier).toHaveBeenCalledWith('x');
		});
	});

	describe('getAllTokens', (): void => {
		it('lexes a function', (): void => {
			const result = lexify('function add ( a , b ) {\n\treturn a + b ;\n}');
			assert(result.outcome === 'ok');

			expect(simplify(result.value)).toEqual([
				['function', 'function'],
				['ident', 'add'],
				['rparen', '('],
				['ident', 'a'],
				['comma', ','],
				['ident', 'b'],
				['lparen', ')'],
				['rcurly', '{'],
				['return', 'return'],
				['ident', 'a'],
				['operator', '+'],
				['ident', 'b'],
				['semicolon', ';'],
				['lcurly', '}'],
			]);
		});

		it('lexes the other punctuation', (): void => {
			const result = lexify('x = ! y : z');
			assert(result.outcome === 'ok');

			expect(simplify(result.value)).toEqual([
				['ident', 'x'],
				['equals', '='],
				['exclamation', '!'],
				['ident', 'y'],
				['colon', ':'],
				['ident', 'z'],
			]);
		});

		it('returns the error along with the tokens lexed before it', (): void => {
			const result = lexify('foo 1 hello bar');
			assert(result.outcome === 'error');

			expect(result.error.getCode()).toBe('L002');
			expect(simplify(result.error.getTokens())).toEqual([
				['ident', 'foo'],
				['int', '1'],
			]);
		});
	});

	describe('tokenStream', (): void => {
		it('yields every token', (): void => {
			const onError = jest.fn();
			const tokens = [...new Lexer('foo ( 12').tokenStream(onError)];

			expect(simplify(tokens)).toEqual([
				['ident', 'foo'],
				['rparen', '('],
				['int', '12'],
			]);
			expect(onError).not.toHaveBeenCalled();
		});

		it('ends at the first error and hands it over', (): void => {
			const onError = jest.fn();
			const tokens = [...new Lexer('foo hello bar').tokenStream(onError)];

			expect(simplify(tokens)).toEqual([['ident', 'foo']]);
			expect(onError).toHaveBeenCalledTimes(1);
			const [[error]] = onError.mock.calls;
			expect(error).toBeInstanceOf(LexerError);
			expect(error.getCode()).toBe('L002');
		});

		it('ends quietly without an error handler', (): void => {
			expect(simplify([...new Lexer('3.1.4 x').tokenStream()])).toEqual([]);
		});

		it('makes the lexer iterable', (): void => {
			const types: string[] = [];
			for (const { token } of new Lexer('function f ( ) { }')) {
				types.push(token.type);
			}

			expect(types).toEqual(['function', 'ident', 'rparen', 'lparen', 'rcurly', 'lcurly']);
		});

		it('is single pass', (): void => {
			const lexer = new Lexer('a b');
			const first = [...lexer];

			expect(first).toHaveLength(2);
			expect([...lexer]).toEqual([]);
		});
	});
});
