import Context from '../shared/context';
import EliError from '../shared/errors/error';
import { LexedToken } from './types';

type Position = {
	line: number;
	col: number;
};

/**
 * Custom error class so that we can display the already-extracted tokens
 * which will help the user see where the lexer is up to and got stuck
 */
export default class LexerError extends EliError {
	/** malformed integer or float text, eg. `1.2.3` or a number too large for 64 bits */
	static NumericLiteral = (msg: string, pos: Position, tokens: LexedToken[], ctx: Context) =>
		new LexerError('L001', msg, pos, tokens, ctx);
	/** the identifier validator refused the identifier */
	static IdentifierRejected = (msg: string, pos: Position, tokens: LexedToken[], ctx: Context) =>
		new LexerError('L002', msg, pos, tokens, ctx);

	/** lexer's line counter when the error occurred */
	readonly line: number;

	/** lexer's column counter when the error occurred */
	readonly col: number;

	private tokens;

	private constructor(
		code: string,
		message: string,
		pos: Position,
		tokens: LexedToken[],
		context: Context,
		cause?: EliError,
	) {
		super(code, message, context, cause);

		this.line = pos.line;
		this.col = pos.col;
		this.tokens = tokens;
	}

	getTokens(): LexedToken[] {
		return this.tokens;
	}
}
