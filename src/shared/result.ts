import { Maybe } from './maybe';

export type Result<T, E extends Error = Error> = ResultOk<T> | ResultError<E>;

/**
 * A success, returned instead of throwing
 */
export class ResultOk<T> {
	/**
	 * Indicates if this result is OK or not
	 */
	readonly outcome = 'ok';

	/**
	 * The value of this result
	 */
	readonly value: T;

	constructor(value: T) {
		this.value = value;
	}
}

export class ResultError<E extends Error> {
	/**
	 * Indicates if this result is OK or not
	 */
	readonly outcome = 'error';
	readonly error: E;

	constructor(error: E) {
		this.error = error;
	}
}

/** Shortcut to create an ok Result */
export function ok<T>(value: T): ResultOk<T> {
	return new ResultOk(value);
}

/** Shortcut to create an error Result */
export function error<E extends Error = Error>(error: E): ResultError<E> {
	return new ResultError(error);
}

/**
 * Result And A Maybe
 *
 * This is a shortcut to represent a three-state possibilty:
 * a) returned data
 * b) did not return data but is ok
 * c) did not return data and is not ok
 *
 * The lexer uses it for `lex()`: a token, the end of the input, or a lexer error.
 *
 * Example:
 * ```
 * const lexed = lexer.lex();
 * switch (lexed.outcome) {
 * 	case 'ok':
 * 		if (lexed.value.has()) {
 * 			use(lexed.value.value);
 * 		}
 * 		// end of input
 * 		break;
 *
 * 	case 'error':
 * 		console.error(lexed.error);
 * 		break;
 * }
 * ```
 */
export type ResultAndAMaybe<T, E extends Error = Error> = Result<Maybe<T>, E>;
