/**
 * A value that may or may not be present.
 *
 * Used by the lexer to tell "no more tokens" apart from a token.
 */
export abstract class Maybe<T> {
	/**
	 * Indicates if this maybe has a value or not
	 */
	readonly _has: boolean;

	constructor(has: boolean) {
		this._has = has;
	}

	public has(): this is MaybeHas<T> {
		return this._has;
	}

	public hasNot(): this is MaybeHasNot {
		return !this._has;
	}
}

export class MaybeHas<T> extends Maybe<T> {
	/**
	 * The value of this maybe
	 */
	readonly value: T;

	constructor(value: T) {
		super(true);

		this.value = value;
	}
}

export class MaybeHasNot extends Maybe<never> {
	constructor() {
		super(false);
	}
}

export function has<T>(value: T): MaybeHas<T> {
	return new MaybeHas(value);
}

export function hasNot(): MaybeHasNot {
	return new MaybeHasNot();
}
