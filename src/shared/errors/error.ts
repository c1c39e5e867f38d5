import Context from '../context';

abstract class EliError extends Error {
	private code;
	private context;

	constructor(code: string, message: string, context: Context, cause?: EliError) {
		super(message);

		this.name = new.target.name;
		this.code = code;
		this.context = context;
		this.cause = cause;
	}

	getCode(): string {
		return this.code;
	}

	getContext(): Context {
		return this.context;
	}
}

export default EliError;
