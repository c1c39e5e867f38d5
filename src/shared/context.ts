import EliError from './errors/error';

/** Line breaks as the lexer sees them: `\r\n`, a lone `\r`, or `\n` */
export const lineBreaks = /\r\n|\r|\n/;

export default class Context {
	/** the source code */
	code = '';

	/** line begins at 1 */
	line = 1;

	/** position on the line begins at one and resets each time the line changes */
	col = 1;

	/** The length of the erroneous code, or how many ^^^s to use */
	length = 1;

	constructor(code: string, line: number, col: number, length: number) {
		this.code = code;
		this.line = line;
		this.col = col;
		this.length = length;
	}

	toStringArray(error: EliError): string[] {
		const lines = this.code.split(lineBreaks);

		type Line = {
			number: number;
			content: string;
		};

		// prev line
		const prevLine: Line | undefined =
			this.line > 1
				? {
						number: this.line - 1,
						content: lines[this.line - 2],
					}
				: undefined;

		// current line
		const currentLine: Line = {
			number: this.line,
			content: lines[this.line - 1] ?? '',
		};

		// next line
		const nextLine: Line | undefined =
			this.line < lines.length
				? {
						number: this.line + 1,
						content: lines[this.line],
					}
				: undefined;

		const prefix = `${' '.repeat((nextLine?.number ?? currentLine.number).toString().length)} |`;

		const lineToString = (line: Line): string =>
			`${line.number.toString().padStart(prefix.length - 2)} | ${line.content}`;

		// col counts code points, while an astral char such as an emoji takes two cells on screen, as many as its UTF-16 units
		const currentChars = Array.from(currentLine.content);
		const indent = currentChars.slice(0, this.col - 1).join('').length;

		// carets cover the erroneous code but never run past the end of the line
		const caretCount = Math.max(1, Math.min(this.length, currentChars.length - (this.col - 1)));

		return [
			// blank line to start
			prefix,

			// previous line, if any
			...(prevLine ? [lineToString(prevLine)] : []),

			// current line
			lineToString(currentLine),

			// ^^^
			`${prefix} ${' '.repeat(indent)}${'^'.repeat(caretCount)} ${error.getCode()}: ${error.message}`,

			// next line, if any
			...(nextLine ? [lineToString(nextLine)] : []),

			// blank line to end
			prefix,
		];
	}
}

/**
 * Finds the line and column, both counting from 1, of a code point offset into the code.
 *
 * `\r\n` is a single line break.
 */
export function locate(code: string, offset: number): { line: number; col: number } {
	const chars = Array.from(code);
	let line = 1;
	let col = 1;

	for (let index = 0; index < offset && index < chars.length; index++) {
		const char = chars[index];
		if (char === '\r' && chars[index + 1] === '\n') {
			continue;
		}

		if (char === '\n' || char === '\r') {
			line++;
			col = 1;
		} else {
			col++;
		}
	}

	return { line, col };
}

/** Builds the Context for `length` code points of erroneous code beginning at `offset` */
export function contextAt(code: string, offset: number, length: number): Context {
	const { line, col } = locate(code, offset);

	return new Context(code, line, col, length);
}
