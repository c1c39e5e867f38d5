import { inspect } from 'util';
import EliError from './errors/error';

export enum Color {
	Red = 31,
	Green = 32,
	Yellow = 93,
	Blue = 34,
	Magenta = 35,
	Cyan = 36,
	White = 37,
	Grey = 90,
	LightBlue = 94,
}

export function colorize(text: string, color: Color, bold: boolean = false): string {
	const boldCode = bold ? '1;' : '';
	const escapeCode = `\u001b[${boldCode}${color}m`;
	const resetCode = '\u001b[0m';
	return `${escapeCode}${text}${resetCode}`;
}

function autoColorize(item: unknown): string {
	if (typeof item === 'string') {
		return colorize(item, Color.Green);
	} else if (typeof item === 'number' || typeof item === 'bigint') {
		return colorize(item.toString(), Color.Yellow);
	} else if (typeof item === 'boolean') {
		return colorize(item.toString(), Color.Blue);
	} else if (item === null) {
		return colorize('null', Color.White, true);
	} else if (item === undefined) {
		return colorize('undefined', Color.Grey);
	}

	return colorize(objToString(item), Color.Cyan);
}

export function stripColor(text: string): string {
	// eslint-disable-next-line no-control-regex
	return text.replace(/\u001b\[[0-9;]*m/g, '');
}

export function objToString(obj: unknown): string {
	return inspect(obj, { compact: 1, showHidden: false, depth: null, colors: true });
}

/** Debug output is on when `DEBUG` is set to anything but `0` */
export function isDebugging(): boolean {
	return typeof process.env.DEBUG !== 'undefined' && process.env.DEBUG !== '0';
}

export class Log {
	constructor(
		private color: Color,
		private name: string,
	) {}

	debug(...args: unknown[]) {
		if (!isDebugging()) {
			return;
		}

		console.debug(this.preamble(), '🐞', ...args);
	}

	warn(...args: unknown[]) {
		if (!isDebugging()) {
			return;
		}

		console.warn(this.preamble(), '⚠️', ...args);
	}

	/**
	 * This works differently than the other methods here in that:
	 * - it takes an ELi Error rather than a custom message
	 * - it displays even if debug is off
	 *
	 * @param type Error type, eg. `Lexer`
	 * @param error The ELi Error
	 */
	error(type: string, error: EliError) {
		console.error(this.preamble(), '🚨', `Error[${type}/${error.getCode()}]: ${error.message}`);
		if (error.cause) {
			console.error(this.preamble(), '🚨', `Caused by: ${String(error.cause)}`);
		}
		error
			.getContext()
			.toStringArray(error)
			.forEach((str) => console.error(this.preamble(), '🚨', str));
	}

	vars(...objs: Array<Record<string, unknown>>) {
		if (!isDebugging()) {
			return;
		}

		for (const obj of objs) {
			this.renderObjAsTable(obj).forEach((line) => console.log(this.preamble(), ' ', line));
		}
	}

	private dividerLine(left: string, between: string, right: string, widestKey: number, widestLineInValue: number) {
		return left + '─'.repeat(widestKey + 2) + between + '─'.repeat(widestLineInValue + 2) + right;
	}

	private renderObjAsTable(data: Record<string, unknown>): string[] {
		const rows: Array<[string, string[]]> = [];

		let widestKey = 0;
		let widestLineInValue = 0;
		for (const [key, value] of Object.entries(data)) {
			widestKey = Math.max(widestKey, key.length);

			// value can be a string, multiline string, or anything else
			let valueLines: string[] = [];

			if (typeof value === 'object' && value !== null) {
				valueLines = objToString(value).split('\n');
			} else if (typeof value === 'string' && value.includes('\n')) {
				valueLines = value.split('\n').map(autoColorize);
			} else {
				valueLines = [autoColorize(value)];
			}

			widestLineInValue = valueLines.reduce((max, line) => Math.max(max, stripColor(line).length), widestLineInValue);

			rows.push([key, valueLines]);
		}

		return [
			this.dividerLine('┌', '┬', '┐', widestKey, widestLineInValue),

			...rows.flatMap(([key, lines], index) => {
				const newLines = lines.map((line, lineIndex) => {
					// pad using the uncolored text, since escape codes take no room on screen
					const rawLine = stripColor(line);
					const paddedVal = rawLine.padEnd(widestLineInValue).replace(rawLine, line);

					return `│ ${(lineIndex === 0 ? key : '').padEnd(widestKey)} │ ${paddedVal} │`;
				});

				// divider line for every var except the last
				if (index < rows.length - 1) {
					newLines.push(this.dividerLine('├', '┼', '┤', widestKey, widestLineInValue));
				}

				return newLines;
			}),

			this.dividerLine('└', '┴', '┘', widestKey, widestLineInValue),
		];
	}

	private preamble(): string {
		return colorize(this.name, this.color);
	}
}

export default {
	lexer: new Log(Color.LightBlue, 'Lexer'),
	cli: new Log(Color.Magenta, 'CLI  '),
};
