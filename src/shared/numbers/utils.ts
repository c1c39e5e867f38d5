import { error, ok, Result } from '../result';

/** largest value of a signed 64 bit integer */
export const int64Max = 2n ** 63n - 1n;

export type NumericValue = { type: 'float'; value: number } | { type: 'int'; value: bigint };

/**
 * Parses the text of a numeric literal: digits, optionally with periods.
 *
 * Text with a period is a float (`1.5`, `1.` and `.5` are fine, `1.2.3` and `.` are not),
 * otherwise it's a 64 bit signed int.
 */
export const parseNumeric = (value: string): Result<NumericValue> => {
	if (value.includes('.')) {
		if (!/^(\d+\.\d*|\.\d+)$/.test(value)) {
			return error(new Error('invalid float literal'));
		}

		return ok({ type: 'float', value: Number(value) });
	}

	if (value === '') {
		return error(new Error('cannot parse integer from empty string'));
	}

	if (!/^\d+$/.test(value)) {
		return error(new Error('invalid digit found in string'));
	}

	const int = BigInt(value);
	if (int > int64Max) {
		return error(new Error('number too large to fit in target type'));
	}

	return ok({ type: 'int', value: int });
};
