const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parse a base-10 integer, allowing surrounding whitespace and a sign.
 * Returns undefined for anything else, including "12.5", "0x10", "" and
 * values outside the safe integer range, which a number cannot hold exactly.
 */
export function parseInteger(value: string): number | undefined {
	const trimmed = value.trim();
	if (!INTEGER_PATTERN.test(trimmed)) {
		return undefined;
	}
	const parsed = parseInt(trimmed, 10);
	return Number.isSafeInteger(parsed) ? parsed : undefined;
}
