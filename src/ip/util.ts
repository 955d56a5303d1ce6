/**
 * Parses a string of decimal digits into an unsigned integer.
 *
 * Reads character codes directly: `parseInt` lets through whitespace,
 * signs, trailing garbage and leading zeros.
 *
 * Returns null for an empty string, a non-digit character, a leading
 * zero (other than "0" itself) or more than `maxDigits` digits.
 */
export function parseUint(str: string, maxDigits: number): number | null {
	if (str.length === 0 || str.length > maxDigits) return null;
	if (str.length > 1 && str.charCodeAt(0) === 48) return null;

	let value = 0;
	for (let i = 0; i < str.length; i++) {
		const char = str.charCodeAt(i);

		if (char < 48 || char > 57) {
			// 0-9
			return null;
		}

		value = value * 10 + (char - 48);
	}

	return value;
}

/**
 * Parses a group of 1 to 4 hex digits into a 16-bit number.
 * Returns null for any other input.
 */
export function parseHexGroup(hex: string): number | null {
	if (hex.length === 0 || hex.length > 4) return null;

	let value = 0;
	for (let i = 0; i < hex.length; i++) {
		const char = hex.charCodeAt(i);
		let digit: number;

		if (char >= 48 && char <= 57) {
			// 0-9
			digit = char - 48;
		} else if (char >= 97 && char <= 102) {
			// a-f
			digit = char - 87;
		} else if (char >= 65 && char <= 70) {
			// A-F
			digit = char - 55;
		} else {
			return null;
		}

		value = (value << 4) | digit;
	}

	return value;
}

export function bytesToHex(bytes: Uint8Array): string {
	let hex = '';
	for (const byte of bytes) {
		hex += byte.toString(16).padStart(2, '0');
	}
	return hex;
}
