import { canonicalBytes } from './address.js';
import type { IpAddress } from './types.js';

/**
 * Orders two addresses by their canonical bytes, unsigned and big-endian.
 * The family tag takes no part once both sides are projected: an IPv4
 * address in the IPv4-mapped form equals its 4-byte form.
 */
export function compareIp(a: IpAddress, b: IpAddress): -1 | 0 | 1 {
	const left = canonicalBytes(a);
	const right = canonicalBytes(b);

	const length = Math.min(left.length, right.length);
	for (let i = 0; i < length; i++) {
		const x = left[i] ?? 0;
		const y = right[i] ?? 0;
		if (x !== y) return x < y ? -1 : 1;
	}

	if (left.length === right.length) return 0;
	// widths differ only when the caller mixes families
	return left.length < right.length ? -1 : 1;
}

export function ipEqual(a: IpAddress, b: IpAddress): boolean {
	return compareIp(a, b) === 0;
}
