import { canonicalBytes } from './address.js';
import type { IpAddress } from './types.js';
import { bytesToHex } from './util.js';

// Two addresses share a key exactly when compareIp returns 0 for them.
function keyOf(address: IpAddress): string {
	return bytesToHex(canonicalBytes(address));
}

/**
 * First occurrence of each distinct address, in list order.
 */
function distinct(list: ReadonlyArray<IpAddress>): Map<string, IpAddress> {
	const seen = new Map<string, IpAddress>();
	for (const address of list) {
		const key = keyOf(address);
		if (!seen.has(key)) seen.set(key, address);
	}
	return seen;
}

/**
 * Addresses of `a` that do not appear in `b`, deduplicated, in `a`'s order.
 */
export function ipsDiffSet(a: ReadonlyArray<IpAddress>, b: ReadonlyArray<IpAddress>): Array<IpAddress> {
	const excluded = distinct(b);
	return [...distinct(a)].filter(([key]) => !excluded.has(key)).map(([, address]) => address);
}

/**
 * Distinct addresses of `a` in `a`'s order, followed by those only in `b`
 * in `b`'s order.
 */
export function ipsUnionSet(a: ReadonlyArray<IpAddress>, b: ReadonlyArray<IpAddress>): Array<IpAddress> {
	const union = distinct(a);
	for (const [key, address] of distinct(b)) {
		if (!union.has(key)) union.set(key, address);
	}
	return [...union.values()];
}

/**
 * Addresses present in both lists, deduplicated, in `a`'s order.
 */
export function ipsIntersectionSet(a: ReadonlyArray<IpAddress>, b: ReadonlyArray<IpAddress>): Array<IpAddress> {
	const included = distinct(b);
	return [...distinct(a)].filter(([key]) => included.has(key)).map(([, address]) => address);
}
