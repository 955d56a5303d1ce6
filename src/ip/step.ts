import { canonicalBytes } from './address.js';
import type { IpAddress } from './types.js';

/**
 * Returns the address one above `address`. The all-ones address of a
 * family wraps to the all-zero address.
 */
export function nextIp(address: IpAddress): IpAddress {
	const bytes = canonicalBytes(address).slice();
	for (let i = bytes.length - 1; i >= 0; i--) {
		const byte = bytes[i] ?? 0;
		bytes[i] = (byte + 1) & 0xff;
		// no carry out of this byte
		if (byte !== 0xff) break;
	}
	return { version: address.version, bytes };
}

/**
 * Returns the address one below `address`. The all-zero address of a
 * family wraps to the all-ones address.
 */
export function prevIp(address: IpAddress): IpAddress {
	const bytes = canonicalBytes(address).slice();
	for (let i = bytes.length - 1; i >= 0; i--) {
		const byte = bytes[i] ?? 0;
		bytes[i] = (byte - 1) & 0xff;
		// no borrow from the next byte
		if (byte !== 0) break;
	}
	return { version: address.version, bytes };
}
