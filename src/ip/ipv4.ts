import { IPV4, type IpFamily } from './types.js';
import { parseUint } from './util.js';

export const IPV4_BYTE_LENGTH = 4;

/**
 * Parses a dotted-decimal IPv4 literal into 4 bytes.
 * Returns null for invalid addresses.
 */
export function parseIpv4Address(text: string): Uint8Array | null {
	const parts = text.split('.');
	if (parts.length !== IPV4_BYTE_LENGTH) return null;

	const bytes = new Uint8Array(IPV4_BYTE_LENGTH);
	for (let i = 0; i < parts.length; i++) {
		const octet = parseUint(parts[i] ?? '', 3);
		if (octet === null || octet > 255) return null;
		bytes[i] = octet;
	}

	return bytes;
}

export function formatIpv4Address(bytes: Uint8Array): string {
	return bytes.join('.');
}

export const ipv4Family: IpFamily = {
	version: IPV4,
	byteLength: IPV4_BYTE_LENGTH,
	bitLength: IPV4_BYTE_LENGTH * 8,
	parse: parseIpv4Address,
	format: formatIpv4Address,
};
