import { maskIp } from './address.js';
import { ErrInvalidCidrFormat, ErrInvalidIpFormat, type IpError } from './errors.js';
import { getIpFamily } from './family.js';
import { ipv4Family } from './ipv4.js';
import { ipv6Family } from './ipv6.js';
import type { IpAddress, IpBlock, IpFamily, IpResult } from './types.js';
import { parseUint } from './util.js';

function parseAddressText(family: IpFamily, text: string): IpAddress | null {
	const bytes = family.parse(text);
	return bytes ? { version: family.version, bytes } : null;
}

/**
 * Parses `address/prefixLength` and masks the address down to its network.
 * Returns null for invalid CIDR text.
 */
function parseCidrText(family: IpFamily, text: string): IpBlock | null {
	const slash = text.indexOf('/');
	if (slash === -1) return null;

	const address = parseAddressText(family, text.slice(0, slash));
	const prefixLength = parseUint(text.slice(slash + 1), 3);

	if (!address || prefixLength === null || prefixLength > family.bitLength) return null;

	return { base: maskIp(address, prefixLength), prefixLength };
}

/**
 * Parses a bare address (`isCidr` false) into a full-width block around it,
 * or a CIDR (`isCidr` true) into its masked network block.
 */
export function parseIp(version: number, text: string, isCidr: boolean): IpResult<IpBlock> {
	if (isCidr) return parseCidr(version, text);

	const family = getIpFamily(version);
	if (!family.ok) return family;

	const address = parseAddressText(family.value, text);
	if (!address) {
		return { ok: false, error: ErrInvalidIpFormat, value: null };
	}
	return { ok: true, value: { base: address, prefixLength: family.value.bitLength } };
}

export function parseCidr(version: number, text: string): IpResult<IpBlock> {
	const family = getIpFamily(version);
	if (!family.ok) return family;

	const block = parseCidrText(family.value, text);
	if (!block) {
		return { ok: false, error: ErrInvalidCidrFormat, value: null };
	}
	return { ok: true, value: block };
}

export function isCidr(version: number, text: string): IpError | null {
	const result = parseCidr(version, text);
	return result.ok ? null : result.error;
}

export function isIp(version: number, text: string): IpError | null {
	const result = parseIp(version, text, false);
	return result.ok ? null : result.error;
}

/**
 * Classifies `text` as an IPv4 CIDR without a declared family.
 */
export function isIpv4Cidr(text: string): boolean {
	return parseCidrText(ipv4Family, text) !== null;
}

/**
 * Classifies `text` as an IPv6 CIDR without a declared family.
 */
export function isIpv6Cidr(text: string): boolean {
	return parseCidrText(ipv6Family, text) !== null;
}
