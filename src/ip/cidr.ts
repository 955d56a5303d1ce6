import { maskIp } from './address.js';
import { ipEqual } from './compare.js';
import type { IpError } from './errors.js';
import { isIpVersion } from './family.js';
import { parseCidr, parseIp } from './parse.js';
import type { IpBlock, IpResult } from './types.js';

type Check = IpResult<boolean, false>;

function fail(error: IpError): Check {
	return { ok: false, error, value: false };
}

function blockContains(outer: IpBlock, inner: IpBlock): boolean {
	return inner.prefixLength >= outer.prefixLength && ipEqual(maskIp(inner.base, outer.prefixLength), outer.base);
}

/**
 * Check whether every address of the `inner` CIDR lies in the `outer` CIDR.
 * A CIDR contains itself.
 */
export function containsCidr(version: number, outer: string, inner: string): Check {
	const versionError = isIpVersion(version);
	if (versionError) return fail(versionError);

	const outerBlock = parseCidr(version, outer);
	if (!outerBlock.ok) return fail(outerBlock.error);

	const innerBlock = parseCidr(version, inner);
	if (!innerBlock.ok) return fail(innerBlock.error);

	return { ok: true, value: blockContains(outerBlock.value, innerBlock.value) };
}

/**
 * Check if an address falls within a CIDR range.
 */
export function containsIp(version: number, subnet: string, ip: string): Check {
	const versionError = isIpVersion(version);
	if (versionError) return fail(versionError);

	const subnetBlock = parseCidr(version, subnet);
	if (!subnetBlock.ok) return fail(subnetBlock.error);

	const address = parseIp(version, ip, false);
	if (!address.ok) return fail(address.error);

	return { ok: true, value: blockContains(subnetBlock.value, address.value) };
}

/**
 * Check whether two CIDRs share at least one address: both networks,
 * masked to the shorter of the two prefixes, must coincide.
 */
export function isCidrOverlap(version: number, a: string, b: string): Check {
	const versionError = isIpVersion(version);
	if (versionError) return fail(versionError);

	const blockA = parseCidr(version, a);
	if (!blockA.ok) return fail(blockA.error);

	const blockB = parseCidr(version, b);
	if (!blockB.ok) return fail(blockB.error);

	const prefixLength = Math.min(blockA.value.prefixLength, blockB.value.prefixLength);
	return {
		ok: true,
		value: ipEqual(maskIp(blockA.value.base, prefixLength), maskIp(blockB.value.base, prefixLength)),
	};
}
