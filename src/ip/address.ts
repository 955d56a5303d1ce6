import { ErrInvalidIpFormat } from './errors.js';
import { familyOf, getIpFamily } from './family.js';
import { IPV4, type IpAddress, type IpBlock, type IpResult } from './types.js';

// ::ffff:0:0/96
const IPV4_MAPPED_PREFIX = new Uint8Array([0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0xff, 0xff]);

/**
 * Generates the netmask byte for position `byteIndex` of a mask of
 * `prefixLength` bits.
 */
function maskByte(byteIndex: number, prefixLength: number): number {
	const bits = Math.min(Math.max(prefixLength - byteIndex * 8, 0), 8);
	return bits === 0 ? 0 : (0xff << (8 - bits)) & 0xff;
}

function isIpv4Mapped(bytes: Uint8Array): boolean {
	return bytes.length === 16 && IPV4_MAPPED_PREFIX.every((byte, i) => bytes[i] === byte);
}

/**
 * The bytes of `address` at its family's canonical width: an IPv4 address
 * held in the 16-byte IPv4-mapped form yields its last 4 bytes. The result
 * may share memory with `address.bytes`.
 */
export function canonicalBytes(address: IpAddress): Uint8Array {
	if (address.version === IPV4 && isIpv4Mapped(address.bytes)) {
		return address.bytes.subarray(IPV4_MAPPED_PREFIX.length);
	}
	return address.bytes;
}

/**
 * Zeroes every bit of `address` past the first `prefixLength` bits.
 */
export function maskIp(address: IpAddress, prefixLength: number): IpAddress {
	const bytes = canonicalBytes(address).map((byte, i) => byte & maskByte(i, prefixLength));
	return { version: address.version, bytes };
}

/**
 * Projects raw bytes onto the canonical width of `version`. IPv4 takes 4
 * bytes or the 16-byte IPv4-mapped form; IPv6 takes 16 bytes.
 */
export function toCanonicalIp(version: number, bytes: Uint8Array): IpResult<IpAddress> {
	const family = getIpFamily(version);
	if (!family.ok) return family;

	const { byteLength } = family.value;
	if (bytes.length === byteLength) {
		return { ok: true, value: { version: family.value.version, bytes: bytes.slice() } };
	}
	if (family.value.version === IPV4 && isIpv4Mapped(bytes)) {
		return { ok: true, value: { version: IPV4, bytes: bytes.slice(IPV4_MAPPED_PREFIX.length) } };
	}
	return { ok: false, error: ErrInvalidIpFormat, value: null };
}

export function formatIp(address: IpAddress): string {
	return familyOf(address.version).format(canonicalBytes(address));
}

export function formatCidr(block: IpBlock): string {
	return `${formatIp(block.base)}/${block.prefixLength}`;
}
