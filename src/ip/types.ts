import { z } from 'zod';

import type { IpError } from './errors.js';

export const IPV4 = 4;
export const IPV6 = 6;

export const IpVersionSchema = z.union([z.literal(IPV4), z.literal(IPV6)]);
export type IpVersion = z.infer<typeof IpVersionSchema>;

/**
 * A single host address in its family's canonical width:
 * 4 bytes for IPv4, 16 bytes for IPv6.
 */
export type IpAddress = {
	readonly version: IpVersion;
	readonly bytes: Uint8Array;
};

/**
 * A CIDR block. `base` is the network address for parsed CIDRs and the
 * host address itself for full-width blocks built from a bare address.
 */
export type IpBlock = {
	readonly base: IpAddress;
	readonly prefixLength: number;
};

/**
 * Outcome of a fallible operation. On failure `value` carries the
 * operation's neutral result (`null` for parses, `false` for predicates).
 */
export type IpResult<T, N = null> = { ok: true; value: T } | { ok: false; error: IpError; value: N };

/**
 * Literal syntax and width of one address family.
 */
export interface IpFamily {
	readonly version: IpVersion;
	readonly byteLength: number;
	readonly bitLength: number;
	/** Returns the canonical bytes, or null when `text` is not a literal of this family. */
	parse(text: string): Uint8Array | null;
	format(bytes: Uint8Array): string;
}
