import { parseIpv4Address } from './ipv4.js';
import { IPV6, type IpFamily } from './types.js';
import { parseHexGroup } from './util.js';

export const IPV6_BYTE_LENGTH = 16;
const IPV6_GROUP_COUNT = 8;

/**
 * Splits one side of a `::` into 16-bit groups. Only the last side may
 * end in a dotted quad, which fills two groups.
 */
function parseGroups(part: string, allowIpv4Tail: boolean): Array<number> | null {
	if (part.length === 0) return [];

	const pieces = part.split(':');
	const groups: Array<number> = [];

	for (let i = 0; i < pieces.length; i++) {
		const piece = pieces[i] ?? '';
		const isLast = i === pieces.length - 1;

		if (isLast && allowIpv4Tail && piece.includes('.')) {
			const tail = parseIpv4Address(piece);
			if (!tail) return null;
			groups.push(((tail[0] ?? 0) << 8) | (tail[1] ?? 0), ((tail[2] ?? 0) << 8) | (tail[3] ?? 0));
			continue;
		}

		const group = parseHexGroup(piece);
		if (group === null) return null;
		groups.push(group);
	}

	return groups;
}

/**
 * Parses a colon-hex IPv6 literal (with optional `::` compression and
 * embedded IPv4 tail) into 16 bytes. Returns null for invalid addresses.
 */
export function parseIpv6Address(text: string): Uint8Array | null {
	const halves = text.split('::');
	if (halves.length > 2) return null;

	const [head = '', tail] = halves;
	let groups: Array<number>;

	if (tail === undefined) {
		const all = parseGroups(head, true);
		if (!all || all.length !== IPV6_GROUP_COUNT) return null;
		groups = all;
	} else {
		const left = parseGroups(head, false);
		const right = parseGroups(tail, true);
		if (!(left && right)) return null;

		// `::` stands for at least one zero group
		const missing = IPV6_GROUP_COUNT - left.length - right.length;
		if (missing < 1) return null;
		groups = [...left, ...Array<number>(missing).fill(0), ...right];
	}

	const bytes = new Uint8Array(IPV6_BYTE_LENGTH);
	groups.forEach((group, i) => {
		bytes[i * 2] = group >> 8;
		bytes[i * 2 + 1] = group & 0xff;
	});
	return bytes;
}

// ::ffff:0:0/96
function isIpv4Mapped(bytes: Uint8Array): boolean {
	for (let i = 0; i < 10; i++) {
		if (bytes[i] !== 0) return false;
	}
	return bytes[10] === 0xff && bytes[11] === 0xff;
}

/**
 * Formats 16 bytes in RFC 5952 form: lower-case hex, no leading zeros,
 * the longest run of two or more zero groups (leftmost on ties) as `::`.
 * IPv4-mapped addresses keep their IPv4 part in dotted decimal.
 */
export function formatIpv6Address(bytes: Uint8Array): string {
	if (isIpv4Mapped(bytes)) {
		return `::ffff:${Array.from(bytes.subarray(12, 16)).join('.')}`;
	}

	const groups: Array<number> = [];
	for (let i = 0; i < IPV6_BYTE_LENGTH; i += 2) {
		groups.push(((bytes[i] ?? 0) << 8) | (bytes[i + 1] ?? 0));
	}

	let longestZeroStart = -1;
	let longestZeroLength = 0;
	let currentZeroStart = -1;

	for (let i = 0; i < groups.length; i++) {
		if (groups[i] !== 0) {
			currentZeroStart = -1;
			continue;
		}
		if (currentZeroStart === -1) currentZeroStart = i;

		const currentZeroLength = i - currentZeroStart + 1;
		if (currentZeroLength > longestZeroLength) {
			longestZeroStart = currentZeroStart;
			longestZeroLength = currentZeroLength;
		}
	}

	const hex = groups.map((group) => group.toString(16));
	if (longestZeroLength < 2) {
		return hex.join(':');
	}

	const left = hex.slice(0, longestZeroStart).join(':');
	const right = hex.slice(longestZeroStart + longestZeroLength).join(':');
	return `${left}::${right}`;
}

export const ipv6Family: IpFamily = {
	version: IPV6,
	byteLength: IPV6_BYTE_LENGTH,
	bitLength: IPV6_BYTE_LENGTH * 8,
	parse: parseIpv6Address,
	format: formatIpv6Address,
};
