import { describe, expect, it } from 'vitest';
import { formatIpv6Address, ipv6Family, parseIpv6Address } from './ipv6.js';

function bytes(...groups: Array<number>): Uint8Array {
	return new Uint8Array(groups.flatMap((group) => [group >> 8, group & 0xff]));
}

describe('parseIpv6Address', () => {
	it('parses a fully written address', () => {
		expect(parseIpv6Address('2001:0db8:0000:0000:0000:0000:0000:0001')).toEqual(
			bytes(0x2001, 0xdb8, 0, 0, 0, 0, 0, 1),
		);
	});

	it('expands :: at the start, middle and end', () => {
		expect(parseIpv6Address('::1')).toEqual(bytes(0, 0, 0, 0, 0, 0, 0, 1));
		expect(parseIpv6Address('abcd:1234::1')).toEqual(bytes(0xabcd, 0x1234, 0, 0, 0, 0, 0, 1));
		expect(parseIpv6Address('abcd:1234::')).toEqual(bytes(0xabcd, 0x1234, 0, 0, 0, 0, 0, 0));
		expect(parseIpv6Address('::')).toEqual(new Uint8Array(16));
	});

	it('accepts upper-case hex', () => {
		expect(parseIpv6Address('ABCD:1234::1')).toEqual(parseIpv6Address('abcd:1234::1'));
	});

	it('parses an embedded IPv4 tail into the last two groups', () => {
		expect(parseIpv6Address('::ffff:172.18.40.1')).toEqual(bytes(0, 0, 0, 0, 0, 0xffff, 0xac12, 0x2801));
	});

	it('rejects more than one ::', () => {
		expect(parseIpv6Address('1::2::3')).toBeNull();
	});

	it('rejects the wrong number of groups', () => {
		expect(parseIpv6Address('1:2:3:4:5:6:7')).toBeNull();
		expect(parseIpv6Address('1:2:3:4:5:6:7:8:9')).toBeNull();
		// :: must stand for at least one group
		expect(parseIpv6Address('1:2:3:4:5:6:7::8')).toBeNull();
	});

	it('rejects stray colons, long groups and zones', () => {
		expect(parseIpv6Address('')).toBeNull();
		expect(parseIpv6Address(':1:2:3:4:5:6:7')).toBeNull();
		expect(parseIpv6Address('1:2:3:4:5:6:7:')).toBeNull();
		expect(parseIpv6Address(':::')).toBeNull();
		expect(parseIpv6Address('12345::')).toBeNull();
		expect(parseIpv6Address('abcd:1234::1%eth0')).toBeNull();
		expect(parseIpv6Address('g::')).toBeNull();
	});

	it('rejects IPv4 literals and misplaced dotted quads', () => {
		expect(parseIpv6Address('172.18.40.1')).toBeNull();
		expect(parseIpv6Address('172.18.40.1::')).toBeNull();
		expect(parseIpv6Address('::172.18.40.1:1')).toBeNull();
	});
});

describe('formatIpv6Address', () => {
	it('compresses the longest run of zero groups', () => {
		expect(formatIpv6Address(bytes(0x2001, 0xdb8, 0, 1, 0, 0, 0, 1))).toBe('2001:db8:0:1::1');
	});

	it('compresses the leftmost run on ties', () => {
		expect(formatIpv6Address(bytes(0x2001, 0xdb8, 0, 0, 1, 0, 0, 1))).toBe('2001:db8::1:0:0:1');
	});

	it('does not compress a single zero group', () => {
		expect(formatIpv6Address(bytes(1, 0, 1, 1, 1, 1, 1, 1))).toBe('1:0:1:1:1:1:1:1');
	});

	it('handles leading, trailing and all-zero addresses', () => {
		expect(formatIpv6Address(bytes(0, 0, 0, 0, 0, 0, 0, 1))).toBe('::1');
		expect(formatIpv6Address(bytes(0xabcd, 0x1234, 0, 0, 0, 0, 0, 0))).toBe('abcd:1234::');
		expect(formatIpv6Address(new Uint8Array(16))).toBe('::');
	});

	it('writes lower-case hex without leading zeros', () => {
		expect(formatIpv6Address(bytes(0xabcd, 0xdb8, 0xa, 0xb, 0xc, 0xd, 0xe, 0xf))).toBe('abcd:db8:a:b:c:d:e:f');
	});

	it('writes the IPv4 part of an IPv4-mapped address in dotted decimal', () => {
		expect(formatIpv6Address(bytes(0, 0, 0, 0, 0, 0xffff, 0xac12, 0x2801))).toBe('::ffff:172.18.40.1');
		expect(formatIpv6Address(bytes(0, 0, 0, 0, 0, 0xffff, 0, 0))).toBe('::ffff:0.0.0.0');
	});

	it('keeps colon-hex for addresses outside ::ffff:0:0/96', () => {
		expect(formatIpv6Address(bytes(0xfe80, 0, 0, 0, 0, 0xffff, 0xac12, 0x2801))).toBe('fe80::ffff:ac12:2801');
		expect(formatIpv6Address(bytes(0, 0, 0, 0, 0, 0xfffe, 0xac12, 0x2801))).toBe('::fffe:ac12:2801');
	});
});

describe('ipv6Family', () => {
	it('is 16 bytes and 128 bits wide', () => {
		expect(ipv6Family.version).toBe(6);
		expect(ipv6Family.byteLength).toBe(16);
		expect(ipv6Family.bitLength).toBe(128);
	});
});
