export { canonicalBytes, formatCidr, formatIp, maskIp, toCanonicalIp } from './address.js';
export { containsCidr, containsIp, isCidrOverlap } from './cidr.js';
export { compareIp, ipEqual } from './compare.js';
export {
	ErrInvalidCidrFormat,
	ErrInvalidIpFormat,
	ErrInvalidIpVersion,
	IP_ERROR_CODES,
	IpError,
	type IpErrorCode,
} from './errors.js';
export { getIpFamily, isIpVersion } from './family.js';
export { isCidr, isIp, isIpv4Cidr, isIpv6Cidr, parseCidr, parseIp } from './parse.js';
export { ipsDiffSet, ipsIntersectionSet, ipsUnionSet } from './set.js';
export { nextIp, prevIp } from './step.js';
export {
	IPV4,
	IPV6,
	type IpAddress,
	type IpBlock,
	type IpFamily,
	type IpResult,
	type IpVersion,
	IpVersionSchema,
} from './types.js';
