import { ErrInvalidIpVersion, type IpError } from './errors.js';
import { ipv4Family } from './ipv4.js';
import { ipv6Family } from './ipv6.js';
import { type IpFamily, type IpResult, type IpVersion, IpVersionSchema } from './types.js';

const FAMILIES: Record<IpVersion, IpFamily> = {
	4: ipv4Family,
	6: ipv6Family,
};

/**
 * Checks that `version` is one of the supported address family tags.
 */
export function isIpVersion(version: number): IpError | null {
	return IpVersionSchema.safeParse(version).success ? null : ErrInvalidIpVersion;
}

/**
 * Resolves the codec for a family tag. Every entry point goes through
 * here first, so an unknown tag always surfaces as `ErrInvalidIpVersion`.
 */
export function getIpFamily(version: number): IpResult<IpFamily> {
	const parsed = IpVersionSchema.safeParse(version);
	if (!parsed.success) {
		return { ok: false, error: ErrInvalidIpVersion, value: null };
	}
	return { ok: true, value: FAMILIES[parsed.data] };
}

export function familyOf(version: IpVersion): IpFamily {
	return FAMILIES[version];
}
