export const IP_ERROR_CODES = ['INVALID_IP_VERSION', 'INVALID_IP_FORMAT', 'INVALID_CIDR_FORMAT'] as const;
export type IpErrorCode = (typeof IP_ERROR_CODES)[number];

export class IpError extends Error {
	readonly code: IpErrorCode;

	constructor(code: IpErrorCode, message: string) {
		super(message);
		this.name = 'IpError';
		this.code = code;
	}
}

// Shared instances: callers match on identity, so these are never wrapped.
export const ErrInvalidIpVersion = new IpError('INVALID_IP_VERSION', 'invalid IP version');
export const ErrInvalidIpFormat = new IpError('INVALID_IP_FORMAT', 'invalid IP address format');
export const ErrInvalidCidrFormat = new IpError('INVALID_CIDR_FORMAT', 'invalid CIDR address format');
