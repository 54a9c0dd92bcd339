/**
 * Connection error classification
 * Used to label broker connection failures in retry logs
 */

export type ConnectionErrorType =
	| 'DNS_ERROR'
	| 'CONNECTION_REFUSED'
	| 'TIMEOUT'
	| 'NETWORK_UNREACHABLE'
	| 'NOT_AUTHORIZED'
	| 'UNKNOWN';

/**
 * Socket errors carry `code` directly, wrapped ones carry it on `cause`
 */
function errorCodes(error: Error): unknown[] {
	const codes: unknown[] = [];
	if ('code' in error) {
		codes.push(error.code);
	}
	if ('cause' in error && error.cause && typeof error.cause === 'object' && 'code' in error.cause) {
		codes.push(error.cause.code);
	}
	return codes;
}

function hasCode(error: Error, ...candidates: string[]): boolean {
	return errorCodes(error).some((code) => typeof code === 'string' && candidates.includes(code));
}

export function isDnsError(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}
	if (hasCode(error, 'ENOTFOUND', 'EAI_AGAIN')) {
		return true;
	}
	const msg = error.message.toLowerCase();
	return msg.includes('getaddrinfo') &&
	       (msg.includes('enotfound') || msg.includes('eai_again'));
}

export function isConnectionRefused(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}
	return hasCode(error, 'ECONNREFUSED') || error.message.toLowerCase().includes('econnrefused');
}

export function isTimeout(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}
	return hasCode(error, 'ETIMEDOUT', 'ECONNRESET') || error.message.toLowerCase().includes('timeout');
}

export function isNetworkUnreachable(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}
	if (hasCode(error, 'ENETUNREACH', 'EHOSTUNREACH')) {
		return true;
	}
	const msg = error.message.toLowerCase();
	return msg.includes('network unreachable') || msg.includes('host unreachable');
}

/**
 * Broker answered CONNACK with a bad-credentials / not-authorized code
 */
export function isNotAuthorized(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}
	const msg = error.message.toLowerCase();
	return msg.includes('not authorized') || msg.includes('bad username or password');
}

export function getConnectionErrorType(error: unknown): ConnectionErrorType {
	if (isDnsError(error)) return 'DNS_ERROR';
	if (isConnectionRefused(error)) return 'CONNECTION_REFUSED';
	if (isTimeout(error)) return 'TIMEOUT';
	if (isNetworkUnreachable(error)) return 'NETWORK_UNREACHABLE';
	if (isNotAuthorized(error)) return 'NOT_AUTHORIZED';
	return 'UNKNOWN';
}
