/**
 * Agent errors
 *
 * Only StartupFatalError and its subclasses ever reach the process boundary.
 * Everything else is contained by the component that owns it and logged.
 */

/**
 * The process must not start (identity missing or malformed, bad environment).
 */
export class StartupFatalError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'StartupFatalError';
	}
}

export class IdentityNotFoundError extends StartupFatalError {
	constructor(public readonly path: string) {
		super(`Device identity not found at ${path}`);
		this.name = 'IdentityNotFoundError';
	}
}

export class IdentityMalformedError extends StartupFatalError {
	constructor(
		public readonly path: string,
		public readonly issues: string[],
	) {
		super(`Device identity at ${path} is malformed: ${issues.join('; ')}`);
		this.name = 'IdentityMalformedError';
	}
}

export class InvalidEnvironmentError extends StartupFatalError {
	constructor(public readonly issues: string[]) {
		super(`Invalid environment: ${issues.join('; ')}`);
		this.name = 'InvalidEnvironmentError';
	}
}

/**
 * Settings document could not be read, parsed or validated.
 * Never thrown out of a reload; previous settings stay in effect.
 */
export class SettingsParseError extends Error {
	constructor(
		public readonly path: string,
		public readonly issues: string[],
	) {
		super(`Settings at ${path} rejected: ${issues.join('; ')}`);
		this.name = 'SettingsParseError';
	}
}

/**
 * Broker closed the connection before it was acknowledged.
 */
export class SessionClosedError extends Error {
	constructor(host: string, port: number) {
		super(`Connection to ${host}:${port} closed before it was established`);
		this.name = 'SessionClosedError';
	}
}
