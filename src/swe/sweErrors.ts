/**
 * Custom error types for the edit loop.
 */

export class ConfigurationError extends Error {
	constructor(
		message: string,
		/** The config file or project root the configuration was loaded for */
		public readonly source: string,
	) {
		super(message);
		this.name = 'ConfigurationError';
		Object.setPrototypeOf(this, ConfigurationError.prototype);
	}
}

export class PatchApplyError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'PatchApplyError';
		Object.setPrototypeOf(this, PatchApplyError.prototype);
	}
}
