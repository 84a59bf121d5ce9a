// src/lib/errors.ts

/** Network failure, timeout or non-2xx status from GitHub. */
export class TransportError extends Error {
	readonly url: string;
	readonly status?: number;

	constructor(
		message: string,
		url: string,
		status?: number,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = "TransportError";
		this.url = url;
		this.status = status;
	}
}

/** The quota never recovered within the allowed number of throttle waits. */
export class RateLimitExhaustedError extends Error {
	readonly url: string;
	readonly waits: number;

	constructor(url: string, waits: number) {
		super(`GET ${url}: rate limit still exhausted after ${waits} waits`);
		this.name = "RateLimitExhaustedError";
		this.url = url;
		this.waits = waits;
	}
}

/**
 * Thrown instead of exiting the process when required configuration (env vars, tokens) is missing.
 * Raised before any request is issued.
 */
export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}
