/**
 * @title Errors
 * @description Error types for release-manifest.
 *
 * Provides typed error classes for the failures a generation run can hit.
 *
 * @module errors
 */

/**
 * Options for constructing a ReleaseManifestError.
 */
export interface ReleaseManifestErrorOptions {
	/** Suggestion for how to resolve the error. */
	suggestion?: string;
	/** Original error that caused this error. */
	cause?: unknown;
}

/**
 * Base error class for all release-manifest errors.
 */
export class ReleaseManifestError extends Error {
	/** Error code for programmatic handling. */
	readonly code: string;
	/** Suggestion for how to resolve the error. */
	readonly suggestion?: string;

	constructor(message: string, code: string, options?: ReleaseManifestErrorOptions) {
		super(message, { cause: options?.cause });
		this.name = "ReleaseManifestError";
		this.code = code;
		this.suggestion = options?.suggestion;

		// Maintain proper stack trace in V8 environments
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	/**
	 * Format the error for display.
	 */
	format(): string {
		let result = `${this.name}: ${this.message}`;
		if (this.suggestion) {
			result += `\n  Suggestion: ${this.suggestion}`;
		}
		return result;
	}
}

/**
 * Error in the tool configuration or in a category input file.
 */
export class ConfigError extends ReleaseManifestError {
	constructor(message: string, options?: ReleaseManifestErrorOptions) {
		super(message, "CONFIG_ERROR", options);
		this.name = "ConfigError";
	}
}

/**
 * Error when a category input file does not exist.
 *
 * The orchestrator treats this as "category absent" rather than a failed run.
 */
export class ConfigFileNotFoundError extends ReleaseManifestError {
	/** Path that was looked up. */
	readonly filePath: string;

	constructor(filePath: string, options?: { cause?: unknown }) {
		super(`Input file not found: ${filePath}`, "FILE_NOT_FOUND", {
			suggestion: "Check the include directory or the category path overrides",
			cause: options?.cause,
		});
		this.name = "ConfigFileNotFoundError";
		this.filePath = filePath;
	}
}

/**
 * Options for constructing a NetworkError.
 */
export interface NetworkErrorOptions extends ReleaseManifestErrorOptions {
	/** HTTP status code if available. */
	statusCode?: number;
	/** HTTP reason phrase if available. */
	statusText?: string;
}

/**
 * Error related to network operations.
 */
export class NetworkError extends ReleaseManifestError {
	/** HTTP status code if available. */
	readonly statusCode?: number;
	/** HTTP reason phrase if available. */
	readonly statusText?: string;

	constructor(message: string, options?: NetworkErrorOptions, code = "NETWORK_ERROR") {
		super(message, code, {
			suggestion: options?.suggestion ?? "Check your internet connection and try again",
			cause: options?.cause,
		});
		this.name = "NetworkError";
		this.statusCode = options?.statusCode;
		this.statusText = options?.statusText;
	}
}

/**
 * Error when the GitHub API refuses a request because of its rate limit.
 */
export class RateLimitError extends NetworkError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(
			message,
			{
				statusCode: 403,
				statusText: "Forbidden",
				suggestion: "Set the GITHUB_TOKEN environment variable for higher rate limits",
				cause: options?.cause,
			},
			"RATE_LIMITED",
		);
		this.name = "RateLimitError";
	}
}

/**
 * Error when a repository or its releases cannot be found.
 */
export class RepositoryNotFoundError extends NetworkError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(
			message,
			{
				statusCode: 404,
				statusText: "Not Found",
				suggestion: "Check if the repository exists and you have access to it",
				cause: options?.cause,
			},
			"NOT_FOUND",
		);
		this.name = "RepositoryNotFoundError";
	}
}

/**
 * Error when writing or reading a release manifest fails.
 */
export class ManifestError extends ReleaseManifestError {
	/** Path to the manifest file. */
	readonly manifestPath?: string;

	constructor(message: string, options?: { manifestPath?: string; cause?: unknown }) {
		super(message, "MANIFEST_ERROR", {
			suggestion: options?.manifestPath ? `Check the manifest file at: ${options.manifestPath}` : undefined,
			cause: options?.cause,
		});
		this.name = "ManifestError";
		this.manifestPath = options?.manifestPath;
	}
}

/**
 * Check if an error is a ReleaseManifestError.
 */
export function isReleaseManifestError(error: unknown): error is ReleaseManifestError {
	return error instanceof ReleaseManifestError;
}

/**
 * Extract a message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown error as a ReleaseManifestError.
 */
export function wrapError(error: unknown, context?: string): ReleaseManifestError {
	if (isReleaseManifestError(error)) {
		return error;
	}

	const contextPrefix = context ? `${context}: ` : "";

	return new ReleaseManifestError(`${contextPrefix}${getErrorMessage(error)}`, "UNKNOWN_ERROR", { cause: error });
}
