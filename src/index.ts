/**
 * release-manifest - Generate per-category version manifests from GitHub releases.
 *
 * This library provides functionality for:
 * - Reading category input files (sections with a GitHub release-listing URL)
 * - Looking up the latest release tag of each repository
 * - Normalising tags for a 30-character display
 * - Writing and reading release manifests
 * - Running the whole generation across categories
 */

// Type exports
export * from "./types/index.js";

// Error exports
export {
	ReleaseManifestError,
	ConfigError,
	ConfigFileNotFoundError,
	NetworkError,
	RateLimitError,
	RepositoryNotFoundError,
	ManifestError,
	isReleaseManifestError,
	getErrorMessage,
	wrapError,
	type ReleaseManifestErrorOptions,
	type NetworkErrorOptions,
} from "./errors.js";

// Configuration exports
export * from "./config/index.js";

// Logging exports
export * from "./logging/index.js";

// HTTP exports
export * from "./http/index.js";

// GitHub exports
export * from "./github/index.js";

// Version exports
export * from "./version/index.js";

// Manifest exports
export * from "./manifest/index.js";

// Operations exports
export * from "./operations/index.js";

// Proxy exports
export * from "./proxy/index.js";
