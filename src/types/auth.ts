/**
 * Authentication configuration types.
 */

/** Environment variable read for the GitHub token by default. */
export const DEFAULT_TOKEN_ENV = "GITHUB_TOKEN";

/**
 * Authentication configuration for GitHub API requests.
 */
export interface AuthConfig {
	/** GitHub personal access token. */
	githubToken?: string;
}

/**
 * Options for creating an AuthConfig.
 */
export interface AuthConfigOptions {
	/** GitHub personal access token. */
	githubToken?: string;
	/** Environment variable holding the token (default: GITHUB_TOKEN). */
	tokenEnv?: string;
}

/**
 * Create an AuthConfig from options.
 * Reads the token from the environment once if not provided.
 *
 * @param options - Configuration options
 * @returns AuthConfig object
 */
export function createAuthConfig(options: AuthConfigOptions = {}): AuthConfig {
	const { tokenEnv = DEFAULT_TOKEN_ENV } = options;
	const githubToken = options.githubToken || process.env[tokenEnv] || undefined;

	return { githubToken };
}

/**
 * Check whether requests will be authenticated.
 */
export function hasGitHubToken(auth: AuthConfig | undefined): boolean {
	return Boolean(auth?.githubToken);
}

/**
 * Get authorization headers for a GitHub API request.
 *
 * @param auth - Authentication configuration
 * @returns Headers object for fetch
 */
export function getAuthHeaders(auth: AuthConfig | undefined): Record<string, string> {
	const headers: Record<string, string> = {};

	if (auth?.githubToken) {
		headers["Authorization"] = `Bearer ${auth.githubToken}`;
	}

	return headers;
}
