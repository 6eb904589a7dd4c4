/**
 * GitHub releases API client.
 */

import type { AuthConfig } from "../types/auth.js";
import type { Entry, FetchErrorKind, FetchResult } from "../types/entry.js";
import { getAuthHeaders } from "../types/auth.js";
import { getErrorMessage, NetworkError, RateLimitError, RepositoryNotFoundError } from "../errors.js";
import { fetchJson, USER_AGENT } from "../http/index.js";
import { silentLogger, type Logger } from "../logging/index.js";

const GITHUB_API_BASE = "https://api.github.com";

/**
 * Options for GitHub API requests.
 */
export interface GitHubOptions {
	/** Authentication configuration. */
	auth?: AuthConfig;
	/** Request timeout in milliseconds. */
	timeout?: number;
}

/**
 * Options for looking up the tag of an entry.
 */
export interface FetchTagOptions extends GitHubOptions {
	/** Receives one diagnostic line per lookup. */
	logger?: Logger;
}

/**
 * Get GitHub API headers.
 */
function getGitHubHeaders(auth?: AuthConfig): Record<string, string> {
	return {
		Accept: "application/vnd.github+json",
		"User-Agent": USER_AGENT,
		...getAuthHeaders(auth),
	};
}

/**
 * Build the URL listing the most recent release of a repository.
 */
export function getLatestReleaseUrl(owner: string, repo: string): string {
	return `${GITHUB_API_BASE}/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/releases?per_page=1`;
}

/**
 * Handle GitHub API errors.
 */
function handleGitHubError(error: unknown, owner: string, repo: string): never {
	if (error instanceof NetworkError) {
		const status = error.statusCode;

		if (status === 403) {
			throw new RateLimitError(`Rate limit exceeded for ${owner}/${repo}`, { cause: error });
		}

		if (status === 404) {
			throw new RepositoryNotFoundError(`Repository not found: ${owner}/${repo}`, { cause: error });
		}
	}

	throw error;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null;
}

/**
 * Read the tag of the first release in a releases listing.
 * Falls back to the release name when the tag is absent.
 */
function readFirstReleaseTag(body: unknown): string | null {
	if (!Array.isArray(body)) {
		return null;
	}

	const release: unknown = body[0];
	if (!isRecord(release)) {
		return null;
	}

	if (typeof release["tag_name"] === "string") {
		return release["tag_name"];
	}
	if (typeof release["name"] === "string") {
		return release["name"];
	}
	return null;
}

/**
 * Fetch the tag of the most recently listed release.
 *
 * @param owner - Repository owner
 * @param repo - Repository name
 * @param options - GitHub options
 * @returns Tag (or release name), or null if the repository has no release
 * @throws RateLimitError on HTTP 403
 * @throws RepositoryNotFoundError on HTTP 404
 * @throws NetworkError on other HTTP or transport failures
 */
export async function fetchLatestRelease(owner: string, repo: string, options: GitHubOptions = {}): Promise<string | null> {
	const { auth, timeout } = options;

	try {
		const body = await fetchJson(getLatestReleaseUrl(owner, repo), {
			headers: getGitHubHeaders(auth),
			timeout,
		});
		return readFirstReleaseTag(body);
	} catch (error) {
		handleGitHubError(error, owner, repo);
	}
}

function classifyError(error: unknown): { kind: FetchErrorKind; message: string } {
	if (error instanceof RateLimitError) {
		return { kind: "rate-limited", message: "Rate limit exceeded. Set GITHUB_TOKEN env var for higher limits." };
	}
	if (error instanceof RepositoryNotFoundError) {
		return { kind: "not-found", message: "Repository not found" };
	}
	if (error instanceof NetworkError && error.statusCode !== undefined) {
		return { kind: "http-status", message: `HTTP ${error.statusCode}: ${error.statusText ?? ""}`.trimEnd() };
	}
	return { kind: "transport", message: `Error: ${getErrorMessage(error)}` };
}

/**
 * Look up the latest tag of an entry.
 *
 * Never throws: every failure is reported through the logger and
 * returned as a result without a tag.
 *
 * @param entry - Entry to look up
 * @param options - Lookup options
 * @returns Fetch result
 */
export async function fetchLatestTag(entry: Entry, options: FetchTagOptions = {}): Promise<FetchResult> {
	const { logger = silentLogger, ...githubOptions } = options;

	try {
		const tag = await fetchLatestRelease(entry.owner, entry.repo, githubOptions);
		if (!tag) {
			logger.warn("    No published release found");
			return { entry, tag: null };
		}
		logger.debug(`    Latest release: ${tag}`);
		return { entry, tag };
	} catch (error) {
		const { kind, message } = classifyError(error);
		logger.warn(`    ${message}`);
		return { entry, tag: null, errorKind: kind };
	}
}
