/**
 * Repository identification from GitHub release-listing URLs.
 */

/**
 * A GitHub repository.
 */
export interface RepositoryRef {
	owner: string;
	repo: string;
}

const RELEASES_PATH_PATTERN = /\/repos\/([^/]+)\/([^/]+)\/releases/;

/**
 * Extract owner and repository from a release-listing URL such as
 * `https://api.github.com/repos/owner/repo/releases?per_page=1`.
 *
 * @param url - Release-listing URL
 * @returns Owner and repository, or null if the URL does not match
 */
export function extractRepository(url: string): RepositoryRef | null {
	const match = RELEASES_PATH_PATTERN.exec(url);
	if (!match || match[1] === undefined || match[2] === undefined) {
		return null;
	}
	return { owner: match[1], repo: match[2] };
}
