/**
 * GitHub API exports.
 */

export {
	fetchLatestRelease,
	fetchLatestTag,
	getLatestReleaseUrl,
	type GitHubOptions,
	type FetchTagOptions,
} from "./releases.js";
