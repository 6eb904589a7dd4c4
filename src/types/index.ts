/**
 * Public type exports for release-manifest.
 */

export {
	type Category,
	type CategoryLayout,
	type CategoryPathOverride,
	CATEGORIES,
	isCategory,
	parseCategory,
	getManifestSection,
	resolveCategoryLayouts,
} from "./category.js";

export { type Entry, type FetchErrorKind, type FetchResult, type CategoryResult, formatEntryLabel } from "./entry.js";

export {
	type AuthConfig,
	type AuthConfigOptions,
	DEFAULT_TOKEN_ENV,
	createAuthConfig,
	hasGitHubToken,
	getAuthHeaders,
} from "./auth.js";
