/**
 * @title Tag Normalisation Module
 * @description Turns release tags into short display versions.
 *
 * The installer shows versions in a column of at most 30 characters, so long
 * tags are shortened. Tags ending in a commit hash
 * (e.g. "weekly-canary-release-<40-char sha>") keep the part before the hash
 * and its first 7 characters ("release-25f89d3").
 *
 * @module version
 */

/** Widest version the installer can display. */
export const MAX_VERSION_LENGTH = 30;

/** A last segment longer than this is taken to be a commit hash. */
const HASH_SEGMENT_MIN_LENGTH = 21;

const SHORT_HASH_LENGTH = 7;

/**
 * Normalise a release tag for display.
 *
 * Every leading "v" is removed ("vv1.0" becomes "1.0"), then tags longer than
 * `maxLength` are shortened as described above. The result never exceeds
 * `maxLength`.
 *
 * @param tag - Raw release tag
 * @param maxLength - Maximum result length (default: 30)
 * @returns Display version
 */
export function normalizeTag(tag: string, maxLength = MAX_VERSION_LENGTH): string {
	const version = tag.replace(/^v+/, "");

	if (version.length <= maxLength) {
		return version;
	}

	const parts = version.split("-");
	const hash = parts[parts.length - 1];
	const prefix = parts[parts.length - 2];

	if (hash !== undefined && prefix !== undefined && hash.length >= HASH_SEGMENT_MIN_LENGTH) {
		// The segment before the hash can itself be long enough to overflow.
		return `${prefix}-${hash.slice(0, SHORT_HASH_LENGTH)}`.slice(0, maxLength);
	}

	return version.slice(0, maxLength);
}
