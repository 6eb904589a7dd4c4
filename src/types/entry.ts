/**
 * @title Entry Types Module
 * @description Entries read from category input files and the results produced for them.
 *
 * @module types
 */

import type { Category } from "./category.js";

/**
 * One component read from a category input file.
 */
export interface Entry {
	/** Section name; unique within a category. */
	readonly name: string;
	/** Repository owner. */
	readonly owner: string;
	/** Repository name. */
	readonly repo: string;
	/** Release-listing URL the owner and repo were taken from. */
	readonly sourceUrl: string;
}

/**
 * Why a release lookup failed.
 */
export type FetchErrorKind = "rate-limited" | "not-found" | "http-status" | "transport";

/**
 * Outcome of looking up the latest release of one entry.
 */
export interface FetchResult {
	entry: Entry;
	/** Raw tag, or null when the lookup failed or found no release. */
	tag: string | null;
	/** Failure cause, for reporting only. */
	errorKind?: FetchErrorKind;
}

/**
 * Aggregate outcome of one category.
 */
export interface CategoryResult {
	category: Category;
	/** Release manifest that was written. */
	outputPath: string;
	total: number;
	success: number;
	failed: number;
	/** Entry name to normalised version, in input order. */
	versions: Map<string, string>;
	/** "name (owner/repo)" for each failed entry, in input order. */
	failedEntries: string[];
}

/**
 * Format an entry as "name (owner/repo)".
 */
export function formatEntryLabel(entry: Entry): string {
	return `${entry.name} (${entry.owner}/${entry.repo})`;
}
