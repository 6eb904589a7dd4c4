/**
 * @title Release Manifest Generation
 * @description Fetches the latest tag of every entry and writes the category manifests.
 *
 * Requests are strictly sequential. Within a category, every request after
 * the first waits `requestDelay` milliseconds to stay under the GitHub API's
 * unauthenticated rate limit.
 *
 * @module operations
 */

import * as path from "node:path";
import type { CategoryLayout, CategoryPathOverride, Category } from "../types/category.js";
import type { CategoryResult, Entry } from "../types/entry.js";
import { CATEGORIES, resolveCategoryLayouts } from "../types/category.js";
import { formatEntryLabel } from "../types/entry.js";
import { ConfigFileNotFoundError } from "../errors.js";
import { readEntries } from "../config/reader.js";
import { fetchLatestTag, type GitHubOptions } from "../github/releases.js";
import { normalizeTag } from "../version/normalize.js";
import { writeReleaseManifest } from "../manifest/writer.js";
import { silentLogger, type Logger } from "../logging/index.js";
import { summarizeResults, type RunSummary } from "./summary.js";

export const DEFAULT_REQUEST_DELAY = 500;

/**
 * Options for generating one category.
 */
export interface GenerateOptions extends GitHubOptions {
	/** Progress output. */
	logger?: Logger;
	/** Pause between consecutive requests, in milliseconds (default: 500). */
	requestDelay?: number;
}

/**
 * Options for generating every category.
 */
export interface GenerateManifestsOptions extends GenerateOptions {
	/** Directory holding the category folders. */
	includeDir: string;
	/** Categories to process (default: all); always run in the fixed order. */
	categories?: readonly Category[];
	/** Per-category path overrides. */
	paths?: Partial<Record<Category, CategoryPathOverride>>;
}

function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Fetch, normalise and write the release manifest of one category.
 *
 * The manifest is written once every entry has been looked up, including
 * when every lookup failed.
 *
 * @param layout - Category files
 * @param entries - Entries read from the category input file
 * @param options - Generation options
 * @returns Category result
 */
export async function generateCategory(
	layout: CategoryLayout,
	entries: readonly Entry[],
	options: GenerateOptions = {},
): Promise<CategoryResult> {
	const { logger = silentLogger, requestDelay = DEFAULT_REQUEST_DELAY, ...githubOptions } = options;

	logger.info("");
	logger.info(`Generating ${path.basename(layout.outputPath)}...`);
	logger.info(`Found ${entries.length} entries`);

	const versions = new Map<string, string>();
	const failedEntries: string[] = [];

	for (const [index, entry] of entries.entries()) {
		if (index > 0 && requestDelay > 0) {
			await sleep(requestDelay);
		}

		logger.info(`  Fetching ${formatEntryLabel(entry)}...`);
		const { tag } = await fetchLatestTag(entry, { ...githubOptions, logger });

		if (tag) {
			const version = normalizeTag(tag);
			versions.set(entry.name, version);
			logger.info(`    ✓ ${version}`);
		} else {
			failedEntries.push(formatEntryLabel(entry));
			logger.info("    ✗ Failed");
		}
	}

	await writeReleaseManifest(layout.outputPath, layout.section, versions);

	const result: CategoryResult = {
		category: layout.category,
		outputPath: layout.outputPath,
		total: entries.length,
		success: versions.size,
		failed: failedEntries.length,
		versions,
		failedEntries,
	};

	logger.info("");
	logger.info(`✓ Created ${layout.outputPath}`);
	logger.info(`  Success: ${result.success}/${result.total}`);
	if (result.failed > 0) {
		logger.info(`  Failed: ${result.failed}/${result.total}`);
		for (const label of failedEntries) {
			logger.info(`    - ${label}`);
		}
	}

	return result;
}

/**
 * Generate the release manifests of every category.
 *
 * Categories whose input file is missing, or lists no repository, are
 * skipped without writing a manifest.
 *
 * @param options - Generation options
 * @returns Run summary
 */
export async function generateReleaseManifests(options: GenerateManifestsOptions): Promise<RunSummary> {
	const { includeDir, categories = CATEGORIES, paths, ...generateOptions } = options;
	const logger = generateOptions.logger ?? silentLogger;
	const results: CategoryResult[] = [];

	for (const layout of resolveCategoryLayouts(includeDir, paths)) {
		if (!categories.includes(layout.category)) {
			continue;
		}

		let entries: Entry[];
		try {
			entries = await readEntries(layout.inputPath);
		} catch (error) {
			if (error instanceof ConfigFileNotFoundError) {
				logger.debug(`Skipping ${layout.category}: ${error.filePath} not found`);
				continue;
			}
			throw error;
		}

		if (entries.length === 0) {
			logger.debug(`Skipping ${layout.category}: no repositories listed in ${layout.inputPath}`);
			continue;
		}

		results.push(await generateCategory(layout, entries, generateOptions));
	}

	return summarizeResults(results);
}
