/**
 * @title Category Types Module
 * @description Component categories and where their files live.
 *
 * Each category has one input file listing its components and one release
 * manifest written for the downstream installer.
 *
 * @module types
 */

import * as path from "node:path";
import { ConfigError } from "../errors.js";

/**
 * All categories, in the order a run processes them.
 */
export const CATEGORIES = ["sysmodules", "overlays", "apps", "emulators"] as const;

/**
 * A component category.
 */
export type Category = (typeof CATEGORIES)[number];

/**
 * Resolved file locations for one category.
 */
export interface CategoryLayout {
	/** Category these paths belong to. */
	category: Category;
	/** Absolute path to the input file. */
	inputPath: string;
	/** Absolute path to the release manifest. */
	outputPath: string;
	/** Section header used in the release manifest. */
	section: string;
}

/**
 * Input/output path overrides for a category.
 * Relative paths are resolved against the include directory.
 */
export interface CategoryPathOverride {
	input?: string;
	output?: string;
}

/** Paths relative to the include directory. */
const DEFAULT_PATHS: Record<Category, Required<CategoryPathOverride>> = {
	sysmodules: { input: "sysmodules/sysmodules.ini", output: "sysmodules/RELEASE_SM.ini" },
	overlays: { input: "overlays/overlays.ini", output: "overlays/RELEASE_OV.ini" },
	apps: { input: "apps/apps.ini", output: "apps/RELEASE_APPS.ini" },
	// The installer ships emulators under the German directory name.
	emulators: { input: "emulatoren/emulatoren.ini", output: "emulatoren/RELEASE_EM.ini" },
};

/** Section header for categories the installer does not know. */
const FALLBACK_SECTION = "Release Info";

/**
 * Check whether a string names a known category.
 */
export function isCategory(value: string): value is Category {
	return (CATEGORIES as readonly string[]).includes(value);
}

/**
 * Parse a category name.
 *
 * @param value - Category name
 * @returns The category
 * @throws ConfigError if the name is not a known category
 */
export function parseCategory(value: string): Category {
	const name = value.trim().toLowerCase();
	if (!isCategory(name)) {
		throw new ConfigError(`Unknown category: "${value}"`, {
			suggestion: `Use one of: ${CATEGORIES.join(", ")}`,
		});
	}
	return name;
}

/**
 * Get the release manifest section header for a category.
 *
 * @param category - Category name (may be unknown)
 * @returns "Versions" for known categories, "Release Info" otherwise
 */
export function getManifestSection(category: string): string {
	return isCategory(category) ? "Versions" : FALLBACK_SECTION;
}

/**
 * Resolve the file layout of every category.
 *
 * @param includeDir - Directory holding the category folders
 * @param overrides - Per-category path overrides
 * @returns Layouts in run order
 */
export function resolveCategoryLayouts(
	includeDir: string,
	overrides: Partial<Record<Category, CategoryPathOverride>> = {},
): CategoryLayout[] {
	const root = path.resolve(includeDir);

	return CATEGORIES.map((category) => {
		const defaults = DEFAULT_PATHS[category];
		const override = overrides[category] ?? {};

		return {
			category,
			inputPath: path.resolve(root, override.input ?? defaults.input),
			outputPath: path.resolve(root, override.output ?? defaults.output),
			section: getManifestSection(category),
		};
	});
}
