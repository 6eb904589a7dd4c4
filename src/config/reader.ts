/**
 * @title Config Reader Module
 * @description Reads the components listed in a category input file.
 *
 * Input files are INI-like: `[Name]` headers, each followed by free-form
 * lines. A section becomes an entry when its body contains a GitHub
 * release-listing URL; everything else in the body is ignored.
 *
 * @module config
 */

import * as fs from "node:fs";
import type { Entry } from "../types/entry.js";
import { ConfigError, ConfigFileNotFoundError, getErrorMessage } from "../errors.js";
import { extractRepository } from "./repository.js";

const SECTION_HEADER_PATTERN = /^\[([^\]]+)\]$/;

const RELEASE_URL_PATTERN = /https:\/\/api\.github\.com\/repos\/\S+/;

interface Section {
	name: string;
	body: string[];
}

function splitSections(content: string): Section[] {
	const sections: Section[] = [];
	let current: Section | undefined;

	for (const line of content.split(/\r?\n/)) {
		const header = SECTION_HEADER_PATTERN.exec(line.trim());
		if (header?.[1] !== undefined) {
			current = { name: header[1], body: [] };
			sections.push(current);
			continue;
		}
		current?.body.push(line);
	}

	return sections;
}

/**
 * Parse entries from the content of a category input file.
 *
 * Section names are unique within a category; a repeated section is ignored.
 *
 * @param content - File content
 * @returns Entries in section order
 */
export function parseEntries(content: string): Entry[] {
	const entries: Entry[] = [];
	const seen = new Set<string>();

	for (const section of splitSections(content)) {
		if (seen.has(section.name)) {
			continue;
		}
		const url = RELEASE_URL_PATTERN.exec(section.body.join("\n"))?.[0];
		if (!url) {
			continue;
		}

		const repository = extractRepository(url);
		if (!repository) {
			continue;
		}

		seen.add(section.name);
		entries.push({
			name: section.name,
			owner: repository.owner,
			repo: repository.repo,
			sourceUrl: url,
		});
	}

	return entries;
}

/**
 * Read entries from a category input file.
 *
 * @param filePath - Path to the input file
 * @returns Entries in section order
 * @throws ConfigFileNotFoundError if the file does not exist or its directory is not a directory
 * @throws ConfigError if the file cannot be read
 */
export async function readEntries(filePath: string): Promise<Entry[]> {
	let content: string;
	try {
		content = await fs.promises.readFile(filePath, "utf-8");
	} catch (error) {
		// ENOTDIR: a path component is a regular file.
		if (error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
			throw new ConfigFileNotFoundError(filePath, { cause: error });
		}
		throw new ConfigError(`Failed to read input file ${filePath}: ${getErrorMessage(error)}`, { cause: error });
	}

	return parseEntries(content);
}
