/**
 * @title Release Manifest Module
 * @description Reads and writes per-category release manifests.
 *
 * A release manifest is an INI file with one section and one `name=version`
 * line per entry, in entry order. Names and versions are written as they are,
 * without escaping, so that a name matches its input section exactly:
 *
 * ```ini
 * [Versions]
 * MyModule=2.0.0
 * ```
 *
 * @module manifest
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { getErrorMessage, ManifestError } from "../errors.js";

const SECTION_HEADER_PATTERN = /^\[([^\]]+)\]$/;

/**
 * Serialise a release manifest.
 *
 * @param section - Section header
 * @param versions - Entry name to version, in output order
 * @returns INI content
 */
export function serializeReleaseManifest(section: string, versions: ReadonlyMap<string, string>): string {
	const lines = [`[${section}]`];
	for (const [name, version] of versions) {
		lines.push(`${name}=${version}`);
	}
	return lines.join("\n") + "\n";
}

/**
 * Write a release manifest, replacing any existing file.
 *
 * @param manifestPath - Output path
 * @param section - Section header
 * @param versions - Entry name to version, in output order
 * @throws ManifestError if the file cannot be written
 */
export async function writeReleaseManifest(
	manifestPath: string,
	section: string,
	versions: ReadonlyMap<string, string>,
): Promise<void> {
	try {
		await fs.promises.mkdir(path.dirname(manifestPath), { recursive: true });
		await fs.promises.writeFile(manifestPath, serializeReleaseManifest(section, versions), "utf-8");
	} catch (error) {
		throw new ManifestError(`Failed to write release manifest: ${getErrorMessage(error)}`, {
			manifestPath,
			cause: error,
		});
	}
}

/**
 * Parse the versions of a release manifest.
 *
 * Lines are split on their first `=`, so a name must not contain one.
 * `;` and `#` carry no meaning.
 *
 * @param content - INI content
 * @param section - Section header to read
 * @returns Entry name to version in file order; empty if the section is missing
 */
export function parseReleaseManifest(content: string, section: string): Map<string, string> {
	const versions = new Map<string, string>();
	let inSection = false;

	for (const line of content.split(/\r?\n/)) {
		const header = SECTION_HEADER_PATTERN.exec(line);
		if (header) {
			inSection = header[1] === section;
			continue;
		}

		const separator = line.indexOf("=");
		if (inSection && separator > 0) {
			versions.set(line.slice(0, separator), line.slice(separator + 1));
		}
	}

	return versions;
}

/**
 * Read the versions of a release manifest.
 *
 * @param manifestPath - Manifest path
 * @param section - Section header to read
 * @returns Entry name to version
 * @throws ManifestError if the file cannot be read
 */
export async function readReleaseManifest(manifestPath: string, section: string): Promise<Map<string, string>> {
	let content: string;
	try {
		content = await fs.promises.readFile(manifestPath, "utf-8");
	} catch (error) {
		throw new ManifestError(`Failed to read release manifest: ${getErrorMessage(error)}`, {
			manifestPath,
			cause: error,
		});
	}
	return parseReleaseManifest(content, section);
}
