import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { extractRepository } from "../src/config/repository.js";
import { parseEntries, readEntries } from "../src/config/reader.js";
import { ConfigFileNotFoundError } from "../src/errors.js";

describe("extractRepository", () => {
	it("extracts owner and repository from a release-listing URL", () => {
		expect(extractRepository("https://api.github.com/repos/foo/bar/releases?per_page=1")).toEqual({
			owner: "foo",
			repo: "bar",
		});
	});

	it("accepts URLs without a query", () => {
		expect(extractRepository("https://api.github.com/repos/some-org/my.repo/releases")).toEqual({
			owner: "some-org",
			repo: "my.repo",
		});
	});

	it("accepts a specific release path", () => {
		expect(extractRepository("https://api.github.com/repos/foo/bar/releases/latest")).toEqual({
			owner: "foo",
			repo: "bar",
		});
	});

	it("returns null for URLs without a releases path", () => {
		expect(extractRepository("https://api.github.com/repos/foo/bar/tags")).toBeNull();
		expect(extractRepository("https://github.com/foo/bar")).toBeNull();
	});

	it("returns null when owner or repository is missing", () => {
		expect(extractRepository("https://api.github.com/repos/foo/releases")).toBeNull();
	});
});

describe("parseEntries", () => {
	it("creates one entry per section with a release URL", () => {
		const content = [
			"[MyModule]",
			"download=https://api.github.com/repos/foo/bar/releases?per_page=1",
			"path=/atmosphere/contents",
			"",
			"[Notes]",
			"description=No repository here",
		].join("\n");

		expect(parseEntries(content)).toEqual([
			{
				name: "MyModule",
				owner: "foo",
				repo: "bar",
				sourceUrl: "https://api.github.com/repos/foo/bar/releases?per_page=1",
			},
		]);
	});

	it("keeps section order", () => {
		const content = [
			"[Zeta]",
			"url=https://api.github.com/repos/z/zeta/releases",
			"[Alpha]",
			"url=https://api.github.com/repos/a/alpha/releases",
		].join("\n");

		expect(parseEntries(content).map((entry) => entry.name)).toEqual(["Zeta", "Alpha"]);
	});

	it("uses the first release URL of a section", () => {
		const content = [
			"[Tool]",
			"primary=https://api.github.com/repos/first/tool/releases",
			"mirror=https://api.github.com/repos/second/tool/releases",
		].join("\n");

		const [entry] = parseEntries(content);

		expect(entry?.owner).toBe("first");
	});

	it("finds URLs embedded in other text", () => {
		const content = "[Tool]\nsource = fetch https://api.github.com/repos/foo/bar/releases?per_page=5 then unzip\n";

		const [entry] = parseEntries(content);

		expect(entry?.sourceUrl).toBe("https://api.github.com/repos/foo/bar/releases?per_page=5");
	});

	it("skips sections whose URL has no releases path", () => {
		const content = "[Tool]\nurl=https://api.github.com/repos/foo/bar/tags\n";

		expect(parseEntries(content)).toEqual([]);
	});

	it("ignores text before the first section", () => {
		const content = "url=https://api.github.com/repos/foo/bar/releases\n[Empty]\nname=nothing\n";

		expect(parseEntries(content)).toEqual([]);
	});

	it("accepts indented headers and CRLF line endings", () => {
		const content = "  [Spaced]  \r\nurl=https://api.github.com/repos/foo/bar/releases\r\n";

		const [entry] = parseEntries(content);

		expect(entry?.name).toBe("Spaced");
		expect(entry?.sourceUrl).toBe("https://api.github.com/repos/foo/bar/releases");
	});

	it("keeps only the first of repeated sections", () => {
		const content = [
			"[Tool]",
			"url=https://api.github.com/repos/first/tool/releases",
			"[Tool]",
			"url=https://api.github.com/repos/second/tool/releases",
		].join("\n");

		const entries = parseEntries(content);

		expect(entries).toHaveLength(1);
		expect(entries[0]?.owner).toBe("first");
	});

	it("returns no entries for empty content", () => {
		expect(parseEntries("")).toEqual([]);
	});
});

describe("readEntries", () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "rm-reader-test-"));
	});

	afterEach(() => {
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	it("reads entries from a file", async () => {
		const filePath = path.join(tempDir, "apps.ini");
		fs.writeFileSync(filePath, "[App]\nurl=https://api.github.com/repos/foo/app/releases\n");

		const entries = await readEntries(filePath);

		expect(entries).toEqual([
			{ name: "App", owner: "foo", repo: "app", sourceUrl: "https://api.github.com/repos/foo/app/releases" },
		]);
	});

	it("throws ConfigFileNotFoundError for a missing file", async () => {
		const filePath = path.join(tempDir, "missing.ini");

		await expect(readEntries(filePath)).rejects.toBeInstanceOf(ConfigFileNotFoundError);
	});

	it("treats a category folder that is a file as a missing input", async () => {
		fs.writeFileSync(path.join(tempDir, "sysmodules"), "not a directory");

		await expect(readEntries(path.join(tempDir, "sysmodules", "sysmodules.ini"))).rejects.toBeInstanceOf(
			ConfigFileNotFoundError,
		);
	});
});
