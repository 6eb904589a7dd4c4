import { describe, it, expect, vi, beforeEach } from "vitest";
import { NetworkError, RateLimitError, RepositoryNotFoundError } from "../src/errors.js";
import { createLogger } from "../src/logging/index.js";
import type { Entry } from "../src/types/entry.js";

vi.mock("../src/http/index.js", async (importOriginal) => ({
	...(await importOriginal<typeof import("../src/http/index.js")>()),
	fetchJson: vi.fn(),
}));

import { fetchJson } from "../src/http/index.js";
import { fetchLatestRelease, fetchLatestTag, getLatestReleaseUrl } from "../src/github/releases.js";

const entry: Entry = {
	name: "MyModule",
	owner: "foo",
	repo: "bar",
	sourceUrl: "https://api.github.com/repos/foo/bar/releases?per_page=1",
};

function captureLogger(): { lines: string[]; logger: ReturnType<typeof createLogger> } {
	const lines: string[] = [];
	return { lines, logger: createLogger({ level: "debug", write: (line) => lines.push(line) }) };
}

describe("getLatestReleaseUrl", () => {
	it("asks for a single release", () => {
		expect(getLatestReleaseUrl("foo", "bar")).toBe("https://api.github.com/repos/foo/bar/releases?per_page=1");
	});
});

describe("fetchLatestRelease", () => {
	beforeEach(() => {
		vi.resetAllMocks();
	});

	it("returns the tag of the first release", async () => {
		vi.mocked(fetchJson).mockResolvedValueOnce([{ tag_name: "v2.0.0", name: "Version 2" }]);

		await expect(fetchLatestRelease("foo", "bar")).resolves.toBe("v2.0.0");
	});

	it("falls back to the release name", async () => {
		vi.mocked(fetchJson).mockResolvedValueOnce([{ name: "Nightly 2024-05-01" }]);

		await expect(fetchLatestRelease("foo", "bar")).resolves.toBe("Nightly 2024-05-01");
	});

	it("returns null when there are no releases", async () => {
		vi.mocked(fetchJson).mockResolvedValueOnce([]);

		await expect(fetchLatestRelease("foo", "bar")).resolves.toBeNull();
	});

	it("returns null for a body that is not a list", async () => {
		vi.mocked(fetchJson).mockResolvedValueOnce({ message: "unexpected" });

		await expect(fetchLatestRelease("foo", "bar")).resolves.toBeNull();
	});

	it("sends GitHub headers and the token", async () => {
		const mockedFetchJson = vi.mocked(fetchJson);
		mockedFetchJson.mockResolvedValueOnce([]);

		await fetchLatestRelease("foo", "bar", { auth: { githubToken: "test-token" }, timeout: 10000 });

		expect(mockedFetchJson).toHaveBeenCalledWith("https://api.github.com/repos/foo/bar/releases?per_page=1", {
			headers: {
				Accept: "application/vnd.github+json",
				"User-Agent": "release-manifest",
				Authorization: "Bearer test-token",
			},
			timeout: 10000,
		});
	});

	it("omits the authorization header without a token", async () => {
		const mockedFetchJson = vi.mocked(fetchJson);
		mockedFetchJson.mockResolvedValueOnce([]);

		await fetchLatestRelease("foo", "bar");

		const options = mockedFetchJson.mock.calls[0]?.[1];
		expect(options?.headers).not.toHaveProperty("Authorization");
	});

	it("maps HTTP 403 to RateLimitError", async () => {
		vi.mocked(fetchJson).mockRejectedValueOnce(new NetworkError("HTTP 403: Forbidden", { statusCode: 403 }));

		await expect(fetchLatestRelease("foo", "bar")).rejects.toBeInstanceOf(RateLimitError);
	});

	it("maps HTTP 404 to RepositoryNotFoundError", async () => {
		vi.mocked(fetchJson).mockRejectedValueOnce(new NetworkError("HTTP 404: Not Found", { statusCode: 404 }));

		await expect(fetchLatestRelease("foo", "bar")).rejects.toBeInstanceOf(RepositoryNotFoundError);
	});
});

describe("fetchLatestTag", () => {
	beforeEach(() => {
		vi.resetAllMocks();
	});

	it("returns the tag", async () => {
		vi.mocked(fetchJson).mockResolvedValueOnce([{ tag_name: "v2.0.0" }]);
		const { lines, logger } = captureLogger();

		const result = await fetchLatestTag(entry, { logger });

		expect(result).toEqual({ entry, tag: "v2.0.0" });
		expect(lines).toEqual(["    Latest release: v2.0.0"]);
	});

	it("reports a repository without releases", async () => {
		vi.mocked(fetchJson).mockResolvedValueOnce([]);
		const { lines, logger } = captureLogger();

		const result = await fetchLatestTag(entry, { logger });

		expect(result).toEqual({ entry, tag: null });
		expect(lines).toEqual(["    No published release found"]);
	});

	it("classifies the rate limit", async () => {
		vi.mocked(fetchJson).mockRejectedValueOnce(new NetworkError("HTTP 403: Forbidden", { statusCode: 403 }));
		const { lines, logger } = captureLogger();

		const result = await fetchLatestTag(entry, { logger });

		expect(result).toEqual({ entry, tag: null, errorKind: "rate-limited" });
		expect(lines).toEqual(["    Rate limit exceeded. Set GITHUB_TOKEN env var for higher limits."]);
	});

	it("classifies a missing repository", async () => {
		vi.mocked(fetchJson).mockRejectedValueOnce(new NetworkError("HTTP 404: Not Found", { statusCode: 404 }));
		const { lines, logger } = captureLogger();

		const result = await fetchLatestTag(entry, { logger });

		expect(result.errorKind).toBe("not-found");
		expect(lines).toEqual(["    Repository not found"]);
	});

	it("classifies other HTTP statuses", async () => {
		vi.mocked(fetchJson).mockRejectedValueOnce(
			new NetworkError("HTTP 500: Internal Server Error", { statusCode: 500, statusText: "Internal Server Error" }),
		);
		const { lines, logger } = captureLogger();

		const result = await fetchLatestTag(entry, { logger });

		expect(result.errorKind).toBe("http-status");
		expect(lines).toEqual(["    HTTP 500: Internal Server Error"]);
	});

	it("classifies transport failures", async () => {
		vi.mocked(fetchJson).mockRejectedValueOnce(new NetworkError("Request timed out after 10000ms"));
		const { lines, logger } = captureLogger();

		const result = await fetchLatestTag(entry, { logger });

		expect(result).toEqual({ entry, tag: null, errorKind: "transport" });
		expect(lines).toEqual(["    Error: Request timed out after 10000ms"]);
	});

	it("classifies invalid JSON as a transport failure", async () => {
		vi.mocked(fetchJson).mockRejectedValueOnce(new SyntaxError("Unexpected token <"));

		const result = await fetchLatestTag(entry);

		expect(result.errorKind).toBe("transport");
	});
});
