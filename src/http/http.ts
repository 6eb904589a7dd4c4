/**
 * @title HTTP Utilities Module
 * @description HTTP utilities with timeout support.
 *
 * Each call issues exactly one request; failures are reported to the caller, never retried.
 *
 * @module http
 */

import { NetworkError } from "../errors.js";
import { proxyFetch } from "../proxy/index.js";

/**
 * Options for HTTP requests.
 */
export interface HttpOptions {
	/** Request timeout in milliseconds (default: 10000). */
	timeout?: number;
	/** Custom headers to include. */
	headers?: Record<string, string>;
}

export const DEFAULT_TIMEOUT = 10000;

/** Client identification sent with every request. */
export const USER_AGENT = "release-manifest";

function timeoutError(timeout: number, cause?: unknown): NetworkError {
	return new NetworkError(`Request timed out after ${timeout}ms`, { cause });
}

/**
 * Fetch with timeout support.
 *
 * The timeout covers the request and the reading of the body by `consume`.
 *
 * @param url - URL to fetch
 * @param options - Fetch options
 * @param timeout - Timeout in milliseconds
 * @param consume - Reads the value out of the response
 * @returns Value read from the response
 */
async function fetchWithTimeout<T>(
	url: string,
	options: RequestInit,
	timeout: number,
	consume: (response: Response) => Promise<T>,
): Promise<T> {
	const controller = new AbortController();
	// Settles only on abort; bodies not bound to the signal would otherwise stall.
	const aborted = new Promise<never>((_resolve, reject) => {
		controller.signal.addEventListener("abort", () => reject(timeoutError(timeout)), { once: true });
	});
	const timeoutId = setTimeout(() => controller.abort(), timeout);

	try {
		const response = await Promise.race([
			proxyFetch(url, {
				...options,
				signal: controller.signal,
			}),
			aborted,
		]);
		return await Promise.race([consume(response), aborted]);
	} catch (error) {
		if (error instanceof Error && error.name === "AbortError") {
			throw timeoutError(timeout, error);
		}
		throw error;
	} finally {
		clearTimeout(timeoutId);
	}
}

/**
 * Issue a single GET request and process the response.
 *
 * @param url - URL to fetch
 * @param requestHeaders - Headers to send
 * @param processResponse - Callback to extract the desired value from the response
 * @param options - HTTP options
 * @returns Processed response value
 */
async function fetchOnce<T>(
	url: string,
	requestHeaders: Record<string, string>,
	processResponse: (response: Response) => Promise<T>,
	options: HttpOptions = {},
): Promise<T> {
	const { timeout = DEFAULT_TIMEOUT, headers = {} } = options;

	return fetchWithTimeout(
		url,
		{
			method: "GET",
			headers: {
				...requestHeaders,
				...headers,
			},
		},
		timeout,
		async (response) => {
			if (!response.ok) {
				throw new NetworkError(`HTTP ${response.status}: ${response.statusText}`, {
					statusCode: response.status,
					statusText: response.statusText,
				});
			}
			return processResponse(response);
		},
	);
}

/**
 * Fetch JSON with timeout support.
 *
 * The body is returned unvalidated; callers narrow it.
 *
 * @param url - URL to fetch
 * @param options - HTTP options
 * @returns Parsed JSON response
 */
export async function fetchJson(url: string, options: HttpOptions = {}): Promise<unknown> {
	return fetchOnce<unknown>(
		url,
		{ Accept: "application/json", "User-Agent": USER_AGENT },
		(response) => response.json(),
		options,
	);
}

