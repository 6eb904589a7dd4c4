/**
 * @title Proxy Configuration Module
 * @description Proxy configuration from environment variables.
 *
 * Requests to the GitHub API go through HTTPS_PROXY (or HTTP_PROXY) unless
 * the host is listed in NO_PROXY. Uppercase variables take precedence over
 * lowercase ones.
 *
 * @module proxy
 *
 * @envvar HTTP_PROXY - Proxy URL for HTTP requests (also used for HTTPS when HTTPS_PROXY is unset).
 * @envvar HTTPS_PROXY - Proxy URL for HTTPS requests.
 * @envvar NO_PROXY - Comma or space-separated list of hosts to bypass the proxy.
 *
 * @note CIDR notation (e.g., 192.168.1.0/24) is not supported.
 */

/**
 * Proxy configuration.
 */
export interface ProxyConfig {
	httpProxy?: string;
	httpsProxy?: string;
	/** Hosts/patterns that bypass the proxy. */
	noProxy: string[];
}

function readEnv(name: string): string | undefined {
	return process.env[name.toUpperCase()] || process.env[name.toLowerCase()] || undefined;
}

/**
 * Read proxy configuration from environment variables.
 */
export function getProxyConfig(): ProxyConfig {
	const noProxy = readEnv("NO_PROXY") ?? "";

	return {
		httpProxy: readEnv("HTTP_PROXY"),
		httpsProxy: readEnv("HTTPS_PROXY"),
		noProxy: noProxy
			.split(/[,\s]+/)
			.map((pattern) => pattern.trim().toLowerCase())
			.filter((pattern) => pattern.length > 0),
	};
}

/**
 * Check if a hostname should bypass the proxy.
 *
 * "*" matches every host, ".example.com" matches the domain and its
 * subdomains, and "example.com" matches itself and its subdomains.
 *
 * @param hostname - Hostname to check
 * @param noProxy - NO_PROXY patterns
 * @returns True if the host should bypass the proxy
 */
export function shouldBypassProxy(hostname: string, noProxy: string[]): boolean {
	const host = hostname.toLowerCase();

	return noProxy.some((pattern) => {
		if (pattern === "*") {
			return true;
		}
		const domain = pattern.startsWith(".") ? pattern.slice(1) : pattern;
		return host === domain || host.endsWith(`.${domain}`);
	});
}

/**
 * Get the proxy URL to use for a request URL.
 *
 * @param url - Request URL
 * @param config - Proxy configuration (read from the environment if omitted)
 * @returns Proxy URL or undefined if the request goes direct
 */
export function getProxyForUrl(url: string, config: ProxyConfig = getProxyConfig()): string | undefined {
	let parsedUrl: URL;
	try {
		parsedUrl = new URL(url);
	} catch {
		return undefined;
	}

	if (shouldBypassProxy(parsedUrl.hostname, config.noProxy)) {
		return undefined;
	}

	switch (parsedUrl.protocol) {
		case "https:":
			return config.httpsProxy ?? config.httpProxy;
		case "http:":
			return config.httpProxy;
		default:
			return undefined;
	}
}
