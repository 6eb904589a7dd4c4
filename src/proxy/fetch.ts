/**
 * @title Proxy-Aware Fetch Module
 * @description Proxy-aware fetch wrapper using undici.
 *
 * @module proxy
 */

import { fetch as undiciFetch, ProxyAgent, type Dispatcher } from "undici";
import { getProxyForUrl, type ProxyConfig } from "./config.js";

/**
 * Options for proxy-aware fetch.
 */
export interface ProxyFetchOptions extends RequestInit {
	/** Proxy configuration. If not provided, reads from environment. */
	proxyConfig?: ProxyConfig;
}

/** One agent per proxy URL for the lifetime of the process. */
const proxyAgents = new Map<string, ProxyAgent>();

function getProxyAgent(proxyUrl: string): ProxyAgent {
	let agent = proxyAgents.get(proxyUrl);

	if (!agent) {
		agent = new ProxyAgent(proxyUrl);
		proxyAgents.set(proxyUrl, agent);
	}

	return agent;
}

/**
 * Proxy-aware fetch function.
 *
 * Uses undici's fetch with a ProxyAgent when HTTP_PROXY/HTTPS_PROXY apply to
 * the URL, and the global fetch otherwise.
 *
 * @param url - URL to fetch
 * @param options - Fetch options with optional proxy configuration
 * @returns Response
 */
export async function proxyFetch(url: string | URL, options: ProxyFetchOptions = {}): Promise<Response> {
	const { proxyConfig, ...fetchOptions } = options;
	const urlString = url.toString();
	const proxyUrl = getProxyForUrl(urlString, proxyConfig);

	if (proxyUrl) {
		// undici's Response and Dispatcher types are separate declarations of the
		// same Fetch API shapes, so they have to be bridged here.
		return undiciFetch(urlString, {
			...fetchOptions,
			dispatcher: getProxyAgent(proxyUrl) as unknown as Dispatcher,
		}) as unknown as Response;
	}

	return fetch(urlString, fetchOptions);
}

/**
 * Close every proxy agent so the process can exit.
 */
export async function closeProxyAgents(): Promise<void> {
	const agents = [...proxyAgents.values()];
	proxyAgents.clear();
	await Promise.all(agents.map((agent) => agent.close()));
}
