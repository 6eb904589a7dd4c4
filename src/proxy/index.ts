/**
 * Proxy configuration and fetch utilities.
 */

export { getProxyConfig, getProxyForUrl, shouldBypassProxy, type ProxyConfig } from "./config.js";
export { proxyFetch, closeProxyAgents, type ProxyFetchOptions } from "./fetch.js";
