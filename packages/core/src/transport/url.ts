/**
 * URL Building
 */

import type { QueryParams } from "./transport.types";

/**
 * Strip trailing slashes from a base URL
 */
export function normalizeBaseUrl(baseUrl: string): string {
	return baseUrl.replace(/\/+$/, "");
}

/**
 * Join an endpoint onto a base URL with exactly one separating slash
 */
export function buildUrl(baseUrl: string, endpoint: string, query?: QueryParams): string {
	const url = `${normalizeBaseUrl(baseUrl)}/${endpoint.replace(/^\/+/, "")}`;
	if (!query) {
		return url;
	}
	const search = new URLSearchParams();
	for (const [key, value] of Object.entries(query)) {
		search.append(key, String(value));
	}
	const encoded = search.toString();
	if (!encoded) {
		return url;
	}
	return `${url}${url.includes("?") ? "&" : "?"}${encoded}`;
}
