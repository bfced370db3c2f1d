/**
 * Truncate/pretty-print a URL with a maximum length
 */
export function logPrettyUrl(url: string, maxLen = 32): string {
	const prettyUrl = url
		.replace(/^https?:\/\//, "")
		.replace(/^www\./, "")
		.replace(/\/$/, "");
	if (prettyUrl.length > maxLen) {
		return prettyUrl.slice(0, maxLen) + "…";
	}
	return prettyUrl;
}

/**
 * Reduce a URL to host and path so that "https://www.x.ie/" and "http://x.ie" compare equal.
 */
export function urlIdentity(url: string): string {
	const trimmed = url.trim();
	try {
		const parsed = new URL(trimmed);
		const host = parsed.hostname.toLowerCase().replace(/^www\./, "");
		const pathname = parsed.pathname.replace(/\/+$/, "");
		return `${host}${pathname}${parsed.search}`;
	} catch {
		return trimmed.toLowerCase().replace(/\/+$/, "");
	}
}

export function formatElapsed(startedAt: number): string {
	return `${((Date.now() - startedAt) / 1000).toFixed(2)}s`;
}
