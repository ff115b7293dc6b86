import { isIP } from "node:net";

export type UrlHost =
	| { kind: "domain"; name: string }
	| { kind: "ip"; address: string }
	| { kind: "none" };

export interface ParsedRemoteUrl {
	scheme: string;
	host: UrlHost;
	path: string;
}

function classifyHost(hostname: string): UrlHost {
	if (!hostname) return { kind: "none" };
	const bare = hostname.startsWith("[") && hostname.endsWith("]") ? hostname.slice(1, -1) : hostname;
	if (isIP(bare) !== 0) return { kind: "ip", address: bare };
	return { kind: "domain", name: hostname };
}

/**
 * Parses an absolute URL into scheme, host and path.
 * Throws the `URL` constructor's TypeError when the input is not an absolute URL.
 */
export function parseRemoteUrl(input: string): ParsedRemoteUrl {
	const url = new URL(input);
	return {
		scheme: url.protocol.replace(/:$/, ""),
		host: classifyHost(url.hostname),
		path: url.pathname,
	};
}

export function pathSegments(path: string): string[] {
	return path.split("/").filter(Boolean);
}
