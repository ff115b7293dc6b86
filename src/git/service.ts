import { DetectError } from "../errors.js";
import type { GitService, ServiceKind } from "../types/index.js";
import { parseRemoteUrl, pathSegments, type ParsedRemoteUrl } from "./url.js";

export const SERVICE_LABELS: Record<ServiceKind, string> = {
	github: "GitHub",
	"github-enterprise": "GitHub Enterprise",
	gitlab: "GitLab",
	bitbucket: "Bitbucket",
};

// Checked before HOST_PREFIXES: github.com is GitHub, github.example.com is Enterprise.
const EXACT_HOSTS = new Map<string, ServiceKind>([
	["github.com", "github"],
	["gitlab.com", "gitlab"],
	["bitbucket.org", "bitbucket"],
]);

const HOST_PREFIXES: [string, ServiceKind][] = [
	["github.", "github-enterprise"],
	["gitlab.", "gitlab"],
];

export function detectServiceKind(host: string): ServiceKind | undefined {
	const exact = EXACT_HOSTS.get(host);
	if (exact) return exact;
	return HOST_PREFIXES.find(([prefix]) => host.startsWith(prefix))?.[1];
}

function stripGitSuffix(url: string): string {
	return url.endsWith(".git") ? url.slice(0, -".git".length) : url;
}

function parseOrFail(remoteUrl: string, stripped: string): ParsedRemoteUrl {
	try {
		return parseRemoteUrl(stripped);
	} catch (err) {
		throw new DetectError({
			kind: "broken-url",
			url: remoteUrl,
			reason: err instanceof Error ? err.message : String(err),
		});
	}
}

/**
 * Classifies a remote URL into a hosting service.
 *
 * The URL must be absolute; SCP-style remotes are expanded by `remoteUrl` before they
 * get here. A trailing `.git` is dropped, then the host picks the service and the first
 * two path segments become user and repo.
 */
export function classify(remoteUrl: string, branch?: string): GitService {
	const parsed = parseOrFail(remoteUrl, stripGitSuffix(remoteUrl));

	if (parsed.host.kind === "none") {
		throw new DetectError({ kind: "broken-url", url: remoteUrl, reason: "No host in URL" });
	}
	if (parsed.host.kind === "ip") {
		throw new DetectError({
			kind: "cannot-detect",
			reason: `Domain name must be contained in URL ${remoteUrl}`,
		});
	}

	const [user, repo] = pathSegments(parsed.path);
	if (!user || !repo) {
		throw new DetectError({
			kind: "cannot-detect",
			reason: `Path of URL ${remoteUrl} does not represent user/repo`,
		});
	}

	const kind = detectServiceKind(parsed.host.name);
	if (!kind) {
		throw new DetectError({
			kind: "cannot-detect",
			reason: `No service detected from URL ${remoteUrl}`,
		});
	}

	return { kind, user, repo, branch };
}

export function serviceUser(service: GitService): string {
	return service.user;
}

export function serviceRepo(service: GitService): string {
	return service.repo;
}

export function serviceBranch(service: GitService): string | undefined {
	return service.branch;
}
