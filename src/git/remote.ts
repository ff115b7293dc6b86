import { statSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { isDetectError } from "../errors.js";
import type { GitContext, RemoteIdentity, TrackingRef } from "../types/index.js";
import { probeGit, runGit } from "./command.js";

export const DEFAULT_REMOTE = "origin";

function isFile(path: string): boolean {
	try {
		return statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
	} catch {
		// ENOTDIR, EACCES: left for git to report
		return false;
	}
}

/**
 * Absolute directory to run git in. A file resolves to its containing directory;
 * anything else is used as-is, relative paths against the process cwd.
 */
export function repositoryDir(location: string): string {
	const absolute = resolve(location);
	return isFile(absolute) ? dirname(absolute) : absolute;
}

/**
 * Rewrites SCP-style remotes so they parse as absolute URLs:
 * `git@host:user/repo.git` becomes `ssh://git@host:22/user/repo.git`.
 */
export function expandScpUrl(url: string): string {
	if (!url.startsWith("git@")) return url;
	const colon = url.indexOf(":");
	const withPort = colon === -1 ? url : `${url.slice(0, colon + 1)}22/${url.slice(colon + 1)}`;
	return `ssh://${withPort}`;
}

export async function remoteUrl(git: GitContext, name: string): Promise<string> {
	// `git remote get-url` only exists since git 2.7; reading the config key works everywhere
	const url = await runGit(git, ["config", "--get", `remote.${name}.url`]);
	return expandScpUrl(url);
}

/**
 * Reads the upstream of HEAD as `<remote>/<branch>`.
 * Resolves to undefined when HEAD has no upstream (detached, or none configured).
 */
export async function trackingBranch(git: GitContext): Promise<TrackingRef | undefined> {
	const upstream = await probeGit(git, ["rev-parse", "--abbrev-ref", "--symbolic", "@{u}"]);
	if (!upstream) return undefined;

	const slash = upstream.indexOf("/");
	const remote = slash === -1 ? upstream : upstream.slice(0, slash);
	if (!remote) return undefined;

	const branch = slash === -1 ? undefined : upstream.slice(slash + 1) || undefined;
	return { remote, branch };
}

export async function currentBranch(git: GitContext): Promise<string | undefined> {
	const name = await probeGit(git, ["symbolic-ref", "--quiet", "--short", "HEAD"]);
	return name || undefined;
}

async function trackedRemote(git: GitContext, tracking: TrackingRef): Promise<RemoteIdentity | undefined> {
	try {
		return { remoteUrl: await remoteUrl(git, tracking.remote), branch: tracking.branch };
	} catch (err) {
		// An upstream naming a remote with no URL falls back to origin
		if (tracking.remote !== DEFAULT_REMOTE && isDetectError(err, "command-exited-non-zero")) {
			return undefined;
		}
		throw err;
	}
}

/**
 * Resolves the remote URL and branch a working copy tracks.
 *
 * Tries, in order: the upstream of HEAD, then the `origin` remote. When neither
 * yields a branch, the branch HEAD points to is used; a detached HEAD leaves it unset.
 */
export async function resolveRemote(location: string, command = "git"): Promise<RemoteIdentity> {
	const git: GitContext = { command, dir: repositoryDir(location) };

	const tracking = await trackingBranch(git);
	const identity: RemoteIdentity = (tracking && (await trackedRemote(git, tracking))) ?? {
		remoteUrl: await remoteUrl(git, DEFAULT_REMOTE),
	};

	if (identity.branch) return identity;
	const branch = await currentBranch(git);
	return branch ? { ...identity, branch } : identity;
}
