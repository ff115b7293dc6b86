import { resolveRemote } from "./git/remote.js";
import { classify } from "./git/service.js";
import type { GitService } from "./types/index.js";

export const DEFAULT_GIT_COMMAND = "git";

export async function detect(path: string): Promise<GitService> {
	return detectWithCommand(path, DEFAULT_GIT_COMMAND);
}

/**
 * Detects the hosting service of the working copy at `path`, running `command`
 * in place of `git` (for installs outside PATH).
 */
export async function detectWithCommand(path: string, command: string): Promise<GitService> {
	const { remoteUrl, branch } = await resolveRemote(path, command);
	return classify(remoteUrl, branch);
}
