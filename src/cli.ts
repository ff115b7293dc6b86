import { readFileSync } from "node:fs";
import { resolve as resolvePath } from "node:path";

import { defineCommand, runMain } from "citty";
import pc from "picocolors";
import {
	applyConfigValue,
	findConfigDir,
	getConfigPath,
	loadConfig,
	mergeWithFlags,
	saveConfig,
} from "./config.js";
import { resolveRemote } from "./git/remote.js";
import { classify, SERVICE_LABELS } from "./git/service.js";
import { closeLogFile, error, initLogFile, log, ok, setOutputMode, warn } from "./output/logger.js";
import type { GitService, OutputMode } from "./types/index.js";

function getVersion(): string {
	try {
		const pkgPath = resolvePath(new URL(".", import.meta.url).pathname, "../package.json");
		const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
		if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
			return pkg.version;
		}
		return "0.0.0";
	} catch {
		return "0.0.0";
	}
}

export function renderService(service: GitService, mode: OutputMode): string {
	if (mode === "json") return JSON.stringify(service);
	if (mode === "quiet") return `${service.user}/${service.repo}`;

	return [
		`  Service: ${pc.bold(SERVICE_LABELS[service.kind])}`,
		`  User:    ${pc.bold(service.user)}`,
		`  Repo:    ${pc.bold(service.repo)}`,
		`  Branch:  ${service.branch ? pc.bold(service.branch) : pc.dim("(none)")}`,
	].join("\n");
}

export function describeRemote(remoteUrl: string, branch: string | undefined): string {
	return branch ? `Remote ${remoteUrl} (branch ${branch})` : `Remote ${remoteUrl} (no branch)`;
}

const detect = defineCommand({
	meta: { name: "detect", description: "Detect the hosting service of a working copy" },
	args: {
		path: {
			type: "positional",
			required: false,
			default: ".",
			description: "File or directory inside the working copy",
		},
		git: { type: "string", description: "git command name or path" },
		json: { type: "boolean", description: "Output as JSON lines", default: false },
		quiet: { type: "boolean", description: "Print only user/repo", default: false },
		"log-file": { type: "string", description: "Also append log messages to this file" },
	},
	async run({ args }) {
		const config = mergeWithFlags(loadConfig(findConfigDir() ?? process.cwd()), {
			git: args.git,
			json: args.json,
			quiet: args.quiet,
		});

		setOutputMode(config.output);
		if (args["log-file"]) initLogFile(args["log-file"]);

		try {
			const { remoteUrl, branch } = await resolveRemote(args.path, config.git);
			log(describeRemote(remoteUrl, branch));
			if (!branch) warn("No upstream or current branch found; branch left unset");
			const service = classify(remoteUrl, branch);
			ok(`Detected ${SERVICE_LABELS[service.kind]} repository ${service.user}/${service.repo}`);
			console.log(renderService(service, config.output));
		} catch (err) {
			error(err instanceof Error ? err.message : String(err));
			closeLogFile();
			process.exit(1);
		}
		closeLogFile();
	},
});

const config = defineCommand({
	meta: { name: "config", description: "Manage configuration" },
	args: {
		show: { type: "boolean", description: "Show current config", default: false },
		set: { type: "string", description: "Set a config value (key=value)" },
	},
	async run({ args }) {
		if (args.set) {
			const eq = args.set.indexOf("=");
			const key = eq === -1 ? "" : args.set.slice(0, eq);
			const value = args.set.slice(eq + 1);
			if (!key) {
				console.error(pc.red("Usage: git-service config --set key=value"));
				process.exit(1);
			}
			const dir = findConfigDir() ?? process.cwd();
			try {
				saveConfig(applyConfigValue(loadConfig(dir), key, value), dir);
			} catch (err) {
				error(err instanceof Error ? err.message : String(err));
				process.exit(1);
			}
			log(`Set ${key} = ${value} in ${getConfigPath(dir)}`);
			return;
		}

		if (!args.show) {
			console.error(pc.yellow("Usage: git-service config --show | --set key=value"));
			return;
		}

		const cfg = loadConfig(findConfigDir() ?? process.cwd());
		console.log(pc.cyan("\nCurrent configuration:\n"));
		console.log(JSON.stringify(cfg, null, 2));
	},
});

export const main = defineCommand({
	meta: {
		name: "git-service",
		version: getVersion(),
		description: "Detect the Git hosting service, user, repo and branch of a working copy",
	},
	subCommands: { detect, config },
});

export function runCli(): void {
	runMain(main);
}
