import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { resolve } from "node:path";
import { parse, stringify } from "yaml";
import type { GitServiceConfig, OutputMode } from "./types/index.js";

const CONFIG_DIR = ".git-service";
const CONFIG_FILE = "config.yaml";

const OUTPUT_MODES: readonly OutputMode[] = ["default", "json", "quiet"];

export const DEFAULT_CONFIG: GitServiceConfig = {
	git: "git",
	output: "default",
};

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isOutputMode(value: unknown): value is OutputMode {
	return OUTPUT_MODES.some((mode) => mode === value);
}

export function getConfigPath(cwd: string = process.cwd()): string {
	return resolve(cwd, CONFIG_DIR, CONFIG_FILE);
}

export function findConfigDir(startDir: string = process.cwd()): string | null {
	let dir = resolve(startDir);
	while (true) {
		if (existsSync(getConfigPath(dir))) return dir;
		const parent = resolve(dir, "..");
		if (parent === dir) return null; // filesystem root
		dir = parent;
	}
}

export function loadConfig(cwd: string = process.cwd()): GitServiceConfig {
	const configPath = getConfigPath(cwd);

	if (!existsSync(configPath)) {
		return { ...DEFAULT_CONFIG };
	}

	const parsed: unknown = parse(readFileSync(configPath, "utf-8"));
	if (!isRecord(parsed)) {
		return { ...DEFAULT_CONFIG };
	}

	const git = typeof parsed.git === "string" ? parsed.git.trim() : "";
	return {
		git: git || DEFAULT_CONFIG.git,
		output: isOutputMode(parsed.output) ? parsed.output : DEFAULT_CONFIG.output,
	};
}

export function saveConfig(config: GitServiceConfig, cwd: string = process.cwd()): void {
	const dir = resolve(cwd, CONFIG_DIR);

	if (!existsSync(dir)) {
		mkdirSync(dir, { recursive: true });
	}

	writeFileSync(getConfigPath(cwd), stringify({ git: config.git, output: config.output }));
}

/** Applies a `key=value` pair from `config --set`; throws on unknown keys or values. */
export function applyConfigValue(
	config: GitServiceConfig,
	key: string,
	value: string,
): GitServiceConfig {
	if (key === "git") {
		if (!value.trim()) throw new Error("git must not be empty");
		return { ...config, git: value.trim() };
	}
	if (key === "output") {
		if (!isOutputMode(value)) {
			throw new Error(`output must be one of ${OUTPUT_MODES.join(", ")} (got "${value}")`);
		}
		return { ...config, output: value };
	}
	throw new Error(`Unknown config key "${key}"`);
}

export function mergeWithFlags(
	config: GitServiceConfig,
	flags: { git?: string; json?: boolean; quiet?: boolean },
): GitServiceConfig {
	const merged = { ...config };

	if (flags.git) merged.git = flags.git;
	if (flags.json) merged.output = "json";
	else if (flags.quiet) merged.output = "quiet";

	return merged;
}
