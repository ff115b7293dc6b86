import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	applyConfigValue,
	DEFAULT_CONFIG,
	findConfigDir,
	getConfigPath,
	loadConfig,
	mergeWithFlags,
	saveConfig,
} from "./config.js";

function writeConfig(dir: string, content: string): void {
	mkdirSync(join(dir, ".git-service"), { recursive: true });
	writeFileSync(join(dir, ".git-service", "config.yaml"), content);
}

describe("getConfigPath", () => {
	it("returns .git-service/config.yaml path relative to cwd", () => {
		expect(getConfigPath("/some/dir")).toBe("/some/dir/.git-service/config.yaml");
	});
});

describe("loadConfig", () => {
	let tmpDir: string;

	beforeEach(() => {
		tmpDir = mkdtempSync(join(tmpdir(), "git-service-test-"));
	});

	afterEach(() => {
		rmSync(tmpDir, { recursive: true, force: true });
	});

	it("returns default config when file does not exist", () => {
		expect(loadConfig(tmpDir)).toEqual(DEFAULT_CONFIG);
	});

	it("reads git command and output mode", () => {
		writeConfig(tmpDir, "git: /opt/git/bin/git\noutput: json\n");
		expect(loadConfig(tmpDir)).toEqual({ git: "/opt/git/bin/git", output: "json" });
	});

	it("falls back to defaults for ill-typed values", () => {
		writeConfig(tmpDir, "git: 42\noutput: loud\n");
		expect(loadConfig(tmpDir)).toEqual(DEFAULT_CONFIG);
	});

	it("treats an empty file as defaults", () => {
		writeConfig(tmpDir, "");
		expect(loadConfig(tmpDir)).toEqual(DEFAULT_CONFIG);
	});
});

describe("saveConfig", () => {
	let tmpDir: string;

	beforeEach(() => {
		tmpDir = mkdtempSync(join(tmpdir(), "git-service-test-"));
	});

	afterEach(() => {
		rmSync(tmpDir, { recursive: true, force: true });
	});

	it("writes YAML that loadConfig reads back", () => {
		saveConfig({ git: "git2", output: "quiet" }, tmpDir);

		expect(readFileSync(getConfigPath(tmpDir), "utf-8")).toBe("git: git2\noutput: quiet\n");
		expect(loadConfig(tmpDir)).toEqual({ git: "git2", output: "quiet" });
	});
});

describe("findConfigDir", () => {
	let tmpDir: string;

	beforeEach(() => {
		tmpDir = mkdtempSync(join(tmpdir(), "git-service-test-"));
	});

	afterEach(() => {
		rmSync(tmpDir, { recursive: true, force: true });
	});

	it("walks up to the directory holding the config", () => {
		writeConfig(tmpDir, "git: git\n");
		const nested = join(tmpDir, "a", "b");
		mkdirSync(nested, { recursive: true });

		expect(findConfigDir(nested)).toBe(tmpDir);
	});
});

describe("applyConfigValue", () => {
	it("sets the git command", () => {
		expect(applyConfigValue(DEFAULT_CONFIG, "git", " /usr/bin/git ")).toEqual({
			git: "/usr/bin/git",
			output: "default",
		});
	});

	it("sets a known output mode", () => {
		expect(applyConfigValue(DEFAULT_CONFIG, "output", "json").output).toBe("json");
	});

	it("rejects unknown output modes", () => {
		expect(() => applyConfigValue(DEFAULT_CONFIG, "output", "loud")).toThrow(
			'output must be one of default, json, quiet (got "loud")',
		);
	});

	it("rejects an empty git command and unknown keys", () => {
		expect(() => applyConfigValue(DEFAULT_CONFIG, "git", "  ")).toThrow("git must not be empty");
		expect(() => applyConfigValue(DEFAULT_CONFIG, "color", "on")).toThrow(
			'Unknown config key "color"',
		);
	});
});

describe("mergeWithFlags", () => {
	it("lets flags override the file", () => {
		expect(mergeWithFlags(DEFAULT_CONFIG, { git: "/opt/git", quiet: true })).toEqual({
			git: "/opt/git",
			output: "quiet",
		});
	});

	it("prefers json over quiet", () => {
		expect(mergeWithFlags(DEFAULT_CONFIG, { json: true, quiet: true }).output).toBe("json");
	});

	it("keeps the file values without flags", () => {
		const config = { git: "git2", output: "quiet" as const };
		expect(mergeWithFlags(config, {})).toEqual(config);
	});
});
