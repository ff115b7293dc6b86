import { execa } from "execa";
import { DetectError } from "../errors.js";
import type { GitContext } from "../types/index.js";

function exitCodeOf(err: unknown): number | undefined {
	if (err instanceof Error && "exitCode" in err && typeof err.exitCode === "number") {
		return err.exitCode;
	}
	return undefined;
}

function stderrOf(err: unknown): string {
	if (err instanceof Error && "stderr" in err && typeof err.stderr === "string") {
		return err.stderr.trim();
	}
	return "";
}

function causeOf(err: unknown): string {
	// execa keeps the spawn error text (e.g. "spawn git ENOENT") apart from its own summary
	if (err instanceof Error && "originalMessage" in err && typeof err.originalMessage === "string") {
		return err.originalMessage;
	}
	return err instanceof Error ? err.message : String(err);
}

/**
 * Runs `<command> -C <dir> <args...>` and returns trimmed stdout.
 * Rejects with `command-exited-non-zero` when the process ran and failed,
 * and with `command-execution-failed` when it could not be started.
 */
export async function runGit(git: GitContext, args: string[]): Promise<string> {
	try {
		const { stdout } = await execa(git.command, ["-C", git.dir, ...args], { cwd: git.dir });
		return stdout.trim();
	} catch (err) {
		if (exitCodeOf(err) === undefined) {
			throw new DetectError({
				kind: "command-execution-failed",
				command: git.command,
				cause: causeOf(err),
			});
		}
		throw new DetectError({
			kind: "command-exited-non-zero",
			command: git.command,
			stderr: stderrOf(err),
			args,
		});
	}
}

/**
 * Like `runGit`, but a non-zero exit means "no answer" and resolves to undefined.
 * Failing to start the command still rejects.
 */
export async function probeGit(git: GitContext, args: string[]): Promise<string | undefined> {
	try {
		return await runGit(git, args);
	} catch (err) {
		if (err instanceof DetectError && err.kind === "command-exited-non-zero") return undefined;
		throw err;
	}
}
