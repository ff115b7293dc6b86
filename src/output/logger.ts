import { appendFileSync, existsSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import pc from "picocolors";
import type { OutputMode } from "../types/index.js";

const PREFIX = "[git-service]";

let logFilePath: string | null = null;
let outputMode: OutputMode = "default";

export function setOutputMode(mode: OutputMode): void {
	outputMode = mode;
}

export function initLogFile(path: string): void {
	const dir = dirname(path);
	if (!existsSync(dir)) {
		mkdirSync(dir, { recursive: true });
	}
	writeFileSync(path, `[${timestamp()}] Log started\n`);
	logFilePath = path;
}

export function closeLogFile(): void {
	logFilePath = null;
}

function timestamp(): string {
	return new Date().toLocaleTimeString("en-US", { hour12: false });
}

function writeToFile(level: string, message: string): void {
	if (logFilePath) {
		appendFileSync(logFilePath, `[${timestamp()}] [${level}] ${message}\n`);
	}
}

function emitJson(level: string, message: string): void {
	const event = { time: timestamp(), level, message };
	console.log(JSON.stringify(event));
}

export function log(message: string): void {
	writeToFile("info", message);
	if (outputMode === "json") {
		emitJson("info", message);
		return;
	}
	if (outputMode !== "quiet") {
		console.log(`${pc.cyan(PREFIX)} ${pc.dim(timestamp())} ${message}`);
	}
}

export function warn(message: string): void {
	writeToFile("warn", message);
	if (outputMode === "json") {
		emitJson("warn", message);
		return;
	}
	if (outputMode !== "quiet") {
		console.error(`${pc.yellow(PREFIX)} ${pc.dim(timestamp())} ${message}`);
	}
}

export function error(message: string): void {
	writeToFile("error", message);
	if (outputMode === "json") {
		emitJson("error", message);
		return;
	}
	console.error(`${pc.red(PREFIX)} ${pc.dim(timestamp())} ${message}`);
}

export function ok(message: string): void {
	writeToFile("ok", message);
	if (outputMode === "json") {
		emitJson("ok", message);
		return;
	}
	if (outputMode !== "quiet") {
		console.log(`${pc.green(PREFIX)} ${pc.dim(timestamp())} ${message}`);
	}
}
