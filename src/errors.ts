export type DetectErrorDetail =
	| { kind: "command-execution-failed"; command: string; cause: string }
	| { kind: "command-exited-non-zero"; command: string; stderr: string; args: string[] }
	| { kind: "broken-url"; url: string; reason: string }
	| { kind: "cannot-detect"; reason: string };

export type DetectErrorKind = DetectErrorDetail["kind"];

function describe(detail: DetectErrorDetail): string {
	switch (detail.kind) {
		case "command-execution-failed":
			return `cannot run command '${detail.command}': ${detail.cause}`;
		case "command-exited-non-zero": {
			const invocation = [detail.command, ...detail.args.map((a) => `'${a}'`)].join(" ");
			const prefix = detail.stderr ? `${detail.stderr}: ` : "";
			return `${prefix}\`${invocation}\` exited with non-zero status`;
		}
		case "broken-url":
			return `Git URL ${detail.url} is broken: ${detail.reason}`;
		case "cannot-detect":
			return `Cannot detect service: ${detail.reason}`;
	}
}

/**
 * Every failure of remote resolution or service classification.
 * The message is self-contained: it names the offending URL or command line.
 */
export class DetectError extends Error {
	readonly detail: DetectErrorDetail;

	constructor(detail: DetectErrorDetail) {
		super(describe(detail));
		this.name = "DetectError";
		this.detail = detail;
	}

	get kind(): DetectErrorKind {
		return this.detail.kind;
	}
}

export function isDetectError(value: unknown, kind?: DetectErrorKind): value is DetectError {
	if (!(value instanceof DetectError)) return false;
	return kind === undefined || value.kind === kind;
}
