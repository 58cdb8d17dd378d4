import type { Progress } from "./types.js";

export type NoticeLevel = "info" | "warning" | "error";

export interface Notifier {
	notify(message: string, level?: NoticeLevel): void;
	progress(progress: Progress): void;
}

export interface NotifierOutput {
	out(line: string): void;
	err(line: string): void;
}

export interface ConsoleNotifierOptions {
	quiet?: boolean;
	output?: NotifierOutput;
}

const consoleOutput: NotifierOutput = {
	out: (line) => process.stdout.write(`${line}\n`),
	err: (line) => process.stderr.write(`${line}\n`),
};

export function formatProgressMessage(progress: Progress): string {
	const suffix =
		progress.current && progress.total
			? ` (${progress.current}/${progress.total})`
			: "";
	return `${progress.message}${suffix}`;
}

export function createConsoleNotifier(
	options: ConsoleNotifierOptions = {},
): Notifier {
	const output = options.output ?? consoleOutput;
	let lastStage: Progress["stage"] | null = null;

	return {
		notify: (message, level = "info") => {
			if (level === "info") {
				output.out(message);
				return;
			}
			output.err(message);
		},
		progress: (progress) => {
			if (options.quiet) return;
			// Repeated scan ticks stay on stderr so stdout only carries results.
			if (progress.stage !== lastStage || progress.stage === "scan") {
				output.err(formatProgressMessage(progress));
			}
			lastStage = progress.stage;
		},
	};
}

/** Collects every line in memory; used by tests and embedders that render output themselves. */
export function createBufferedOutput(): NotifierOutput & {
	stdout: string[];
	stderr: string[];
} {
	const stdout: string[] = [];
	const stderr: string[] = [];
	return {
		stdout,
		stderr,
		out: (line) => {
			stdout.push(line);
		},
		err: (line) => {
			stderr.push(line);
		},
	};
}
