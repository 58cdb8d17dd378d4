import { stat } from "node:fs/promises";
import { parseArgs } from "node:util";
import { DEFAULT_OUTPUT_FILE, loadVisualizerConfig } from "./config.js";
import { describeError, isSkippableFsError } from "./fs-errors.js";
import { createConsoleNotifier, type NotifierOutput } from "./notify.js";
import { resolveUserPath } from "./paths.js";
import { generateVisualization } from "./visualizer.js";

export interface VisualizeCliContext {
	/** Default scan target, and the base for relative directory arguments. */
	toolDir: string;
	output?: NotifierOutput;
}

const USAGE = `Usage: dirviz [directory] [options]

Generate an interactive HTML visualization of a directory structure with collapsible nodes.

Arguments:
  directory              Directory to visualize (defaults to the tool's directory)

Options:
  -o, --output <file>    Output HTML file path (default: ${DEFAULT_OUTPUT_FILE})
      --config <file>    JSON file overriding layout and color settings
      --exclude <glob>   Gitignore-style pattern to leave out (repeatable)
      --gitignore        Also leave out paths matched by the root .gitignore
  -q, --quiet            Suppress progress messages
  -h, --help             Show this help`;

async function isDirectory(target: string): Promise<boolean> {
	try {
		return (await stat(target)).isDirectory();
	} catch (error) {
		if (isSkippableFsError(error)) return false;
		throw error;
	}
}

export async function runVisualizeCli(
	argv: string[],
	context: VisualizeCliContext,
): Promise<number> {
	let parsed: ReturnType<typeof parseCliArgs>;
	try {
		parsed = parseCliArgs(argv);
	} catch (error) {
		const notifier = createConsoleNotifier({ output: context.output });
		notifier.notify(`Error: ${describeError(error)}`, "error");
		notifier.notify(USAGE, "error");
		return 1;
	}

	const { values, positionals } = parsed;
	const notifier = createConsoleNotifier({
		quiet: values.quiet,
		output: context.output,
	});

	if (values.help) {
		notifier.notify(USAGE);
		return 0;
	}
	if (positionals.length > 1) {
		notifier.notify("Error: expected at most one directory argument.", "error");
		return 1;
	}

	const directory = resolveUserPath(
		positionals[0] ?? context.toolDir,
		context.toolDir,
	);
	if (!(await isDirectory(directory))) {
		notifier.notify(`Error: '${directory}' is not a valid directory.`, "error");
		return 1;
	}

	try {
		const config = await loadVisualizerConfig(
			values.config ? resolveUserPath(values.config, process.cwd()) : undefined,
		);
		const result = await generateVisualization({
			root: directory,
			output: values.output,
			config,
			exclude: values.exclude,
			useGitignore: values.gitignore,
			onProgress: (progress) => notifier.progress(progress),
		});
		notifier.notify(`Generated visualization at: ${result.outputPath}`);
		return 0;
	} catch (error) {
		notifier.notify(`Error: ${describeError(error)}`, "error");
		return 1;
	}
}

function parseCliArgs(argv: string[]) {
	return parseArgs({
		args: argv,
		allowPositionals: true,
		strict: true,
		options: {
			output: { type: "string", short: "o", default: DEFAULT_OUTPUT_FILE },
			config: { type: "string" },
			exclude: { type: "string", multiple: true },
			gitignore: { type: "boolean", default: false },
			quiet: { type: "boolean", short: "q", default: false },
			help: { type: "boolean", short: "h", default: false },
		},
	});
}
