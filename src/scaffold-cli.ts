import { mkdir, stat } from "node:fs/promises";
import { createInterface } from "node:readline/promises";
import { parseArgs } from "node:util";
import { describeError, isSkippableFsError } from "./fs-errors.js";
import { createConsoleNotifier, type NotifierOutput } from "./notify.js";
import { resolveUserPath } from "./paths.js";
import { createGameProject } from "./scaffold.js";
import {
	DEFAULT_PLATFORMS,
	ENGINES,
	isEngine,
	isKnownPlatform,
	KNOWN_PLATFORMS,
} from "./scaffold-layout.js";

export interface Prompter {
	ask(question: string): Promise<string>;
	close(): void;
}

export interface ScaffoldCliContext {
	/** Fallback root directory when none is given. */
	toolDir: string;
	output?: NotifierOutput;
	prompter?: Prompter;
	now?: () => Date;
}

const TOOL = "game-scaffold";

const USAGE = `Usage: ${TOOL} [options]

Create a template directory structure for game development.

Options:
  --game-name <name>     Name of the game
  --root-dir <dir>       Directory the game folder is created in
  --engine <engine>      Game engine: ${ENGINES.join(", ")} (default: Custom)
  --platforms <list>     Comma-separated target platforms (available: ${KNOWN_PLATFORMS.join(", ")})
  --examples             Show usage examples and exit
  -h, --help             Show this help`;

export const EXAMPLES = `
Usage Examples:
${"=".repeat(80)}
1. Basic usage (interactive):
   ${TOOL}

2. Basic usage with command-line arguments:
   ${TOOL} --game-name "My Awesome Game" --root-dir ~/Projects

3. Specify game engine:
   ${TOOL} --game-name "My Unity Game" --engine Unity

4. Specify target platforms:
   ${TOOL} --game-name "Mobile Game" --platforms Windows,Android,iOS

5. Full example with all parameters:
   ${TOOL} --game-name "Space Adventure" --root-dir ~/Games --engine Unreal --platforms Windows,PlayStation,Xbox

6. Create a project and then use the cleanup script:
   ${TOOL} --game-name "My Game"
   python Scripts/Tools/cleanup_tmp.py --age 30
${"=".repeat(80)}

Directory Structure Overview:
${"=".repeat(80)}
The generated directory structure includes:

1. Production Pipeline Directories:
   - Pre-Production: Idea, Story, Characters, Storyboard, etc.
   - Production: Modeling, Animation, Texturing, Lighting, etc.
   - Post-Production: Compositing, Color Correction, Final Output, etc.

2. Development Structure:
   - Source code, assets, documentation, and other standard directories
   - Engine-specific directories based on the chosen game engine
   - Platform-specific build directories

3. Temporary Files:
   - Comprehensive tmp directory structure for all temporary assets
   - Includes specialized directories for media, renders, and workflow
   - Comes with cleanup script for managing temporary files
${"=".repeat(80)}

Note: If no root directory is specified, the game directory is created
in the same location as the tool itself.`;

export function createReadlinePrompter(): Prompter {
	const rl = createInterface({ input: process.stdin, output: process.stdout });
	return {
		ask: (question) => rl.question(question),
		close: () => rl.close(),
	};
}

export function parsePlatforms(value: string): string[] {
	return value
		.split(",")
		.map((platform) => platform.trim())
		.filter((platform) => platform.length > 0);
}

async function directoryExists(target: string): Promise<boolean> {
	try {
		return (await stat(target)).isDirectory();
	} catch (error) {
		if (isSkippableFsError(error)) return false;
		throw error;
	}
}

function parseCliArgs(argv: string[]) {
	return parseArgs({
		args: argv,
		strict: true,
		options: {
			"game-name": { type: "string" },
			"root-dir": { type: "string" },
			engine: { type: "string", default: "Custom" },
			platforms: { type: "string" },
			examples: { type: "boolean", default: false },
			help: { type: "boolean", short: "h", default: false },
		},
	});
}

export async function runScaffoldCli(
	argv: string[],
	context: ScaffoldCliContext,
): Promise<number> {
	const notifier = createConsoleNotifier({ output: context.output });

	let values: ReturnType<typeof parseCliArgs>["values"];
	try {
		values = parseCliArgs(argv).values;
	} catch (error) {
		notifier.notify(`Error: ${describeError(error)}`, "error");
		notifier.notify(USAGE, "error");
		return 1;
	}

	if (values.help) {
		notifier.notify(USAGE);
		return 0;
	}
	if (values.examples) {
		notifier.notify(EXAMPLES);
		return 0;
	}

	const engine = values.engine ?? "Custom";
	if (!isEngine(engine)) {
		notifier.notify(
			`Error: Unknown engine '${engine}'. Available engines: ${ENGINES.join(", ")}`,
			"error",
		);
		return 1;
	}

	let prompter = context.prompter;
	const ask = async (question: string): Promise<string> => {
		prompter ??= createReadlinePrompter();
		return (await prompter.ask(question)).trim();
	};

	try {
		const gameName =
			values["game-name"]?.trim() || (await ask("Enter the name of your game: "));

		let rootDirInput = values["root-dir"];
		if (!rootDirInput) {
			rootDirInput = await ask(
				"Enter the root directory for your game project (leave empty for the tool directory): ",
			);
		}
		const rootDir = resolveUserPath(rootDirInput || context.toolDir, process.cwd());

		let platformsInput = values.platforms;
		if (platformsInput === undefined) {
			platformsInput = await ask(
				`Enter target platforms (comma-separated) [default: ${DEFAULT_PLATFORMS.join(",")}]: `,
			);
		}
		let platforms = parsePlatforms(platformsInput);
		if (platforms.length === 0) {
			platforms = [...DEFAULT_PLATFORMS];
		}
		for (const platform of platforms) {
			if (!isKnownPlatform(platform)) {
				notifier.notify(
					`Warning: Unknown platform '${platform}'. Available platforms: ${KNOWN_PLATFORMS.join(", ")}`,
					"warning",
				);
			}
		}

		if (!gameName) {
			notifier.notify("Error: Game name cannot be empty.", "error");
			return 1;
		}

		if (!(await directoryExists(rootDir))) {
			const answer = await ask(
				`The directory ${rootDir} does not exist. Create it? (y/n): `,
			);
			if (answer.toLowerCase() !== "y") {
				notifier.notify("Operation cancelled.");
				return 0;
			}
			try {
				await mkdir(rootDir, { recursive: true });
			} catch (error) {
				notifier.notify(
					`Error creating directory: ${describeError(error)}`,
					"error",
				);
				return 1;
			}
		}

		try {
			const result = await createGameProject(
				{ gameName, rootDir, engine, platforms },
				{ notifier, now: context.now },
			);
			notifier.notify(
				`\nGame directory structure created successfully at: ${result.gameDir}`,
			);
			notifier.notify(`You can now start developing ${gameName}!`);
			notifier.notify(`- Engine: ${engine}`);
			notifier.notify(`- Target Platforms: ${platforms.join(", ")}`);
			return 0;
		} catch (error) {
			notifier.notify(
				`Error creating game directory structure: ${describeError(error)}`,
				"error",
			);
			return 1;
		}
	} finally {
		prompter?.close();
	}
}
