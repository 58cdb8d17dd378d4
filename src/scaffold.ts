import { access, chmod, copyFile, mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { assertSchema } from "./config.js";
import { describeError, isSkippableFsError } from "./fs-errors.js";
import type { Notifier } from "./notify.js";
import { toPosix } from "./paths.js";
import {
	engineEntries,
	loadProjectLayout,
	type ProjectLayout,
	SCAFFOLD_ASSETS_DIR,
	type ScaffoldOptions,
	ScaffoldOptionsSchema,
} from "./scaffold-layout.js";
import {
	describeDirectory,
	expandPlatforms,
	platformBuildDescription,
	projectReadme,
	rootDescription,
	versionInfo,
} from "./scaffold-templates.js";

const DESCRIPTION_FILE = "description.txt";
const GAME_NAME_PLACEHOLDER = "[GameName]";
const CLEANUP_SCRIPT = "cleanup_tmp.py";

export interface ScaffoldHooks {
	now?: () => Date;
	notifier?: Notifier;
	layout?: ProjectLayout;
}

export interface ScaffoldResult {
	gameDir: string;
	/** Created directories, relative to `gameDir`, in creation order. */
	directories: string[];
	/** Written files, relative to `gameDir`, in creation order. */
	files: string[];
}

export function gameDirectoryName(gameName: string): string {
	return gameName.replaceAll(" ", "");
}

async function exists(target: string): Promise<boolean> {
	try {
		await access(target);
		return true;
	} catch (error) {
		if (isSkippableFsError(error)) return false;
		throw error;
	}
}

class ProjectWriter {
	readonly directories: string[] = [];
	readonly files: string[] = [];

	constructor(
		readonly gameDir: string,
		private readonly notifier?: Notifier,
	) {}

	resolve(relativePath: string): string {
		return path.join(this.gameDir, relativePath);
	}

	async ensureDir(relativePath: string): Promise<string> {
		const dirPath = this.resolve(relativePath);
		try {
			await mkdir(dirPath, { recursive: true });
		} catch (error) {
			throw new Error(
				`Failed to create directory ${dirPath}: ${describeError(error)}`,
				{ cause: error },
			);
		}
		this.directories.push(toPosix(relativePath) || ".");
		return dirPath;
	}

	async writeText(relativePath: string, content: string): Promise<string> {
		const filePath = this.resolve(relativePath);
		try {
			await mkdir(path.dirname(filePath), { recursive: true });
			await writeFile(filePath, content, "utf-8");
		} catch (error) {
			throw new Error(`Failed to write ${filePath}: ${describeError(error)}`, {
				cause: error,
			});
		}
		this.files.push(toPosix(relativePath));
		return filePath;
	}

	async copyAsset(assetName: string, relativePath: string): Promise<string> {
		const filePath = this.resolve(relativePath);
		try {
			await mkdir(path.dirname(filePath), { recursive: true });
			await copyFile(path.join(SCAFFOLD_ASSETS_DIR, assetName), filePath);
		} catch (error) {
			throw new Error(`Failed to write ${filePath}: ${describeError(error)}`, {
				cause: error,
			});
		}
		this.files.push(toPosix(relativePath));
		return filePath;
	}

	async describedDirectory(
		relativePath: string,
		description: string,
	): Promise<void> {
		const dirPath = await this.ensureDir(relativePath);
		await this.writeText(
			path.join(relativePath, DESCRIPTION_FILE),
			describeDirectory(relativePath, description),
		);
		this.notifier?.notify(`Created: ${dirPath} (with ${DESCRIPTION_FILE})`);
	}
}

async function createEngineStructure(
	writer: ProjectWriter,
	layout: ProjectLayout,
	options: ScaffoldOptions,
): Promise<void> {
	const gameDirName = path.basename(writer.gameDir);
	for (const entry of engineEntries(layout, options.engine)) {
		const relativePath = entry.path.replaceAll(
			GAME_NAME_PLACEHOLDER,
			gameDirName,
		);
		// Entries such as `project.godot` are engine config files, not folders.
		if (path.posix.basename(relativePath).includes(".")) {
			await writer.writeText(
				relativePath,
				describeDirectory(relativePath, entry.description),
			);
			continue;
		}
		await writer.describedDirectory(relativePath, entry.description);
	}
}

export async function createGameProject(
	options: ScaffoldOptions,
	hooks: ScaffoldHooks = {},
): Promise<ScaffoldResult> {
	const validated = assertSchema(
		ScaffoldOptionsSchema,
		options,
		"scaffold options",
	);
	const dirName = gameDirectoryName(validated.gameName);
	if (!dirName) {
		throw new Error("Game name must contain at least one non-space character");
	}
	const layout = hooks.layout ?? (await loadProjectLayout());
	const createdAt = (hooks.now ?? (() => new Date()))();
	const notifier = hooks.notifier;
	const gameDir = path.resolve(validated.rootDir, dirName);
	const writer = new ProjectWriter(gameDir, notifier);

	notifier?.notify(
		`Creating directory structure for ${validated.gameName} at ${gameDir}...`,
	);
	await writer.ensureDir("");
	await writer.writeText(DESCRIPTION_FILE, rootDescription(validated));

	const entries = [
		...layout.directories,
		...validated.platforms.map((platform) => ({
			path: `Build/${platform}`,
			description: platformBuildDescription(platform),
		})),
	];
	for (const entry of entries) {
		await writer.describedDirectory(entry.path, entry.description);
	}

	for (const entry of layout.topLevel) {
		const dirPath = writer.resolve(entry.path);
		if (!(await exists(dirPath))) continue;
		if (await exists(path.join(dirPath, DESCRIPTION_FILE))) continue;
		await writer.writeText(
			path.join(entry.path, DESCRIPTION_FILE),
			describeDirectory(
				entry.path,
				expandPlatforms(entry.description, validated.platforms),
			),
		);
	}

	if (validated.engine !== "Custom") {
		await createEngineStructure(writer, layout, validated);
		notifier?.notify(`Created engine-specific folders for ${validated.engine}`);
	}

	const readmePath = await writer.writeText(
		"README.md",
		projectReadme(validated, createdAt),
	);
	notifier?.notify(`Created README file: ${readmePath}`);

	const tmpReadmePath = await writer.copyAsset(
		"tmp-README.md",
		path.join("tmp", "README.md"),
	);
	notifier?.notify(`Created tmp directory README file: ${tmpReadmePath}`);

	const cleanupPath = await writer.copyAsset(
		CLEANUP_SCRIPT,
		path.join("Scripts", "Tools", CLEANUP_SCRIPT),
	);
	try {
		await chmod(cleanupPath, 0o755);
	} catch (error) {
		notifier?.notify(
			`Could not mark ${cleanupPath} executable: ${describeError(error)}`,
			"warning",
		);
	}
	notifier?.notify(`Created tmp directory cleanup script: ${cleanupPath}`);

	const versionPath = await writer.writeText(
		"version_info.json",
		versionInfo(validated, createdAt),
	);
	notifier?.notify(`Created version info file: ${versionPath}`);

	const gitignorePath = await writer.copyAsset("gitignore.txt", ".gitignore");
	notifier?.notify(`Created gitignore file: ${gitignorePath}`);

	return {
		gameDir,
		directories: writer.directories,
		files: writer.files,
	};
}
