import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import {
	DEFAULT_OUTPUT_FILE,
	DEFAULT_VISUALIZER_CONFIG,
	type VisualizerConfig,
} from "./config.js";
import { resolveOutputPath } from "./paths.js";
import { type DocumentRenderer, HtmlTreeRenderer } from "./renderer.js";
import { scanDirectorySizes } from "./scanner.js";
import { buildDirectoryTree } from "./tree.js";
import type { DirectoryTree, ProgressListener } from "./types.js";

export interface VisualizeOptions {
	root: string;
	output?: string;
	config?: VisualizerConfig;
	renderer?: DocumentRenderer;
	exclude?: string[];
	useGitignore?: boolean;
	onProgress?: ProgressListener;
}

export interface VisualizationResult {
	outputPath: string;
	tree: DirectoryTree;
	directoryCount: number;
}

/**
 * Writes through a sibling temp file and renames it into place, so a failed
 * write never leaves a truncated document at `filePath`.
 */
export async function writeFileAtomic(
	filePath: string,
	content: string,
): Promise<void> {
	await mkdir(path.dirname(filePath), { recursive: true });
	const tempPath = `${filePath}.${process.pid}-${Date.now()}.tmp`;
	try {
		await writeFile(tempPath, content, "utf-8");
		await rename(tempPath, filePath);
	} catch (error) {
		await rm(tempPath, { force: true });
		throw error;
	}
}

export async function generateVisualization(
	options: VisualizeOptions,
): Promise<VisualizationResult> {
	const root = path.resolve(options.root);
	const config = options.config ?? DEFAULT_VISUALIZER_CONFIG;
	const renderer = options.renderer ?? new HtmlTreeRenderer(config);
	const report = options.onProgress;

	const scan = await scanDirectorySizes(root, {
		exclude: options.exclude,
		useGitignore: options.useGitignore,
		onProgress: report,
	});

	report?.({
		stage: "build",
		message: `Building tree for ${scan.directoryCount} directories...`,
	});
	const tree = buildDirectoryTree(scan, { colors: config.colors });

	report?.({ stage: "render", message: "Rendering document..." });
	const document = await renderer.render(tree);

	const outputPath = resolveOutputPath(
		options.output ?? DEFAULT_OUTPUT_FILE,
		root,
		renderer.extension,
	);
	report?.({ stage: "write", message: `Writing ${outputPath}...` });
	await writeFileAtomic(outputPath, document);
	report?.({ stage: "done", message: "Visualization ready." });

	return { outputPath, tree, directoryCount: scan.directoryCount };
}
