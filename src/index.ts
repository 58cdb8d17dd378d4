export { colorFor, DEFAULT_COLOR_RAMP, toHexColor } from "./color.js";
export {
	DEFAULT_OUTPUT_FILE,
	DEFAULT_VISUALIZER_CONFIG,
	loadVisualizerConfig,
	mergeVisualizerConfig,
	type VisualizerConfig,
	type VisualizerConfigOverrides,
} from "./config.js";
export {
	createConsoleNotifier,
	type NoticeLevel,
	type Notifier,
} from "./notify.js";
export { resolveOutputPath } from "./paths.js";
export { type DocumentRenderer, HtmlTreeRenderer } from "./renderer.js";
export {
	createGameProject,
	type ScaffoldHooks,
	type ScaffoldResult,
} from "./scaffold.js";
export {
	ENGINES,
	type Engine,
	KNOWN_PLATFORMS,
	type ScaffoldOptions,
} from "./scaffold-layout.js";
export { type ScanOptions, scanDirectorySizes } from "./scanner.js";
export { formatSize } from "./size-format.js";
export { buildDirectoryTree, createNodeId, serializeTree } from "./tree.js";
export type {
	ColorRamp,
	DirectoryNode,
	DirectoryTree,
	Progress,
	Rgb,
	ScanResult,
} from "./types.js";
export {
	generateVisualization,
	type VisualizationResult,
	type VisualizeOptions,
	writeFileAtomic,
} from "./visualizer.js";
