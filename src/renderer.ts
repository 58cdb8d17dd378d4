import { readFile } from "node:fs/promises";
import path from "node:path";
import { toHexColor } from "./color.js";
import { DEFAULT_VISUALIZER_CONFIG, type VisualizerConfig } from "./config.js";
import { ASSETS_DIR } from "./paths.js";
import { formatSize } from "./size-format.js";
import { serializeTree } from "./tree.js";
import type { DirectoryTree } from "./types.js";

/**
 * Turns a finished tree into a standalone document. The tree is the whole
 * contract; a renderer never looks at the filesystem.
 */
export interface DocumentRenderer {
	readonly extension: string;
	render(tree: DirectoryTree): Promise<string>;
}

interface HtmlAssets {
	template: string;
	script: string;
}

const HTML_ESCAPES: Record<string, string> = {
	"&": "&amp;",
	"<": "&lt;",
	">": "&gt;",
	'"': "&quot;",
	"'": "&#39;",
};

export function escapeHtml(value: string): string {
	return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/** JSON that can sit inside a `<script>` element without closing it early. */
export function toScriptJson(value: unknown): string {
	return JSON.stringify(value)
		.replace(/</g, "\\u003c")
		.replace(/>/g, "\\u003e")
		.replace(/&/g, "\\u0026")
		.replace(/\u2028/g, "\\u2028")
		.replace(/\u2029/g, "\\u2029");
}

function fillTemplate(
	template: string,
	values: Record<string, string>,
): string {
	return template.replace(/\{\{([A-Z_]+)\}\}/g, (match, key: string) => {
		const value = values[key];
		if (value === undefined) {
			throw new Error(`Template placeholder ${match} has no value`);
		}
		return value;
	});
}

function legendMinimum(tree: DirectoryTree): string {
	return Number.isFinite(tree.minSize) ? formatSize(tree.minSize) : formatSize(0);
}

export class HtmlTreeRenderer implements DocumentRenderer {
	readonly extension = ".html";
	private assets: HtmlAssets | null = null;

	constructor(
		private readonly config: VisualizerConfig = DEFAULT_VISUALIZER_CONFIG,
		private readonly assetsDir: string = ASSETS_DIR,
	) {}

	async render(tree: DirectoryTree): Promise<string> {
		const assets = await this.loadAssets();
		const config = this.config;
		const rootName = tree.nodes.get(tree.rootId)?.name ?? "";

		const viewerConfig = {
			nodeWidth: config.nodeWidth,
			nodeHeight: config.nodeHeight,
			nodeRadius: config.nodeRadius,
			verticalGap: config.verticalGap,
			horizontalGap: config.horizontalGap,
			baseOffset: config.baseOffset,
			marginX: config.marginX,
			marginY: config.marginY,
			connectorColor: config.connectorColor,
			textColor: config.textColor,
			highlightColor: config.highlightColor,
			zoom: config.zoom,
		};

		return fillTemplate(assets.template, {
			TITLE: escapeHtml(rootName ? `${config.title}: ${rootName}` : config.title),
			LEGEND_LOW: toHexColor(config.colors.low),
			LEGEND_MID: toHexColor(config.colors.mid),
			LEGEND_HIGH: toHexColor(config.colors.high),
			LEGEND_MIN: escapeHtml(legendMinimum(tree)),
			LEGEND_MAX: escapeHtml(formatSize(tree.maxSize)),
			BACKGROUND: escapeHtml(config.backgroundColor),
			VIEWER_CONFIG: toScriptJson(viewerConfig),
			TREE_DATA: toScriptJson(serializeTree(tree)),
			VIEWER_SCRIPT: assets.script,
		});
	}

	private async loadAssets(): Promise<HtmlAssets> {
		if (!this.assets) {
			const [template, script] = await Promise.all([
				readFile(path.join(this.assetsDir, "template.html"), "utf-8"),
				readFile(path.join(this.assetsDir, "viewer.js"), "utf-8"),
			]);
			this.assets = { template, script };
		}
		return this.assets;
	}
}
