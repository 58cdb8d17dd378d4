import { createHash } from "node:crypto";
import { colorFor, DEFAULT_COLOR_RAMP } from "./color.js";
import { displayName } from "./paths.js";
import { formatSize } from "./size-format.js";
import type {
	ColorRamp,
	DirectoryNode,
	DirectoryTree,
	NodeMap,
	NodeRecord,
	ScanResult,
} from "./types.js";

const ID_PREFIX = "node_";
const ID_LENGTH = 8;

export interface BuildTreeOptions {
	colors?: ColorRamp;
}

export function createNodeId(dirPath: string): string {
	const digest = createHash("md5").update(dirPath).digest("hex");
	return `${ID_PREFIX}${digest.slice(0, ID_LENGTH)}`;
}

export function buildDirectoryTree(
	scan: ScanResult,
	options: BuildTreeOptions = {},
): DirectoryTree {
	const ramp = options.colors ?? DEFAULT_COLOR_RAMP;
	const nodes: NodeMap = new Map();

	const visit = (dirPath: string, parentId: string | null): string => {
		const id = createNodeId(dirPath);
		const entry = scan.directories.get(dirPath);
		const size = entry?.size ?? 0;
		const node: DirectoryNode = {
			id,
			name: displayName(dirPath),
			path: dirPath,
			size,
			formattedSize: formatSize(size),
			color: colorFor(size, scan.minSize, scan.maxSize, ramp),
			children: [],
			parent: parentId,
		};
		nodes.set(id, node);

		for (const childPath of entry?.children ?? []) {
			node.children.push(visit(childPath, id));
		}
		return id;
	};

	const rootId = visit(scan.root, null);
	return { rootId, nodes, minSize: scan.minSize, maxSize: scan.maxSize };
}

export function serializeTree(tree: DirectoryTree): NodeRecord {
	const record: NodeRecord = {};
	for (const [id, node] of tree.nodes) {
		record[id] = { ...node, children: [...node.children] };
	}
	return record;
}
