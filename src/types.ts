export type Rgb = [number, number, number];

export interface ColorRamp {
	low: Rgb;
	mid: Rgb;
	high: Rgb;
}

export interface DirectoryEntry {
	path: string;
	size: number;
	children: string[];
}

export interface ScanResult {
	root: string;
	directories: Map<string, DirectoryEntry>;
	minSize: number;
	maxSize: number;
	directoryCount: number;
}

export interface DirectoryNode {
	id: string;
	name: string;
	path: string;
	size: number;
	formattedSize: string;
	color: string;
	children: string[];
	parent: string | null;
}

export type NodeMap = Map<string, DirectoryNode>;

export type NodeRecord = Record<string, DirectoryNode>;

export interface DirectoryTree {
	rootId: string;
	nodes: NodeMap;
	minSize: number;
	maxSize: number;
}

export type ProgressStage = "scan" | "build" | "render" | "write" | "done";

export interface Progress {
	stage: ProgressStage;
	message: string;
	current?: number;
	total?: number;
}

export type ProgressListener = (progress: Progress) => void;
