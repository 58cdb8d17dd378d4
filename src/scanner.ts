import type { Dirent } from "node:fs";
import { readdir, readFile, stat } from "node:fs/promises";
import path from "node:path";
import ignore, { type Ignore, type Options } from "ignore";
import { isSkippableFsError } from "./fs-errors.js";
import { toRelativePath } from "./paths.js";
import type {
	DirectoryEntry,
	ProgressListener,
	ScanResult,
} from "./types.js";

const PROGRESS_INTERVAL = 500;

export interface ScanOptions {
	/** Gitignore-style patterns, relative to the scanned root. */
	exclude?: string[];
	/** Also apply the patterns of the root's own `.gitignore`. */
	useGitignore?: boolean;
	onProgress?: ProgressListener;
}

interface IgnoreFactory {
	(opts?: Options): Ignore;
	isPathValid(pathname: string): boolean;
}

const ignoreFactory = ignore as unknown as IgnoreFactory;

function createIgnore(options?: Options): Ignore {
	return ignoreFactory(options);
}

function shouldIgnore(
	ignoreMatcher: Ignore,
	relativePath: string,
	isDir: boolean,
): boolean {
	// Names made only of dots (`...`) cannot be expressed as a pattern target.
	if (!relativePath || !ignoreFactory.isPathValid(relativePath)) return false;
	if (ignoreMatcher.ignores(relativePath)) return true;
	if (isDir && ignoreMatcher.ignores(`${relativePath}/`)) return true;
	return false;
}

export async function loadIgnoreMatcher(
	root: string,
	options: Pick<ScanOptions, "exclude" | "useGitignore"> = {},
): Promise<Ignore> {
	const matcher = createIgnore();
	matcher.add(options.exclude ?? []);
	if (!options.useGitignore) return matcher;
	try {
		const contents = await readFile(path.join(root, ".gitignore"), "utf-8");
		matcher.add(contents);
	} catch (error) {
		if (!isSkippableFsError(error)) {
			throw error;
		}
	}
	return matcher;
}

async function listEntries(dirPath: string): Promise<Dirent[] | null> {
	try {
		const entries = await readdir(dirPath, { withFileTypes: true });
		// UTF-8 byte order is code point order.
		return entries.sort((a, b) =>
			Buffer.compare(Buffer.from(a.name), Buffer.from(b.name)),
		);
	} catch (error) {
		if (isSkippableFsError(error)) return null;
		throw error;
	}
}

async function fileSize(filePath: string): Promise<number> {
	try {
		const fileStats = await stat(filePath);
		return fileStats.isFile() ? fileStats.size : 0;
	} catch (error) {
		if (isSkippableFsError(error)) return 0;
		throw error;
	}
}

interface ScanContext {
	root: string;
	ignoreMatcher: Ignore;
	directories: Map<string, DirectoryEntry>;
	minSize: number;
	maxSize: number;
	onProgress?: ProgressListener;
}

function record(context: ScanContext, entry: DirectoryEntry): void {
	context.directories.set(entry.path, entry);
	if (entry.size > 0) {
		context.minSize = Math.min(context.minSize, entry.size);
	}
	context.maxSize = Math.max(context.maxSize, entry.size);

	const count = context.directories.size;
	if (count % PROGRESS_INTERVAL === 0) {
		context.onProgress?.({
			stage: "scan",
			message: `Scanned ${count} directories...`,
			current: count,
		});
	}
}

/**
 * Post-order walk: children are fully sized before their parent, so a
 * directory's total is its own files plus the totals already computed below it.
 * Symbolic links to directories are not followed.
 */
async function walk(context: ScanContext, dirPath: string): Promise<number> {
	const entries = await listEntries(dirPath);
	if (!entries) {
		record(context, { path: dirPath, size: 0, children: [] });
		return 0;
	}

	let size = 0;
	const children: string[] = [];
	for (const entry of entries) {
		const absolutePath = path.join(dirPath, entry.name);
		const relative = toRelativePath(absolutePath, context.root) ?? entry.name;
		const isDir = entry.isDirectory();
		if (shouldIgnore(context.ignoreMatcher, relative, isDir)) {
			continue;
		}

		if (isDir) {
			children.push(absolutePath);
			size += await walk(context, absolutePath);
			continue;
		}

		size += await fileSize(absolutePath);
	}

	record(context, { path: dirPath, size, children });
	return size;
}

export async function scanDirectorySizes(
	root: string,
	options: ScanOptions = {},
): Promise<ScanResult> {
	const absoluteRoot = path.resolve(root);
	const context: ScanContext = {
		root: absoluteRoot,
		ignoreMatcher: await loadIgnoreMatcher(absoluteRoot, options),
		directories: new Map(),
		minSize: Number.POSITIVE_INFINITY,
		maxSize: 1,
		onProgress: options.onProgress,
	};

	context.onProgress?.({
		stage: "scan",
		message: `Scanning ${absoluteRoot}...`,
	});
	await walk(context, absoluteRoot);

	return {
		root: absoluteRoot,
		directories: context.directories,
		minSize: context.minSize,
		maxSize: context.maxSize,
		directoryCount: context.directories.size,
	};
}
