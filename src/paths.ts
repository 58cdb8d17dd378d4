import { homedir } from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

/** Templates and data files shipped beside `src/` and `dist/`. */
export const ASSETS_DIR = fileURLToPath(new URL("../assets/", import.meta.url));

const UNICODE_SPACES = /[\u00A0\u2000-\u200A\u202F\u205F\u3000]/g;

function normalizeUnicodeSpaces(value: string): string {
	return value.replace(UNICODE_SPACES, " ");
}

export function expandPath(filePath: string): string {
	const normalized = normalizeUnicodeSpaces(filePath);
	if (normalized === "~") {
		return homedir();
	}
	if (normalized.startsWith("~/")) {
		return homedir() + normalized.slice(1);
	}
	return normalized;
}

export function resolveUserPath(filePath: string, baseDir: string): string {
	const expanded = expandPath(filePath);
	if (path.isAbsolute(expanded)) {
		return path.resolve(expanded);
	}
	return path.resolve(baseDir, expanded);
}

export function toPosix(value: string): string {
	return value.split(path.sep).join("/");
}

export function isWithinRoot(targetPath: string, rootPath: string): boolean {
	const relative = path.relative(rootPath, targetPath);
	return (
		relative === "" ||
		(relative !== ".." &&
			!relative.startsWith(`..${path.sep}`) &&
			!path.isAbsolute(relative))
	);
}

export function toRelativePath(
	absolutePath: string,
	rootPath: string,
): string | null {
	if (!isWithinRoot(absolutePath, rootPath)) {
		return null;
	}
	return toPosix(path.relative(rootPath, absolutePath));
}

/** Base name of a directory, falling back to the path itself for filesystem roots. */
export function displayName(dirPath: string): string {
	return path.basename(dirPath) || dirPath;
}

/**
 * Relative outputs land inside the scanned root. An `.svg` suffix becomes the
 * renderer's extension: the document embeds the SVG canvas.
 */
export function resolveOutputPath(
	output: string,
	root: string,
	extension = ".html",
): string {
	const resolved = resolveUserPath(output, root);
	if (resolved.endsWith(".svg")) {
		return `${resolved.slice(0, -".svg".length)}${extension}`;
	}
	return resolved;
}
