import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

export async function createTempDir(prefix: string): Promise<string> {
	return mkdtemp(path.join(tmpdir(), prefix));
}

/** Writes a file of exactly `size` bytes, creating parent directories. */
export async function writeSized(
	root: string,
	relativePath: string,
	size: number,
): Promise<void> {
	const filePath = path.join(root, relativePath);
	await mkdir(path.dirname(filePath), { recursive: true });
	await writeFile(filePath, "x".repeat(size), "utf-8");
}

/**
 * root/top.bin (100 B), A/a.bin (300 B), A/C/c.bin (600 B) and an empty B.
 * Totals: root 1000, A 900, C 600, B 0.
 */
export async function createSampleTree(root: string): Promise<void> {
	await writeSized(root, "top.bin", 100);
	await writeSized(root, "A/a.bin", 300);
	await writeSized(root, "A/C/c.bin", 600);
	await mkdir(path.join(root, "B"));
}
