import assert from "node:assert/strict";
import { chmod, mkdir, rm, symlink, writeFile } from "node:fs/promises";
import path from "node:path";
import { test } from "node:test";
import { scanDirectorySizes } from "../src/scanner.js";
import type { Progress } from "../src/types.js";
import { createSampleTree, createTempDir, writeSized } from "./helpers.js";

test("scanDirectorySizes aggregates sizes bottom-up", async () => {
	const root = await createTempDir("dirscope-scan-");
	try {
		await createSampleTree(root);
		const scan = await scanDirectorySizes(root);

		assert.equal(scan.root, root);
		assert.equal(scan.directoryCount, 4);
		assert.equal(scan.directories.get(root)?.size, 1000);
		assert.equal(scan.directories.get(path.join(root, "A"))?.size, 900);
		assert.equal(scan.directories.get(path.join(root, "A", "C"))?.size, 600);
		assert.equal(scan.directories.get(path.join(root, "B"))?.size, 0);
		assert.deepEqual(scan.directories.get(root)?.children, [
			path.join(root, "A"),
			path.join(root, "B"),
		]);
		assert.equal(scan.minSize, 600);
		assert.equal(scan.maxSize, 1000);
	} finally {
		await rm(root, { recursive: true, force: true });
	}
});

test("scanDirectorySizes leaves min unset when every directory is empty", async () => {
	const root = await createTempDir("dirscope-scan-");
	try {
		await mkdir(path.join(root, "empty"));
		const scan = await scanDirectorySizes(root);
		assert.equal(scan.minSize, Number.POSITIVE_INFINITY);
		assert.equal(scan.maxSize, 1);
		assert.equal(scan.directories.get(root)?.size, 0);
	} finally {
		await rm(root, { recursive: true, force: true });
	}
});

test("scanDirectorySizes applies exclude patterns", async () => {
	const root = await createTempDir("dirscope-scan-");
	try {
		await createSampleTree(root);
		const scan = await scanDirectorySizes(root, { exclude: ["A"] });
		assert.equal(scan.directoryCount, 2);
		assert.equal(scan.directories.has(path.join(root, "A")), false);
		assert.equal(scan.directories.get(root)?.size, 100);
		assert.deepEqual(scan.directories.get(root)?.children, [
			path.join(root, "B"),
		]);
	} finally {
		await rm(root, { recursive: true, force: true });
	}
});

test("scanDirectorySizes reads the root .gitignore on request", async () => {
	const root = await createTempDir("dirscope-scan-");
	try {
		await createSampleTree(root);
		await writeFile(path.join(root, ".gitignore"), "C/", "utf-8");

		const withIgnore = await scanDirectorySizes(root, { useGitignore: true });
		assert.equal(withIgnore.directories.has(path.join(root, "A", "C")), false);
		assert.equal(withIgnore.directories.get(path.join(root, "A"))?.size, 300);
		assert.equal(withIgnore.directories.get(root)?.size, 402);

		const without = await scanDirectorySizes(root);
		assert.equal(without.directories.get(root)?.size, 1002);
	} finally {
		await rm(root, { recursive: true, force: true });
	}
});

test("scanDirectorySizes does not follow directory symlinks", async () => {
	const root = await createTempDir("dirscope-scan-");
	const outside = await createTempDir("dirscope-outside-");
	try {
		await writeSized(root, "data/file.bin", 50);
		await writeSized(outside, "big.bin", 4096);
		await symlink(outside, path.join(root, "link"));

		const scan = await scanDirectorySizes(root);
		assert.equal(scan.directories.has(path.join(root, "link")), false);
		assert.deepEqual(scan.directories.get(root)?.children, [
			path.join(root, "data"),
		]);
		// A link to a directory stats as a directory and adds no bytes.
		assert.equal(scan.directories.get(root)?.size, 50);
	} finally {
		await rm(root, { recursive: true, force: true });
		await rm(outside, { recursive: true, force: true });
	}
});

test("scanDirectorySizes reports the scan start", async () => {
	const root = await createTempDir("dirscope-scan-");
	try {
		const events: Progress[] = [];
		await scanDirectorySizes(root, { onProgress: (event) => events.push(event) });
		assert.deepEqual(events, [
			{ stage: "scan", message: `Scanning ${root}...` },
		]);
	} finally {
		await rm(root, { recursive: true, force: true });
	}
});

test("scanDirectorySizes handles names made of dots", async () => {
	const root = await createTempDir("dirscope-scan-");
	try {
		await writeSized(root, ".../dots.bin", 7);
		await writeSized(root, "..foo/keep.bin", 3);
		await writeSized(root, "..foo/skip/big.bin", 50);
		await writeSized(root, "A/a.bin", 300);

		const scan = await scanDirectorySizes(root, { exclude: ["/..foo/skip"] });
		assert.equal(scan.directories.get(path.join(root, "..."))?.size, 7);
		assert.equal(scan.directories.get(path.join(root, "..foo"))?.size, 3);
		assert.equal(scan.directories.has(path.join(root, "..foo", "skip")), false);
		assert.equal(scan.directories.get(root)?.size, 310);
		assert.deepEqual(scan.directories.get(root)?.children, [
			path.join(root, "..."),
			path.join(root, "..foo"),
			path.join(root, "A"),
		]);
	} finally {
		await rm(root, { recursive: true, force: true });
	}
});

test("scanDirectorySizes orders children by code point", async () => {
	const root = await createTempDir("dirscope-scan-");
	try {
		const astral = "\u{1F600}";
		const wide = "\uFF5E";
		await mkdir(path.join(root, astral));
		await mkdir(path.join(root, wide));
		await mkdir(path.join(root, "Z"));

		const scan = await scanDirectorySizes(root);
		assert.deepEqual(scan.directories.get(root)?.children, [
			path.join(root, "Z"),
			path.join(root, wide),
			path.join(root, astral),
		]);
	} finally {
		await rm(root, { recursive: true, force: true });
	}
});

test("scanDirectorySizes counts files it cannot stat as zero", async () => {
	const root = await createTempDir("dirscope-scan-");
	try {
		await writeSized(root, "f.bin", 5);
		await symlink(path.join(root, "missing.bin"), path.join(root, "dangling"));

		const scan = await scanDirectorySizes(root);
		assert.equal(scan.directories.get(root)?.size, 5);
	} finally {
		await rm(root, { recursive: true, force: true });
	}
});

test("scanDirectorySizes records an unlistable root as empty", async () => {
	const dir = await createTempDir("dirscope-scan-");
	try {
		const notADirectory = path.join(dir, "file.bin");
		await writeFile(notADirectory, "abc", "utf-8");
		const missing = path.join(dir, "missing");

		for (const root of [notADirectory, missing]) {
			const scan = await scanDirectorySizes(root);
			assert.equal(scan.directoryCount, 1);
			assert.deepEqual(scan.directories.get(root), {
				path: root,
				size: 0,
				children: [],
			});
		}
	} finally {
		await rm(dir, { recursive: true, force: true });
	}
});

test(
	"scanDirectorySizes records an unreadable directory as empty",
	{ skip: process.getuid?.() === 0 ? "permissions do not apply to root" : false },
	async () => {
		const root = await createTempDir("dirscope-scan-");
		const locked = path.join(root, "locked");
		try {
			await writeSized(root, "locked/secret.bin", 10);
			await writeSized(root, "open/visible.bin", 4);
			await chmod(locked, 0o000);

			const scan = await scanDirectorySizes(root);
			assert.deepEqual(scan.directories.get(locked), {
				path: locked,
				size: 0,
				children: [],
			});
			assert.equal(scan.directories.get(root)?.size, 4);
		} finally {
			await chmod(locked, 0o755);
			await rm(root, { recursive: true, force: true });
		}
	},
);
