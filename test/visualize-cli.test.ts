import assert from "node:assert/strict";
import { readFile, rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { test } from "node:test";
import { createBufferedOutput } from "../src/notify.js";
import { runVisualizeCli } from "../src/visualize-cli.js";
import { createSampleTree, createTempDir } from "./helpers.js";

test("visualize CLI resolves a relative directory against the tool directory", async () => {
	const toolDir = await createTempDir("dirscope-cli-");
	try {
		await createSampleTree(toolDir);
		const output = createBufferedOutput();
		const code = await runVisualizeCli(["A"], { toolDir, output });

		const expected = path.join(toolDir, "A", "directory_structure.html");
		assert.equal(code, 0);
		assert.deepEqual(output.stdout, [`Generated visualization at: ${expected}`]);
		assert.deepEqual(output.stderr, [
			`Scanning ${path.join(toolDir, "A")}...`,
			"Building tree for 2 directories...",
			"Rendering document...",
			`Writing ${expected}...`,
			"Visualization ready.",
		]);
		assert.ok((await stat(expected)).isFile());
	} finally {
		await rm(toolDir, { recursive: true, force: true });
	}
});

test("visualize CLI scans the tool directory by default", async () => {
	const toolDir = await createTempDir("dirscope-cli-");
	try {
		const output = createBufferedOutput();
		const code = await runVisualizeCli(["-q", "-o", "map.svg"], {
			toolDir,
			output,
		});
		assert.equal(code, 0);
		assert.deepEqual(output.stderr, []);
		assert.deepEqual(output.stdout, [
			`Generated visualization at: ${path.join(toolDir, "map.html")}`,
		]);
	} finally {
		await rm(toolDir, { recursive: true, force: true });
	}
});

test("visualize CLI applies exclude patterns and a config file", async () => {
	const toolDir = await createTempDir("dirscope-cli-");
	try {
		await createSampleTree(toolDir);
		const configPath = path.join(toolDir, "viz.json");
		await writeFile(configPath, JSON.stringify({ title: "Sizes" }), "utf-8");
		const output = createBufferedOutput();
		const code = await runVisualizeCli(
			[toolDir, "--quiet", "--exclude", "C", "--config", configPath],
			{ toolDir, output },
		);
		assert.equal(code, 0);

		const html = await readFile(
			path.join(toolDir, "directory_structure.html"),
			"utf-8",
		);
		assert.match(html, new RegExp(`<title>Sizes: ${path.basename(toolDir)}</title>`));
		assert.ok(!html.includes('"name":"C"'));
		assert.ok(html.includes('"name":"A"'));
	} finally {
		await rm(toolDir, { recursive: true, force: true });
	}
});

test("visualize CLI rejects a missing directory", async () => {
	const toolDir = await createTempDir("dirscope-cli-");
	try {
		const output = createBufferedOutput();
		const code = await runVisualizeCli(["missing"], { toolDir, output });
		assert.equal(code, 1);
		assert.deepEqual(output.stderr, [
			`Error: '${path.join(toolDir, "missing")}' is not a valid directory.`,
		]);
		assert.deepEqual(output.stdout, []);
	} finally {
		await rm(toolDir, { recursive: true, force: true });
	}
});

test("visualize CLI reports usage errors", async () => {
	const toolDir = await createTempDir("dirscope-cli-");
	try {
		const unknown = createBufferedOutput();
		assert.equal(await runVisualizeCli(["--bogus"], { toolDir, output: unknown }), 1);
		assert.match(unknown.stderr[0] ?? "", /^Error: /);
		assert.match(unknown.stderr[1] ?? "", /^Usage: dirviz/);

		const extra = createBufferedOutput();
		assert.equal(await runVisualizeCli(["a", "b"], { toolDir, output: extra }), 1);
		assert.deepEqual(extra.stderr, [
			"Error: expected at most one directory argument.",
		]);

		const help = createBufferedOutput();
		assert.equal(await runVisualizeCli(["--help"], { toolDir, output: help }), 0);
		assert.match(help.stdout[0] ?? "", /^Usage: dirviz \[directory\] \[options\]/);
	} finally {
		await rm(toolDir, { recursive: true, force: true });
	}
});

test("visualize CLI reports an unreadable config", async () => {
	const toolDir = await createTempDir("dirscope-cli-");
	try {
		const configPath = path.join(toolDir, "broken.json");
		await writeFile(configPath, "{", "utf-8");
		const output = createBufferedOutput();
		const code = await runVisualizeCli(["--config", configPath], {
			toolDir,
			output,
		});
		assert.equal(code, 1);
		assert.deepEqual(output.stderr, [
			`Error: Invalid config ${configPath}: not valid JSON`,
		]);
	} finally {
		await rm(toolDir, { recursive: true, force: true });
	}
});
