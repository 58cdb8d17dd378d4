import { readFile } from "node:fs/promises";
import path from "node:path";
import { type Static, Type } from "@sinclair/typebox";
import { assertSchema } from "./config.js";
import { ASSETS_DIR } from "./paths.js";

export const ENGINES = ["Custom", "Unity", "Unreal", "Godot"] as const;

export const KNOWN_PLATFORMS = [
	"Windows",
	"MacOS",
	"Linux",
	"Android",
	"iOS",
	"PlayStation",
	"Xbox",
	"Nintendo",
	"Web",
] as const;

export const DEFAULT_PLATFORMS = ["Windows", "MacOS", "Linux"];

export const PHASES = {
	preProduction: "Pre-Production",
	production: "Production",
	postProduction: "Post-Production",
} as const;

export const SCAFFOLD_ASSETS_DIR = path.join(ASSETS_DIR, "scaffold");

export const EngineSchema = Type.Union(
	ENGINES.map((engine) => Type.Literal(engine)),
);

export type Engine = (typeof ENGINES)[number];

const LayoutEntrySchema = Type.Object({
	path: Type.String({ minLength: 1 }),
	description: Type.String(),
});

export type LayoutEntry = Static<typeof LayoutEntrySchema>;

export const ProjectLayoutSchema = Type.Object({
	directories: Type.Array(LayoutEntrySchema),
	/** Group descriptions; `{platforms}` expands to the chosen platform list. */
	topLevel: Type.Array(LayoutEntrySchema),
	engines: Type.Record(Type.String(), Type.Array(LayoutEntrySchema)),
});

export type ProjectLayout = Static<typeof ProjectLayoutSchema>;

export const ScaffoldOptionsSchema = Type.Object({
	gameName: Type.String({ minLength: 1 }),
	rootDir: Type.String({ minLength: 1 }),
	engine: EngineSchema,
	platforms: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
});

export type ScaffoldOptions = Static<typeof ScaffoldOptionsSchema>;

export function isEngine(value: string): value is Engine {
	return ENGINES.some((engine) => engine === value);
}

export function isKnownPlatform(value: string): boolean {
	return KNOWN_PLATFORMS.some((platform) => platform === value);
}

export const DEFAULT_LAYOUT_PATH = path.join(SCAFFOLD_ASSETS_DIR, "layout.json");

export async function loadProjectLayout(
	layoutPath = DEFAULT_LAYOUT_PATH,
): Promise<ProjectLayout> {
	const raw = await readFile(layoutPath, "utf-8");
	return assertSchema(
		ProjectLayoutSchema,
		JSON.parse(raw),
		`project layout ${layoutPath}`,
	);
}

export function engineEntries(
	layout: ProjectLayout,
	engine: Engine,
): LayoutEntry[] {
	return layout.engines[engine] ?? [];
}
