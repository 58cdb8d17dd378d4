import { type Static, Type } from "@sinclair/typebox";
import { assertSchema } from "./config.js";
import {
	EngineSchema,
	PHASES,
	type ScaffoldOptions,
} from "./scaffold-layout.js";

export const VersionInfoSchema = Type.Object({
	name: Type.String(),
	version: Type.String(),
	status: Type.Union([
		Type.Literal("development"),
		Type.Literal("alpha"),
		Type.Literal("beta"),
		Type.Literal("release"),
	]),
	created: Type.String(),
	engine: EngineSchema,
	platforms: Type.Array(Type.String()),
});

export type VersionInfo = Static<typeof VersionInfoSchema>;

export const INITIAL_VERSION = "0.1.0";

function pad(value: number): string {
	return String(value).padStart(2, "0");
}

/** Local wall-clock time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
	return (
		`${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
		`${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
	);
}

export function describeDirectory(
	relativePath: string,
	description: string,
): string {
	return `# ${relativePath}\n\n${description}\n`;
}

export function expandPlatforms(
	description: string,
	platforms: string[],
): string {
	return description.replaceAll("{platforms}", platforms.join(", "));
}

export function platformBuildDescription(platform: string): string {
	return `Contains build outputs and packages for ${platform} platform.`;
}

export function rootDescription(options: ScaffoldOptions): string {
	return [
		`# ${options.gameName} Project Root`,
		"",
		"This is the main project directory for the game. It contains all source code, assets, and documentation.",
		"The directory structure follows game development best practices and is organized by function.",
		"Each subdirectory contains a description.txt file explaining its purpose.",
		`Game Engine: ${options.engine}`,
		`Target Platforms: ${options.platforms.join(", ")}`,
		"",
	].join("\n");
}

export function projectReadme(
	options: ScaffoldOptions,
	createdAt: Date,
): string {
	return [
		`# ${options.gameName}`,
		"",
		`Game development project created on ${formatTimestamp(createdAt)}`,
		"",
		"## Game Engine",
		"",
		options.engine,
		"",
		"## Target Platforms",
		"",
		options.platforms.join(", "),
		"",
		"## Directory Structure",
		"",
		"### Production Pipeline",
		"",
		`- **${PHASES.preProduction}**: Pre-production materials (concept, story, design, planning)`,
		`- **${PHASES.production}**: Production phase materials (asset creation, animation, implementation)`,
		`- **${PHASES.postProduction}**: Post-production materials (compositing, effects, final polishing)`,
		"",
		"### Development Structure",
		"",
		"- **Documentation**: Design documents, technical specifications, and API references",
		"- **Source**: Source code for the game and engine",
		"- **Assets**: Game assets including models, textures, animations, audio, etc.",
		"- **Build**: Build files for different platforms",
		"- **Tests**: Test code including unit tests and integration tests",
		"- **ThirdParty**: Third-party libraries and tools",
		"- **Scripts**: Automation and utility scripts",
		"- **Config**: Configuration files",
		"- **Versions**: Version management",
		"- **Releases**: Release builds for different distribution channels",
		"- **tmp**: Temporary files, builds, caches, and logs",
		"",
	].join("\n");
}

export function versionInfo(options: ScaffoldOptions, createdAt: Date): string {
	const info = assertSchema(
		VersionInfoSchema,
		{
			name: options.gameName,
			version: INITIAL_VERSION,
			status: "development",
			created: createdAt.toISOString(),
			engine: options.engine,
			platforms: options.platforms,
		},
		"version info",
	);
	return `${JSON.stringify(info, null, 2)}\n`;
}
