import { readFile } from "node:fs/promises";
import { type Static, type TSchema, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { DEFAULT_COLOR_RAMP } from "./color.js";

const Channel = Type.Integer({ minimum: 0, maximum: 255 });
const RgbSchema = Type.Tuple([Channel, Channel, Channel]);
const HexColor = Type.String({ pattern: "^#[0-9a-fA-F]{6}$" });
const Gap = Type.Number({ minimum: 1 });

const ColorRampSchema = Type.Object({
	low: RgbSchema,
	mid: RgbSchema,
	high: RgbSchema,
});

const ZoomSchema = Type.Object({
	initial: Type.Number({ exclusiveMinimum: 0 }),
	step: Type.Number({ exclusiveMinimum: 0 }),
	min: Type.Number({ exclusiveMinimum: 0 }),
});

export const VisualizerConfigSchema = Type.Object({
	title: Type.String(),
	nodeWidth: Gap,
	nodeHeight: Gap,
	nodeRadius: Type.Number({ minimum: 0 }),
	verticalGap: Gap,
	horizontalGap: Gap,
	baseOffset: Type.Number({ minimum: 0 }),
	marginX: Type.Number({ minimum: 0 }),
	marginY: Type.Number({ minimum: 0 }),
	colors: ColorRampSchema,
	connectorColor: HexColor,
	textColor: HexColor,
	backgroundColor: HexColor,
	highlightColor: HexColor,
	zoom: ZoomSchema,
});

export type VisualizerConfig = Static<typeof VisualizerConfigSchema>;

export const VisualizerConfigOverridesSchema = Type.Partial(
	Type.Object({
		...VisualizerConfigSchema.properties,
		colors: Type.Partial(ColorRampSchema),
		zoom: Type.Partial(ZoomSchema),
	}),
	{ additionalProperties: false },
);

export type VisualizerConfigOverrides = Static<
	typeof VisualizerConfigOverridesSchema
>;

export const DEFAULT_VISUALIZER_CONFIG: VisualizerConfig = {
	title: "Interactive Directory Structure",
	nodeWidth: 220,
	nodeHeight: 40,
	nodeRadius: 10,
	verticalGap: 45,
	horizontalGap: 45,
	baseOffset: 45,
	marginX: 100,
	marginY: 150,
	colors: DEFAULT_COLOR_RAMP,
	connectorColor: "#AAAAAA",
	textColor: "#FFFFFF",
	backgroundColor: "#2A2A2A",
	highlightColor: "#FF4500",
	zoom: { initial: 0.4, step: 0.1, min: 0.1 },
};

export const DEFAULT_OUTPUT_FILE = "directory_structure.html";

export function mergeVisualizerConfig(
	base: VisualizerConfig,
	overrides: VisualizerConfigOverrides = {},
): VisualizerConfig {
	return {
		...base,
		...overrides,
		colors: { ...base.colors, ...overrides.colors },
		zoom: { ...base.zoom, ...overrides.zoom },
	};
}

/** Validates `value` against `schema`, naming the first failing JSON pointer. */
export function assertSchema<T extends TSchema>(
	schema: T,
	value: unknown,
	label: string,
): Static<T> {
	if (Value.Check(schema, value)) {
		return value;
	}
	const [first] = [...Value.Errors(schema, value)];
	const where = first?.path ? ` at ${first.path}` : "";
	const reason = first?.message ?? "does not match the expected shape";
	throw new Error(`Invalid ${label}${where}: ${reason}`);
}

export async function loadVisualizerConfig(
	configPath?: string,
): Promise<VisualizerConfig> {
	if (!configPath) return DEFAULT_VISUALIZER_CONFIG;

	const raw = await readFile(configPath, "utf-8");
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error) {
		throw new Error(`Invalid config ${configPath}: not valid JSON`, {
			cause: error,
		});
	}
	const overrides = assertSchema(
		VisualizerConfigOverridesSchema,
		parsed,
		`config ${configPath}`,
	);
	return mergeVisualizerConfig(DEFAULT_VISUALIZER_CONFIG, overrides);
}
