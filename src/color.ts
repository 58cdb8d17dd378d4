import type { ColorRamp, Rgb } from "./types.js";

export const DEFAULT_COLOR_RAMP: ColorRamp = {
	low: [0, 128, 0],
	mid: [255, 255, 0],
	high: [200, 0, 0],
};

function clamp(value: number, min: number, max: number): number {
	return Math.max(min, Math.min(max, value));
}

function toChannel(value: number): number {
	return clamp(Math.trunc(value), 0, 255);
}

function interpolate(from: Rgb, to: Rgb, factor: number): Rgb {
	return [
		toChannel(from[0] + factor * (to[0] - from[0])),
		toChannel(from[1] + factor * (to[1] - from[1])),
		toChannel(from[2] + factor * (to[2] - from[2])),
	];
}

export function toHexColor(rgb: Rgb): string {
	return `#${rgb.map((channel) => toChannel(channel).toString(16).padStart(2, "0")).join("")}`;
}

/**
 * Maps a directory size onto the low → mid → high ramp, normalised against the
 * smallest non-empty and the largest size seen in the scan. When there is no
 * spread to normalise against, every size maps to the mid colour.
 */
export function colorFor(
	size: number,
	minObservedSize: number,
	maxObservedSize: number,
	ramp: ColorRamp = DEFAULT_COLOR_RAMP,
): string {
	if (!Number.isFinite(minObservedSize) || maxObservedSize <= minObservedSize) {
		return toHexColor(ramp.mid);
	}

	const t = clamp(
		(size - minObservedSize) / (maxObservedSize - minObservedSize),
		0,
		1,
	);
	if (t <= 0.5) {
		return toHexColor(interpolate(ramp.low, ramp.mid, t * 2));
	}
	return toHexColor(interpolate(ramp.mid, ramp.high, (t - 0.5) * 2));
}
