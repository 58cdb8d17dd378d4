const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB"] as const;
const UNIT_BASE = 1024;

export function formatSize(bytes: number): string {
	if (bytes <= 0) return "0 B";

	let scaled = bytes;
	let unitIndex = 0;
	while (scaled >= UNIT_BASE && unitIndex < SIZE_UNITS.length - 1) {
		scaled /= UNIT_BASE;
		unitIndex += 1;
	}

	if (unitIndex === 0) {
		return `${bytes} B`;
	}

	const rounded = Math.round(scaled * 100) / 100;
	const text = Number.isInteger(rounded) ? rounded.toFixed(1) : String(rounded);
	return `${text} ${SIZE_UNITS[unitIndex]}`;
}
