const SKIPPABLE_CODES = new Set(["ENOENT", "EACCES", "EPERM", "ENOTDIR", "ELOOP"]);

export function errorCode(error: unknown): string | undefined {
	if (!(error instanceof Error) || !("code" in error)) return undefined;
	return typeof error.code === "string" ? error.code : undefined;
}

/** Permission, not-found and link-loop failures a scan absorbs instead of aborting. */
export function isSkippableFsError(error: unknown): boolean {
	const code = errorCode(error);
	return code !== undefined && SKIPPABLE_CODES.has(code);
}

export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
