import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

/**
 * Creates an isolated workspace under the OS temp directory.
 */
export async function makeWorkspace(prefix: string): Promise<string> {
	const safe = prefix.replace(/[^a-zA-Z0-9_-]/g, "").toLowerCase();
	return mkdtemp(join(tmpdir(), `valuegraph-${safe}-`));
}

/** Removes the workspace together with any -wal/-shm files left beside the store. */
export async function cleanupWorkspace(dir: string): Promise<void> {
	await rm(dir, { recursive: true, force: true });
}

export function within(dir: string, ...paths: string[]): string {
	return join(dir, ...paths);
}
