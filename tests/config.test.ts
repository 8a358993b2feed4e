import { writeFile } from "node:fs/promises";
import { ZodError } from "zod";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CONFIG_FILE, loadConfig } from "@src/store/config";
import { cleanupWorkspace, makeWorkspace, within } from "./helpers/tempfs";

describe("loadConfig", () => {
	let workspace: string;

	beforeEach(async () => {
		workspace = await makeWorkspace("config");
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		await cleanupWorkspace(workspace);
	});

	it("falls back to defaults when no settings file exists", () => {
		expect(loadConfig(workspace)).toEqual({
			database: { path: "data/valuegraph.db", journalMode: "WAL", busyTimeoutMs: 5000 },
			store: { writePolicy: "upsert" },
		});
	});

	it("fills in what a partial settings file leaves out", async () => {
		await writeFile(
			within(workspace, CONFIG_FILE),
			JSON.stringify({ database: { busyTimeoutMs: 250 }, store: { writePolicy: "insert" } }),
		);

		expect(loadConfig(workspace)).toEqual({
			database: { path: "data/valuegraph.db", journalMode: "WAL", busyTimeoutMs: 250 },
			store: { writePolicy: "insert" },
		});
	});

	it("rejects unknown write policies", async () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => {});
		await writeFile(
			within(workspace, CONFIG_FILE),
			JSON.stringify({ store: { writePolicy: "append" } }),
		);

		expect(() => loadConfig(workspace)).toThrow(ZodError);
		expect(error).toHaveBeenCalled();
	});

	it("rejects a settings file that is not JSON", async () => {
		vi.spyOn(console, "error").mockImplementation(() => {});
		await writeFile(within(workspace, CONFIG_FILE), "{ database: ");

		expect(() => loadConfig(workspace)).toThrow(SyntaxError);
	});
});
