import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { z } from "zod";

export const CONFIG_FILE = "valuegraph.settings.json";

export const GraphConfigSchema = z.object({
	database: z
		.object({
			path: z.string().min(1).default("data/valuegraph.db"),
			journalMode: z.enum(["WAL", "DELETE", "TRUNCATE", "MEMORY"]).default("WAL"),
			busyTimeoutMs: z.number().int().nonnegative().default(5000),
		})
		.default({}),
	store: z
		.object({
			writePolicy: z.enum(["upsert", "insert"]).default("upsert"),
		})
		.default({}),
});

export type GraphConfig = z.infer<typeof GraphConfigSchema>;

/**
 * Reads `valuegraph.settings.json` from `cwd`. A missing file yields the
 * defaults; an unreadable or invalid one throws.
 */
export function loadConfig(cwd: string = process.cwd()): GraphConfig {
	const configPath = join(cwd, CONFIG_FILE);
	if (!existsSync(configPath)) {
		return GraphConfigSchema.parse({});
	}
	try {
		const data: unknown = JSON.parse(readFileSync(configPath, "utf-8"));
		return GraphConfigSchema.parse(data);
	} catch (e) {
		console.error(`❌ Invalid configuration file ${configPath}:`, e);
		throw e;
	}
}
