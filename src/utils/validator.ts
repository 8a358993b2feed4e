import type Database from "better-sqlite3";
import { toNumber } from "./sqlite";

export interface Baseline {
	values: number;
	links: number;
	timestamp: string;
}

export type IntegrityRule =
	| "row_count"
	| "malformed_value_id"
	| "malformed_endpoint"
	| "dangling_source"
	| "dangling_key"
	| "dangling_target";

export interface IntegrityWarning {
	rule: IntegrityRule;
	message: string;
	severity: "error" | "warning";
}

export interface IntegrityReport {
	passed: boolean;
	baseline: Baseline | null;
	results: Baseline;
	errors: IntegrityWarning[];
	warnings: IntegrityWarning[];
	summary: string;
}

const COUNT_MALFORMED_VALUE_IDS = `
    SELECT COUNT(*) AS count FROM \`values\` WHERE length(uuid) != 16
`;

const COUNT_MALFORMED_ENDPOINTS = `
    SELECT COUNT(*) AS count FROM links
    WHERE length(source_uuid) != 16
       OR (key_uuid IS NOT NULL AND length(key_uuid) != 16)
       OR length(target_uuid) != 16
`;

const COUNT_DANGLING = {
	dangling_source: `
        SELECT COUNT(*) AS count FROM links l
        WHERE NOT EXISTS (SELECT 1 FROM \`values\` v WHERE v.uuid = l.source_uuid)
    `,
	dangling_key: `
        SELECT COUNT(*) AS count FROM links l
        WHERE l.key_uuid IS NOT NULL
          AND NOT EXISTS (SELECT 1 FROM \`values\` v WHERE v.uuid = l.key_uuid)
    `,
	dangling_target: `
        SELECT COUNT(*) AS count FROM links l
        WHERE NOT EXISTS (SELECT 1 FROM \`values\` v WHERE v.uuid = l.target_uuid)
    `,
} as const;

const ENDPOINT_NAMES = {
	dangling_source: "sources",
	dangling_key: "keys",
	dangling_target: "targets",
} as const;

/**
 * Checks a generation 2 store. Dangling and malformed endpoints are warnings:
 * links may legitimately point at values that were never written. A row
 * count that moved since the baseline is an error.
 */
export class IntegrityValidator {
	private baseline: Baseline | null = null;
	private errors: IntegrityWarning[] = [];
	private warnings: IntegrityWarning[] = [];

	/**
	 * Capture current row counts as baseline
	 */
	captureBaseline(db: Database.Database): Baseline {
		this.baseline = countRows(db);
		return this.baseline;
	}

	validate(db: Database.Database, options: { expectUnchanged?: boolean } = {}): IntegrityReport {
		const results = countRows(db);

		this.errors = [];
		this.warnings = [];

		if (options.expectUnchanged && this.baseline) {
			if (results.values !== this.baseline.values) {
				this.addError(
					"row_count",
					`Expected ${this.baseline.values} values, found ${results.values}`,
				);
			}
			if (results.links !== this.baseline.links) {
				this.addError(
					"row_count",
					`Expected ${this.baseline.links} links, found ${results.links}`,
				);
			}
		}

		const malformedIds = count(db, COUNT_MALFORMED_VALUE_IDS);
		if (malformedIds > 0) {
			this.addWarning(
				"malformed_value_id",
				`Found ${malformedIds} values whose id is not 16 bytes`,
			);
		}

		const malformedEndpoints = count(db, COUNT_MALFORMED_ENDPOINTS);
		if (malformedEndpoints > 0) {
			this.addWarning(
				"malformed_endpoint",
				`Found ${malformedEndpoints} links with an endpoint that is not 16 bytes`,
			);
		}

		for (const rule of ["dangling_source", "dangling_key", "dangling_target"] as const) {
			const dangling = count(db, COUNT_DANGLING[rule]);
			if (dangling > 0) {
				this.addWarning(
					rule,
					`Found ${dangling} links whose ${ENDPOINT_NAMES[rule]} do not resolve to a value`,
				);
			}
		}

		const passed = this.errors.length === 0;
		return {
			passed,
			baseline: this.baseline,
			results,
			errors: this.errors,
			warnings: this.warnings,
			summary: this.buildSummary(results, passed),
		};
	}

	private addError(rule: IntegrityRule, message: string): void {
		this.errors.push({ rule, message, severity: "error" });
	}

	private addWarning(rule: IntegrityRule, message: string): void {
		this.warnings.push({ rule, message, severity: "warning" });
	}

	private buildSummary(results: Baseline, passed: boolean): string {
		const status = passed ? "✅ PASSED" : "❌ FAILED";
		return `${status} | ${results.values} values, ${results.links} links, ${this.warnings.length} warnings`;
	}

	/**
	 * Print integrity report to console
	 */
	printReport(report: IntegrityReport): void {
		console.log("\n" + "=".repeat(60));
		console.log("🧪 INTEGRITY REPORT");
		console.log("=".repeat(60));
		console.log(report.summary);

		if (report.warnings.length > 0) {
			console.warn("⚠️  WARNINGS:");
			for (const warning of report.warnings) {
				console.warn(`   - [${warning.rule}] ${warning.message}`);
			}
		}

		if (report.errors.length > 0) {
			console.error("❌ ERRORS:");
			for (const error of report.errors) {
				console.error(`   - [${error.rule}] ${error.message}`);
			}
		}
		console.log("=".repeat(60) + "\n");
	}
}

function countRows(db: Database.Database): Baseline {
	return {
		values: count(db, "SELECT COUNT(*) AS count FROM `values`"),
		links: count(db, "SELECT COUNT(*) AS count FROM links"),
		timestamp: new Date().toISOString(),
	};
}

function count(db: Database.Database, sql: string): number {
	const row = db.prepare<[], { count: number | bigint }>(sql).get();
	return row ? toNumber(row.count) : 0;
}
