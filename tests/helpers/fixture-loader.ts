/**
 * Conformance fixture loader.
 *
 * Loads YAML fixtures from tests/fixtures/. Each document holds a fixture
 * manifest, the tests it must build (in order) and, optionally, every
 * message the build logs:
 *
 *   name: inline cases keep declaration order
 *   manifest:
 *     fixture: Arithmetic
 *     methods:
 *       - name: add
 *         annotations:
 *           - { type: test_case, args: [1, 2] }
 *   expect:
 *     - { name: "add(1,2)", run_state: Runnable }
 *   logs:
 *     - { level: warn, message: "..." }
 *
 * Manifests name classes from CONFORMANCE_TYPES.
 */

import { readFileSync, readdirSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { loadAll } from "js-yaml";

import type { TypeTable } from "../../src/fixture.ts";
import type { Logger } from "../../src/logger.ts";
import { TypeInfo } from "../../src/reflect.ts";
import type { RunState } from "../../src/types.ts";

const FIXTURES_DIR = fileURLToPath(new URL("../fixtures", import.meta.url));

// ─── Classes the manifests refer to ───────────────────────────────

export class Arithmetic {
	static readonly pairs = [
		[1, 2],
		[3, 4],
	];

	add(_a: number, _b: number): void {}
	square(_x: number): void {}
	noArgs(): void {}
	compute(): number {
		return 0;
	}
	helper(): void {}
}

export class Samples {
	static readonly singles = [5, 6];

	static *generated(): Generator<number> {
		yield 7;
		yield 8;
	}

	readonly words = ["a", "b"];

	get doubled(): number[][] {
		return [
			[2, 4],
			[3, 6],
		];
	}
}

export const CONFORMANCE_TYPES: TypeTable = {
	Arithmetic,
	Samples: new TypeInfo(Samples, { fields: ["words"] }),
};

// ─── Fixture interfaces ────────────────────────────────────────────

export interface ExpectedTest {
	name: string;
	runState: RunState;
	reason: string | null;
}

export interface LoggedMessage {
	level: keyof Logger;
	message: string;
}

export interface ConformanceCase {
	file: string;
	name: string;
	manifest: unknown;
	expect: ExpectedTest[];
	logs: LoggedMessage[] | null;
}

// ─── YAML → fixture conversion ─────────────────────────────────────

const RUN_STATES: readonly RunState[] = ["Runnable", "NotRunnable", "Ignored", "Explicit"];
const LOG_LEVELS: readonly (keyof Logger)[] = ["log", "info", "warn", "error"];

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function field(doc: Record<string, unknown>, key: string, where: string): unknown {
	if (!(key in doc)) throw new Error(`${where}: missing '${key}'`);
	return doc[key];
}

function text(value: unknown, where: string): string {
	if (typeof value !== "string") throw new Error(`${where}: expected a string, got ${JSON.stringify(value)}`);
	return value;
}

function list(value: unknown, where: string): unknown[] {
	if (!Array.isArray(value)) throw new Error(`${where}: expected a list`);
	return value;
}

function oneOf<T extends string>(value: unknown, options: readonly T[], where: string): T {
	const found = options.find((o) => o === value);
	if (found === undefined) throw new Error(`${where}: unknown value ${JSON.stringify(value)}`);
	return found;
}

function parseExpectedTest(spec: unknown, where: string): ExpectedTest {
	if (!isRecord(spec)) throw new Error(`${where}: expected a mapping`);
	return {
		name: text(field(spec, "name", where), `${where}.name`),
		runState: oneOf(field(spec, "run_state", where), RUN_STATES, `${where}.run_state`),
		reason: spec.reason === undefined ? null : text(spec.reason, `${where}.reason`),
	};
}

function parseLoggedMessage(spec: unknown, where: string): LoggedMessage {
	if (!isRecord(spec)) throw new Error(`${where}: expected a mapping`);
	return {
		level: oneOf(field(spec, "level", where), LOG_LEVELS, `${where}.level`),
		message: text(field(spec, "message", where), `${where}.message`),
	};
}

// ─── Fixture loading ──────────────────────────────────────────────

export function loadConformanceFixtures(): ConformanceCase[] {
	const files = readdirSync(FIXTURES_DIR)
		.filter((f) => f.endsWith(".yaml"))
		.sort();

	return files.flatMap((file) => loadFile(file));
}

function loadFile(file: string): ConformanceCase[] {
	const cases: ConformanceCase[] = [];
	const content = readFileSync(join(FIXTURES_DIR, file), "utf-8");

	loadAll(content).forEach((doc, i) => {
		if (doc === null || doc === undefined) return;
		const where = `${file}#${i}`;
		if (!isRecord(doc)) throw new Error(`${where}: expected a mapping`);

		cases.push({
			file,
			name: text(field(doc, "name", where), `${where}.name`),
			manifest: field(doc, "manifest", where),
			expect: list(field(doc, "expect", where), `${where}.expect`).map((t, j) =>
				parseExpectedTest(t, `${where}.expect[${j}]`),
			),
			logs:
				doc.logs === undefined
					? null
					: list(doc.logs, `${where}.logs`).map((l, j) => parseLoggedMessage(l, `${where}.logs[${j}]`)),
		});
	});
	return cases;
}
