/**
 * Build benchmarks for caseloom.
 *
 * Measures registration, case expansion and test construction as the
 * number of methods and cases grows, and the manifest path against the
 * code path.
 *
 * Run: npm run bench
 */

import { bench, run, summary } from "mitata";

import {
	FixtureBuilder,
	TypeInfo,
	buildFixture,
	loadFixture,
	markTest,
	parseFixtureConfig,
	testCase,
	testCaseSource,
} from "../src/index.ts";
import type { Fixture } from "../src/index.ts";

// ── Fixtures ─────────────────────────────────────────────────────────────────

class Sources {
	static readonly numbers = Array.from({ length: 1000 }, (_, i) => i);
	static readonly pairs = Array.from({ length: 1000 }, (_, i) => [i, i + 1]);

	static *generated(): Generator<number> {
		for (let i = 0; i < 1000; i++) yield i;
	}
}

class Wide {
	add(_a: number, _b: number): void {}
	check(_x: number): void {}
	plain(): void {}
}

function inlineFixture(cases: number): Fixture {
	const annotations = Array.from({ length: cases }, (_, i) => testCase(i, i + 1));
	return new FixtureBuilder(Wide).method("add", {}, ...annotations).build();
}

// Many subclasses, one test method each.
function wideFixtures(n: number): Fixture[] {
	const fixtures: Fixture[] = [];
	for (let i = 0; i < n; i++) {
		const type = class extends Wide {};
		fixtures.push(new FixtureBuilder(type).method("plain", {}, markTest()).build());
	}
	return fixtures;
}

// ── Registration ─────────────────────────────────────────────────────────────

summary(() => {
	bench("register_3_methods", () =>
		new FixtureBuilder(Wide)
			.method("add", {}, testCase(1, 2))
			.method("check", {}, testCaseSource("numbers", Sources))
			.method("plain", {}, markTest())
			.build(),
	);
	bench("register_100_inline_cases", () => inlineFixture(100));
});

// ── Expansion ────────────────────────────────────────────────────────────────

summary(() => {
	for (const n of [10, 100, 1000]) {
		const fixture = inlineFixture(n);
		bench(`build_${n}_inline_cases`, () => buildFixture(fixture));
	}
});

summary(() => {
	const sources = new TypeInfo(Sources);
	const fixture = new FixtureBuilder(Wide)
		.method("check", {}, testCaseSource("numbers", sources))
		.method("add", {}, testCaseSource("pairs", sources))
		.build();
	bench("build_1000_field_cases_x2", () => buildFixture(fixture));

	const generated = new FixtureBuilder(Wide).method("check", {}, testCaseSource("generated", sources)).build();
	bench("build_1000_generated_cases", () => buildFixture(generated));
});

summary(() => {
	for (const n of [10, 100]) {
		const fixtures = wideFixtures(n);
		bench(`build_${n}_fixtures`, () => fixtures.map((f) => buildFixture(f)));
	}
});

// ── Manifest path ────────────────────────────────────────────────────────────

const MANIFEST = JSON.stringify({
	fixture: "Wide",
	methods: [
		{ name: "add", annotations: [{ type: "test_case", args: [1, 2] }] },
		{ name: "check", annotations: [{ type: "test_case_source", source: "numbers", source_type: "Sources" }] },
		{ name: "plain", annotations: [{ type: "test" }, { type: "category", name: "smoke" }] },
	],
});

summary(() => {
	bench("manifest_parse_load_build", () =>
		buildFixture(loadFixture(parseFixtureConfig(JSON.parse(MANIFEST)), { Wide, Sources })),
	);
	bench("code_register_build", () =>
		buildFixture(
			new FixtureBuilder(Wide)
				.method("add", {}, testCase(1, 2))
				.method("check", {}, testCaseSource("numbers", Sources))
				.method("plain", {}, markTest())
				.build(),
		),
	);
});

await run();
