/**
 * Security tests: prototype pollution through names that come from data.
 *
 * Manifest keys, property names and source names are user input, so names
 * like __proto__ or toString must never reach Object.prototype.
 */

import { describe, expect, it } from "vitest";
import { PropertyAnnotation, markTest, testCaseSource } from "../src/annotations.ts";
import { buildFrom } from "../src/builder.ts";
import { parseFixtureConfig } from "../src/config.ts";
import { getTestCaseData } from "../src/expander.ts";
import { FixtureBuilder, FixtureDefinitionError, UnknownTypeError, loadFixture } from "../src/fixture.ts";
import { TypeInfo } from "../src/reflect.ts";
import { RecordingLogger } from "../src/testing.ts";

class Target {
	run(): void {}
	check(_x: unknown): void {}
}

function built(...annotations: PropertyAnnotation[]) {
	const fixture = new FixtureBuilder(Target).method("run", {}, markTest(), ...annotations).build();
	const method = fixture.method("run");
	if (method === undefined) throw new Error("no method run");
	const test = buildFrom(method);
	if (test.kind !== "method") throw new Error("expected a single test");
	return test;
}

describe("test properties", () => {
	it("stores __proto__ as an own property", () => {
		const test = built(new PropertyAnnotation("__proto__", "evil"));

		expect(Object.hasOwn(test.properties, "__proto__")).toBe(true);
		expect(test.properties.__proto__).toBe("evil");
		expect(Object.getPrototypeOf(test.properties)).toBeNull();
		expect(Object.getPrototypeOf({})).toBe(Object.prototype);
	});

	it("does not inherit Object.prototype keys", () => {
		const test = built();
		expect(test.properties.toString).toBeUndefined();
		expect(test.properties.constructor).toBeUndefined();
	});

	it("stores a property named constructor", () => {
		const test = built(new PropertyAnnotation("constructor", "custom"));
		expect(test.properties.constructor).toBe("custom");
	});
});

describe("type table lookups", () => {
	it.each(["constructor", "toString", "__proto__", "hasOwnProperty"])(
		"does not resolve %s from Object.prototype",
		(name) => {
			const config = parseFixtureConfig({ fixture: name, methods: [] });
			expect(() => loadFixture(config, { Target })).toThrow(UnknownTypeError);
		},
	);

	it("does not resolve a source type from Object.prototype", () => {
		const config = parseFixtureConfig({
			fixture: "Target",
			methods: [{ name: "check", annotations: [{ type: "test_case_source", source: "x", source_type: "valueOf" }] }],
		});
		expect(() => loadFixture(config, { Target })).toThrow('unknown type: "valueOf" (registered: Target)');
	});
});

describe("member lookups", () => {
	it.each(["toString", "__proto__", "hasOwnProperty", "constructor"])(
		"does not declare %s as a test method",
		(name) => {
			expect(() => new FixtureBuilder(Target).method(name)).toThrow(FixtureDefinitionError);
		},
	);

	it.each(["__proto__", "toString", "constructor", "prototype", "call", "bind"])(
		"resolves no case source called %s",
		(name) => {
			const logger = new RecordingLogger();
			const fixture = new FixtureBuilder(Target).method("check", {}, testCaseSource(name)).build();
			const method = fixture.method("check");
			if (method === undefined) throw new Error("no method check");

			expect(getTestCaseData(method, { logger })).toEqual([]);
			expect(logger.messages).toEqual([
				{
					level: "log",
					message: `Target.check: case source "${name}" matched 0 members of Target, no cases added`,
				},
			]);
		},
	);

	it("does not construct the source for a name it cannot resolve", () => {
		let constructed = 0;
		class Counted {
			constructor() {
				constructed++;
			}
		}
		expect(new TypeInfo(Counted).getMembers("__proto__")).toEqual([]);
		expect(constructed).toBe(0);
	});
});
