import type { ExpectedExceptionProcessor } from "./expected-exception.ts";
import type { MethodInfo } from "./reflect.ts";
import type { ArgumentSet, PropertyValue, RunState } from "./types.ts";

/** Strings longer than this are shortened in test names. */
export const MAX_STRING_DISPLAY_LENGTH = 40;

/**
 * One executable test: a method, optionally bound to an argument set.
 *
 * `args === null` means the method is invoked without arguments; otherwise
 * a frozen copy of the given arguments is kept. The builder fills in run
 * state and metadata, then freezes the instance.
 */
export class TestMethod {
	readonly kind = "method";
	readonly name: string;
	readonly fullName: string;
	readonly args: ArgumentSet | null;

	runState: RunState = "Runnable";
	/** Why the test is not Runnable. */
	reason: string | null = null;
	description: string | null = null;
	categories: string[] = [];
	properties: Record<string, PropertyValue> = Object.create(null);
	/** Milliseconds. */
	timeout: number | null = null;
	exceptionProcessor: ExpectedExceptionProcessor | null = null;

	constructor(
		readonly method: MethodInfo,
		args: ArgumentSet | null,
	) {
		this.args = args === null ? null : Object.freeze([...args]);
		this.name = testName(method.name, args);
		this.fullName = `${method.fixture.name}.${this.name}`;
	}
}

/**
 * The cases of one parameterized method, in expansion order.
 * Runners report it as one node whose leaves pass or fail individually.
 */
export class ParameterizedMethodSuite {
	readonly kind = "suite";
	readonly name: string;
	readonly fullName: string;
	readonly runState: RunState = "Runnable";
	readonly tests: readonly TestMethod[];

	constructor(
		readonly method: MethodInfo,
		tests: readonly TestMethod[],
	) {
		this.name = method.name;
		this.fullName = method.fullName;
		this.tests = Object.freeze([...tests]);
		Object.freeze(this);
	}

	get testCaseCount(): number {
		return this.tests.length;
	}
}

/** What the builder hands to a runner: a single test or a group of cases. */
export type Test = TestMethod | ParameterizedMethodSuite;

/** The individually reportable tests, in order. */
export function leaves(test: Test): readonly TestMethod[] {
	return test.kind === "suite" ? test.tests : [test];
}

// =====================================================================
// Naming
// =====================================================================

/** `add(1,2)` for bound arguments, the bare method name otherwise. */
export function testName(methodName: string, args: ArgumentSet | null): string {
	if (args === null) return methodName;
	return `${methodName}(${args.map(formatArgument).join(",")})`;
}

export function formatArgument(value: unknown): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return `[${value.map(formatArgument).join(",")}]`;

	switch (typeof value) {
		case "string": {
			// Code points, so a surrogate pair is never split.
			const chars = Array.from(value);
			const shown =
				chars.length > MAX_STRING_DISPLAY_LENGTH
					? `${chars.slice(0, MAX_STRING_DISPLAY_LENGTH - 3).join("")}...`
					: value;
			return JSON.stringify(shown);
		}
		case "bigint":
			return `${value}n`;
		case "undefined":
			return "undefined";
		case "number":
		case "boolean":
		case "symbol":
			return String(value);
		case "function":
			return value.name === "" ? "[Function]" : `[Function ${value.name}]`;
		default: {
			const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
			return typeof ctor === "function" && ctor.name !== "" ? ctor.name : "Object";
		}
	}
}
