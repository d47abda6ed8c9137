/**
 * Test construction: MethodInfo -> Test.
 *
 *   isTestMethod()  ->  getTestCaseData()  ->  buildTestMethod() per case
 *                                          ->  ParameterizedMethodSuite
 *
 * Signature problems never throw. They produce a NotRunnable test whose
 * reason is shown to users, so the reason strings are stable.
 */

import { ExpectedExceptionAnnotation } from "./annotations.ts";
import { isTestMethod } from "./classifier.ts";
import { getTestCaseData } from "./expander.ts";
import { ExpectedExceptionProcessor } from "./expected-exception.ts";
import type { Fixture } from "./fixture.ts";
import { NOOP_LOGGER } from "./logger.ts";
import type { MethodInfo } from "./reflect.ts";
import { ParameterizedMethodSuite, type Test, TestMethod } from "./test.ts";
import type { ArgumentSet, BuildOptions } from "./types.ts";

/** Return types a test method may declare. */
export const VOID_RETURN_TYPES: ReadonlySet<string> = new Set(["void", "undefined", "Promise<void>"]);

export const MUST_RETURN_VOID = "A TestMethod must return void";
export const ARGUMENTS_NOT_ALLOWED = "Arguments may not be specified for a method with no parameters";
export const ARGUMENTS_MISSING = "No arguments provided for a method requiring them";

export function argumentCountMismatch(expected: number, received: number): string {
	return `Expected ${expected} arguments, but received ${received}`;
}

/**
 * Build the test for one method: a single test when it has no cases,
 * otherwise a suite holding one test per case in expansion order.
 */
export function buildFrom(method: MethodInfo, options: BuildOptions = {}): Test {
	const testdata = getTestCaseData(method, options);

	if (testdata.length === 0) {
		return buildTestMethod(method, null, options);
	}

	return new ParameterizedMethodSuite(
		method,
		testdata.map((args) => buildTestMethod(method, args, options)),
	);
}

/** Build every test method of a fixture, in declaration order. Other methods are skipped. */
export function buildFixture(fixture: Fixture, options: BuildOptions = {}): Test[] {
	return fixture.methods.filter(isTestMethod).map((method) => buildFrom(method, options));
}

/**
 * Build one test bound to `args` (null: no arguments).
 *
 * Metadata and the expected-exception processor are applied only when the
 * signature is valid. The result is frozen.
 */
export function buildTestMethod(
	method: MethodInfo,
	args: ArgumentSet | null,
	options: BuildOptions = {},
): TestMethod {
	const testMethod = new TestMethod(method, args);
	const problem = signatureProblem(method, args);

	if (problem !== null) {
		testMethod.runState = "NotRunnable";
		testMethod.reason = problem;
		(options.logger ?? NOOP_LOGGER).warn(`${testMethod.fullName} is not runnable: ${problem}`);
	} else {
		applyCommonAnnotations(testMethod);

		const [expected] = method.getAnnotations(ExpectedExceptionAnnotation);
		if (expected !== undefined) {
			testMethod.exceptionProcessor = new ExpectedExceptionProcessor(testMethod, expected);
		}
	}

	Object.freeze(testMethod.categories);
	Object.freeze(testMethod.properties);
	return Object.freeze(testMethod);
}

/**
 * The first rule the method breaks for these arguments, or null.
 * Order matters: a method without parameters given arguments is reported
 * as such even when the counts would otherwise line up.
 */
export function signatureProblem(method: MethodInfo, args: ArgumentSet | null): string | null {
	if (!VOID_RETURN_TYPES.has(method.returnType)) {
		return MUST_RETURN_VOID;
	}

	const argsNeeded = method.parameters.length;
	const argsPassed = args === null ? 0 : args.length;

	if (argsNeeded === 0 && argsPassed > 0) {
		return ARGUMENTS_NOT_ALLOWED;
	}
	if (argsNeeded > 0 && argsPassed === 0) {
		return ARGUMENTS_MISSING;
	}
	if (argsNeeded !== argsPassed) {
		return argumentCountMismatch(argsNeeded, argsPassed);
	}
	return null;
}

// Own annotations are applied before inherited ones, so the first value seen wins.
function applyCommonAnnotations(testMethod: TestMethod): void {
	for (const annotation of testMethod.method.getAllAnnotations(true)) {
		switch (annotation.kind) {
			case "test":
				testMethod.description ??= annotation.description;
				break;
			case "description":
				testMethod.description ??= annotation.description;
				break;
			case "category":
				if (!testMethod.categories.includes(annotation.category)) {
					testMethod.categories.push(annotation.category);
				}
				break;
			case "property":
				if (!Object.hasOwn(testMethod.properties, annotation.key)) {
					testMethod.properties[annotation.key] = annotation.value;
				}
				break;
			case "timeout":
				testMethod.timeout ??= annotation.milliseconds;
				break;
			case "ignore":
				if (testMethod.runState !== "Ignored") {
					testMethod.runState = "Ignored";
					testMethod.reason = annotation.reason;
				}
				break;
			case "explicit":
				if (testMethod.runState === "Runnable") {
					testMethod.runState = "Explicit";
					testMethod.reason = annotation.reason;
				}
				break;
			default:
				break;
		}
	}
}
