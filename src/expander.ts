/**
 * Test case expansion: MethodInfo -> ordered argument sets.
 *
 * Inline cases come first, in declaration order, then every case source in
 * declaration order, each in its own enumeration order. Reports rely on
 * this order.
 *
 * An empty result is the ordinary case of a test without parameters.
 */

import { TestCaseAnnotation, TestCaseSourceAnnotation } from "./annotations.ts";
import { CaseSourceError } from "./errors.ts";
import { type Logger, NOOP_LOGGER } from "./logger.ts";
import { type Constructor, type MemberInfo, type MethodInfo, type TypeInfo, typeInfoOf } from "./reflect.ts";
import { TestCaseData } from "./test-case-data.ts";
import type { ArgumentSet, BuildOptions } from "./types.ts";

export function getTestCaseData(method: MethodInfo, options: BuildOptions = {}): ArgumentSet[] {
	const logger = options.logger ?? NOOP_LOGGER;
	const data: ArgumentSet[] = [];

	for (const testCase of method.getAnnotations(TestCaseAnnotation)) {
		data.push(testCase.args);
	}

	for (const source of method.getAnnotations(TestCaseSourceAnnotation)) {
		data.push(...casesFromSource(method, source, logger));
	}

	return data;
}

/**
 * Argument set for one enumerated source element: explicit TestCaseData
 * arguments, an array that already fits the parameter list, or the element
 * itself as the only argument.
 */
export function toArgumentSet(element: unknown, parameterCount: number): ArgumentSet {
	if (element instanceof TestCaseData) return element.args;
	if (Array.isArray(element) && element.length === parameterCount) {
		return Object.freeze([...element]);
	}
	return Object.freeze([element]);
}

/**
 * A name that resolves to no member, or to more than one, contributes
 * nothing. That is reported to the logger only.
 */
function casesFromSource(
	method: MethodInfo,
	annotation: TestCaseSourceAnnotation,
	logger: Logger,
): ArgumentSet[] {
	const sourceType = resolveSourceType(method, annotation.sourceType);
	const members = sourceType.getMembers(annotation.sourceName);
	const member = members.length === 1 ? members[0] : undefined;

	if (member === undefined) {
		logger.log(
			`${method.fullName}: case source "${annotation.sourceName}" matched ${members.length} members of ${sourceType.name}, no cases added`,
		);
		return [];
	}

	const parameterCount = method.parameters.length;
	const data: ArgumentSet[] = [];
	for (const element of readSource(sourceType, member)) {
		data.push(toArgumentSet(element, parameterCount));
	}
	return data;
}

// Naming the fixture's own class is the same as naming no type: its declared fields stay visible.
function resolveSourceType(method: MethodInfo, sourceType: TypeInfo | Constructor | null): TypeInfo {
	if (sourceType === null || sourceType === method.fixture.type) return method.fixture;
	return typeInfoOf(sourceType);
}

function readSource(sourceType: TypeInfo, member: MemberInfo): unknown[] {
	const fail = (reason: string, cause?: unknown): CaseSourceError =>
		new CaseSourceError(member.name, sourceType.name, reason, cause === undefined ? undefined : { cause });

	let target: object;
	try {
		target = member.isStatic ? sourceType.type : sourceType.construct();
	} catch (e) {
		throw fail(`construction failed: ${errorMessage(e)}`, e);
	}

	let value: unknown;
	try {
		value = member.getValue(target);
	} catch (e) {
		throw fail(`reading ${member.kind} failed: ${errorMessage(e)}`, e);
	}

	if (!isIterable(value)) {
		throw fail(`${member.kind} did not return an iterable (got ${value === null ? "null" : typeof value})`);
	}

	// Generators run user code while being enumerated.
	try {
		return [...value];
	} catch (e) {
		throw fail(`enumeration failed: ${errorMessage(e)}`, e);
	}
}

function isIterable(value: unknown): value is Iterable<unknown> {
	return (
		typeof value === "object" &&
		value !== null &&
		Symbol.iterator in value &&
		typeof value[Symbol.iterator] === "function"
	);
}

function errorMessage(e: unknown): string {
	return e instanceof Error ? e.message : String(e);
}
