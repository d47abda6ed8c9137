/**
 * Fixture manifests: test metadata declared as data.
 *
 * A manifest is the JSON/YAML form of what FixtureBuilder does in code.
 * Loading path:
 *   unknown -> parseFixtureConfig() -> FixtureConfig -> loadFixture() -> Fixture
 *
 *   fixture: MathTests
 *   fields: [cases]
 *   methods:
 *     - name: add
 *       parameters: [a, b]
 *       annotations:
 *         - { type: test_case, args: [1, 2] }
 *         - { type: test_case_source, source: cases }
 *
 * Class names (the fixture, source types) stay names here; loadFixture()
 * resolves them against a table of constructors.
 */

import {
	type Annotation,
	CategoryAnnotation,
	DescriptionAnnotation,
	ExpectedExceptionAnnotation,
	ExplicitAnnotation,
	IgnoreAnnotation,
	PropertyAnnotation,
	TestAnnotation,
	TestCaseAnnotation,
	TimeoutAnnotation,
} from "./annotations.ts";
import { CaseloomError, InvalidPatternError } from "./errors.ts";
import { MESSAGE_MATCH_TYPES, type MessageMatchType } from "./string-matchers.ts";
import type { ParameterInfo, PropertyValue } from "./types.ts";

// =====================================================================
// Config types
// =====================================================================

/** A case source whose type is still a name. */
export class SourceConfig {
	constructor(
		readonly sourceName: string,
		readonly sourceTypeName: string | null = null,
	) {}
}

export type AnnotationConfig = Annotation | SourceConfig;

export class MethodConfig {
	constructor(
		readonly name: string,
		readonly parameters: readonly ParameterInfo[] | null,
		readonly returns: string | null,
		readonly annotations: readonly AnnotationConfig[],
	) {}
}

export class FixtureConfig {
	constructor(
		readonly fixture: string,
		readonly fields: readonly string[],
		readonly methods: readonly MethodConfig[],
	) {}
}

// =====================================================================
// Parsing
// =====================================================================

/** Error parsing a manifest into config types. */
export class ConfigParseError extends CaseloomError {
	constructor(message: string) {
		super(message);
		this.name = "ConfigParseError";
	}
}

type Obj = Record<string, unknown>;

function expectObject(data: unknown, what: string): Obj {
	if (typeof data !== "object" || data === null || Array.isArray(data)) {
		throw new ConfigParseError(`${what} must be an object, got ${describeType(data)}`);
	}
	// Plain object by the checks above.
	return data as Obj;
}

function expectArray(data: unknown, what: string): unknown[] {
	if (!Array.isArray(data)) {
		throw new ConfigParseError(`${what} must be an array, got ${describeType(data)}`);
	}
	return data;
}

function expectString(data: unknown, what: string): string {
	if (typeof data !== "string") {
		throw new ConfigParseError(`${what} must be a string, got ${describeType(data)}`);
	}
	return data;
}

function optionalString(obj: Obj, key: string, what: string): string | null {
	const value = obj[key];
	return value === undefined || value === null ? null : expectString(value, `${what} '${key}'`);
}

function required(obj: Obj, key: string, what: string): unknown {
	if (!Object.hasOwn(obj, key)) {
		throw new ConfigParseError(`${what} missing required field '${key}'`);
	}
	return obj[key];
}

function describeType(data: unknown): string {
	if (data === null) return "null";
	if (Array.isArray(data)) return "array";
	return typeof data;
}

/** Parse an unknown value (decoded JSON or YAML) into a FixtureConfig. */
export function parseFixtureConfig(data: unknown): FixtureConfig {
	const obj = expectObject(data, "fixture manifest");

	const fixture = expectString(required(obj, "fixture", "fixture manifest"), "'fixture'");
	const fields =
		obj.fields === undefined
			? []
			: expectArray(obj.fields, "'fields'").map((f, i) => expectString(f, `fields[${i}]`));
	const methods = expectArray(required(obj, "methods", "fixture manifest"), "'methods'").map((m, i) =>
		parseMethod(m, `methods[${i}]`),
	);

	return new FixtureConfig(fixture, fields, methods);
}

function parseMethod(data: unknown, where: string): MethodConfig {
	const obj = expectObject(data, where);
	const name = expectString(required(obj, "name", where), `${where} 'name'`);

	let parameters: ParameterInfo[] | null = null;
	if (obj.parameters !== undefined) {
		parameters = expectArray(obj.parameters, `${where} 'parameters'`).map((p, i) =>
			parseParameter(p, `${where}.parameters[${i}]`),
		);
	}

	const returns = optionalString(obj, "returns", where);
	const annotations =
		obj.annotations === undefined
			? []
			: expectArray(obj.annotations, `${where} 'annotations'`).map((a, i) =>
					parseAnnotation(a, `${where}.annotations[${i}]`),
				);

	return new MethodConfig(name, parameters, returns, annotations);
}

function parseParameter(data: unknown, where: string): ParameterInfo {
	if (typeof data === "string") return { name: data };
	const obj = expectObject(data, where);
	const name = expectString(required(obj, "name", where), `${where} 'name'`);
	const type = optionalString(obj, "type", where);
	return type === null ? { name } : { name, type };
}

function parseAnnotation(data: unknown, where: string): AnnotationConfig {
	const obj = expectObject(data, where);
	const type = expectString(required(obj, "type", where), `${where} 'type'`);

	switch (type) {
		case "test":
			return new TestAnnotation(optionalString(obj, "description", where));
		case "test_case":
			return new TestCaseAnnotation(expectArray(required(obj, "args", where), `${where} 'args'`));
		case "test_case_source":
			return new SourceConfig(
				expectString(required(obj, "source", where), `${where} 'source'`),
				optionalString(obj, "source_type", where),
			);
		case "expected_exception":
			return parseExpectedException(obj, where);
		case "description":
			return new DescriptionAnnotation(expectString(required(obj, "text", where), `${where} 'text'`));
		case "category":
			return new CategoryAnnotation(expectString(required(obj, "name", where), `${where} 'name'`));
		case "property":
			return new PropertyAnnotation(
				expectString(required(obj, "name", where), `${where} 'name'`),
				parsePropertyValue(required(obj, "value", where), `${where} 'value'`),
			);
		case "timeout":
			return new TimeoutAnnotation(parseTimeout(required(obj, "ms", where), `${where} 'ms'`));
		case "ignore":
			return new IgnoreAnnotation(expectString(required(obj, "reason", where), `${where} 'reason'`));
		case "explicit":
			return new ExplicitAnnotation(optionalString(obj, "reason", where));
		default:
			throw new ConfigParseError(`${where}: unknown annotation type "${type}"`);
	}
}

function parseExpectedException(obj: Obj, where: string): ExpectedExceptionAnnotation {
	const exception = optionalString(obj, "exception", where);
	const message = optionalString(obj, "message", where);
	const userMessage = optionalString(obj, "user_message", where);

	let matchType: MessageMatchType = "Exact";
	const match = optionalString(obj, "match", where);
	if (match !== null) {
		const known = MESSAGE_MATCH_TYPES.find((t) => t === match);
		if (known === undefined) {
			throw new ConfigParseError(
				`${where} 'match' must be one of [${MESSAGE_MATCH_TYPES.join(", ")}], got "${match}"`,
			);
		}
		matchType = known;
	}

	try {
		return new ExpectedExceptionAnnotation(exception, {
			...(message === null ? {} : { expectedMessage: message }),
			...(userMessage === null ? {} : { userMessage }),
			matchType,
		});
	} catch (e) {
		if (e instanceof InvalidPatternError) {
			throw new ConfigParseError(`${where}: ${e.message}`);
		}
		throw e;
	}
}

function parsePropertyValue(data: unknown, what: string): PropertyValue {
	if (typeof data === "string" || typeof data === "number" || typeof data === "boolean") {
		return data;
	}
	throw new ConfigParseError(`${what} must be a string, number or boolean, got ${describeType(data)}`);
}

function parseTimeout(data: unknown, what: string): number {
	if (typeof data !== "number" || !Number.isInteger(data) || data <= 0) {
		throw new ConfigParseError(`${what} must be a positive integer`);
	}
	return data;
}
