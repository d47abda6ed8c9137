/**
 * Declarative test metadata.
 *
 * JavaScript keeps no attributes on methods, so annotations are plain
 * readonly objects attached to a method when its fixture is registered
 * (see FixtureBuilder). Lookups go by class, the same way `instanceof`
 * narrows the Annotation union.
 *
 * | Annotation                  | Effect                                   |
 * |-----------------------------|------------------------------------------|
 * | TestAnnotation              | marks a test                             |
 * | TestCaseAnnotation          | marks a test, adds one inline case       |
 * | TestCaseSourceAnnotation    | marks a test, adds cases from a member   |
 * | ExpectedExceptionAnnotation | attaches an ExpectedExceptionProcessor   |
 * | Description/Category/...    | copied onto runnable tests               |
 */

import type { Constructor, TypeInfo } from "./reflect.ts";
import { type MessageMatchType, type MessageMatcher, compileMessageMatch } from "./string-matchers.ts";
import type { ArgumentSet, PropertyValue } from "./types.ts";

/** Plain test marker. */
export class TestAnnotation {
	readonly kind = "test";

	constructor(readonly description: string | null = null) {}
}

/** One inline case: the arguments the method is called with. */
export class TestCaseAnnotation {
	readonly kind = "testCase";

	readonly args: ArgumentSet;

	constructor(args: readonly unknown[]) {
		this.args = Object.freeze([...args]);
	}
}

/**
 * Cases read from a named field, getter or zero-argument method.
 * Without a sourceType the method's own fixture is searched.
 */
export class TestCaseSourceAnnotation {
	readonly kind = "testCaseSource";

	constructor(
		readonly sourceName: string,
		readonly sourceType: TypeInfo | Constructor | null = null,
	) {}
}

/** Anything `new`-able whose instances are thrown. */
export type ErrorType = abstract new (...args: never[]) => unknown;

export interface ExpectedExceptionOptions {
	readonly expectedMessage?: string;
	readonly matchType?: MessageMatchType;
	readonly userMessage?: string;
}

/**
 * The test passes only if it throws.
 *
 * `expected` is either the exact class of the thrown value, or the `name`
 * of the thrown error. With neither, any thrown value is accepted.
 * The message pattern is compiled here, so a bad regex fails at registration.
 */
export class ExpectedExceptionAnnotation {
	readonly kind = "expectedException";

	readonly expectedMessage: string | null;
	readonly matchType: MessageMatchType;
	readonly userMessage: string | null;
	readonly messageMatcher: MessageMatcher | null;

	constructor(
		readonly expected: ErrorType | string | null = null,
		options: ExpectedExceptionOptions = {},
	) {
		this.expectedMessage = options.expectedMessage ?? null;
		this.matchType = options.matchType ?? "Exact";
		this.userMessage = options.userMessage ?? null;
		this.messageMatcher =
			this.expectedMessage === null ? null : compileMessageMatch(this.matchType, this.expectedMessage);
	}

	/** Display name of the expected exception, or null when any is accepted. */
	get expectedName(): string | null {
		if (this.expected === null) return null;
		return typeof this.expected === "string" ? this.expected : this.expected.name;
	}
}

export class DescriptionAnnotation {
	readonly kind = "description";

	constructor(readonly description: string) {}
}

export class CategoryAnnotation {
	readonly kind = "category";

	constructor(readonly category: string) {}
}

export class PropertyAnnotation {
	readonly kind = "property";

	constructor(
		readonly key: string,
		readonly value: PropertyValue,
	) {}
}

/** Timeout in milliseconds. */
export class TimeoutAnnotation {
	readonly kind = "timeout";

	constructor(readonly milliseconds: number) {}
}

export class IgnoreAnnotation {
	readonly kind = "ignore";

	constructor(readonly reason: string) {}
}

/** Only run when selected explicitly. */
export class ExplicitAnnotation {
	readonly kind = "explicit";

	constructor(readonly reason: string | null = null) {}
}

/** Discriminated union of all annotation types. */
export type Annotation =
	| TestAnnotation
	| TestCaseAnnotation
	| TestCaseSourceAnnotation
	| ExpectedExceptionAnnotation
	| DescriptionAnnotation
	| CategoryAnnotation
	| PropertyAnnotation
	| TimeoutAnnotation
	| IgnoreAnnotation
	| ExplicitAnnotation;

/** Class of an annotation, used as a lookup key. */
export type AnnotationType<A extends Annotation> = abstract new (...args: never[]) => A;

// ── Shorthands ───────────────────────────────────────────────────────

export function markTest(description?: string): TestAnnotation {
	return new TestAnnotation(description ?? null);
}

export function testCase(...args: unknown[]): TestCaseAnnotation {
	return new TestCaseAnnotation(args);
}

export function testCaseSource(
	sourceName: string,
	sourceType?: TypeInfo | Constructor,
): TestCaseSourceAnnotation {
	return new TestCaseSourceAnnotation(sourceName, sourceType ?? null);
}

export function expectedException(
	expected?: ErrorType | string,
	options?: ExpectedExceptionOptions,
): ExpectedExceptionAnnotation {
	return new ExpectedExceptionAnnotation(expected ?? null, options);
}
