import type { ExpectedExceptionAnnotation } from "./annotations.ts";
import type { TestMethod } from "./test.ts";

export type ExceptionOutcome =
	| { readonly status: "success" }
	| { readonly status: "failure"; readonly message: string };

const SUCCESS: ExceptionOutcome = Object.freeze({ status: "success" });

/**
 * Interprets the end of a test run under an expected-exception declaration.
 *
 * A runner calls processNoException() when the test returned normally and
 * processException() with whatever it threw.
 */
export class ExpectedExceptionProcessor {
	constructor(
		readonly test: TestMethod,
		readonly annotation: ExpectedExceptionAnnotation,
	) {}

	processNoException(): ExceptionOutcome {
		const expected = this.annotation.expectedName;
		return this.failure(expected === null ? "An Exception was expected" : `${expected} was expected`);
	}

	processException(thrown: unknown): ExceptionOutcome {
		if (!this.matchesType(thrown)) {
			return this.failure(
				`An unexpected exception type was thrown\nExpected: ${this.annotation.expectedName}\n but was: ${thrownName(thrown)}`,
			);
		}

		const matcher = this.annotation.messageMatcher;
		if (matcher !== null) {
			const message = thrownMessage(thrown);
			if (!matcher.matches(message)) {
				return this.failure(
					`The exception message text was incorrect\nExpected: ${matcher.describe()}\n but was: ${JSON.stringify(message)}`,
				);
			}
		}

		return SUCCESS;
	}

	/** Exact class for constructors (subclasses do not count), `name` for strings. */
	private matchesType(thrown: unknown): boolean {
		const expected = this.annotation.expected;
		if (expected === null) return true;
		if (typeof expected === "string") return thrownName(thrown) === expected;
		if (typeof thrown !== "object" || thrown === null) return false;
		return Object.getPrototypeOf(thrown) === expected.prototype;
	}

	private failure(message: string): ExceptionOutcome {
		const userMessage = this.annotation.userMessage;
		return {
			status: "failure",
			message: userMessage === null ? message : `${userMessage}\n${message}`,
		};
	}
}

function thrownName(thrown: unknown): string {
	if (thrown instanceof Error) return thrown.name;
	if (thrown === null) return "null";
	if (typeof thrown === "object") {
		const ctor: unknown = Object.getPrototypeOf(thrown)?.constructor;
		if (typeof ctor === "function" && ctor.name !== "") return ctor.name;
	}
	return typeof thrown;
}

function thrownMessage(thrown: unknown): string {
	return thrown instanceof Error ? thrown.message : String(thrown);
}
