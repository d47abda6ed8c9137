import { RE2JS } from "re2js";

import { InvalidPatternError } from "./errors.ts";

/** How an expected exception message is compared with the actual one. */
export type MessageMatchType = "Exact" | "Contains" | "StartsWith" | "Regex";

export const MESSAGE_MATCH_TYPES: readonly MessageMatchType[] = [
	"Exact",
	"Contains",
	"StartsWith",
	"Regex",
];

/** Match an exception message. `describe()` renders the expectation for failure text. */
export interface MessageMatcher {
	matches(message: string): boolean;
	describe(): string;
}

/** Whole-message equality. */
export class ExactMatcher implements MessageMatcher {
	constructor(readonly expected: string) {}

	matches(message: string): boolean {
		return message === this.expected;
	}

	describe(): string {
		return JSON.stringify(this.expected);
	}
}

/** Substring containment. */
export class ContainsMatcher implements MessageMatcher {
	constructor(readonly substring: string) {}

	matches(message: string): boolean {
		return message.includes(this.substring);
	}

	describe(): string {
		return `String containing ${JSON.stringify(this.substring)}`;
	}
}

/** Message prefix. */
export class StartsWithMatcher implements MessageMatcher {
	constructor(readonly prefix: string) {}

	matches(message: string): boolean {
		return message.startsWith(this.prefix);
	}

	describe(): string {
		return `String starting with ${JSON.stringify(this.prefix)}`;
	}
}

/**
 * Regular expression match using RE2 for guaranteed linear-time matching.
 * Uses RE2JS.compile().matcher().find(), which searches anywhere in the message.
 *
 * RE2 does not support backreferences or lookahead/lookbehind because they
 * require backtracking. Patterns using them are rejected at compile time.
 */
export class RegexMatcher implements MessageMatcher {
	private readonly compiled: RE2JS;

	constructor(readonly pattern: string) {
		try {
			this.compiled = RE2JS.compile(pattern);
		} catch (e) {
			throw new InvalidPatternError(pattern, e instanceof Error ? e.message : String(e));
		}
	}

	matches(message: string): boolean {
		return this.compiled.matcher(message).find();
	}

	describe(): string {
		return `String matching ${JSON.stringify(this.pattern)}`;
	}
}

export function compileMessageMatch(matchType: MessageMatchType, expected: string): MessageMatcher {
	switch (matchType) {
		case "Exact":
			return new ExactMatcher(expected);
		case "Contains":
			return new ContainsMatcher(expected);
		case "StartsWith":
			return new StartsWithMatcher(expected);
		case "Regex":
			return new RegexMatcher(expected);
	}
}
