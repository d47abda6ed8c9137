import { describe, expect, it } from "vitest";
import { InvalidPatternError } from "../src/errors.ts";
import {
	ContainsMatcher,
	ExactMatcher,
	MESSAGE_MATCH_TYPES,
	RegexMatcher,
	StartsWithMatcher,
	compileMessageMatch,
} from "../src/string-matchers.ts";

describe("ExactMatcher", () => {
	it("matches exact string", () => {
		expect(new ExactMatcher("hello").matches("hello")).toBe(true);
	});

	it("is case-sensitive", () => {
		expect(new ExactMatcher("hello").matches("Hello")).toBe(false);
	});

	it("rejects partial match", () => {
		expect(new ExactMatcher("hello").matches("hello world")).toBe(false);
	});

	it("handles empty string", () => {
		const m = new ExactMatcher("");
		expect(m.matches("")).toBe(true);
		expect(m.matches("a")).toBe(false);
	});

	it("describes itself as a quoted string", () => {
		expect(new ExactMatcher('say "hi"').describe()).toBe('"say \\"hi\\""');
	});
});

describe("ContainsMatcher", () => {
	it("matches substring", () => {
		expect(new ContainsMatcher("range").matches("index out of range")).toBe(true);
	});

	it("rejects non-match", () => {
		expect(new ContainsMatcher("range").matches("too big")).toBe(false);
	});

	it("empty substring matches everything", () => {
		expect(new ContainsMatcher("").matches("anything")).toBe(true);
	});

	it("describes itself", () => {
		expect(new ContainsMatcher("range").describe()).toBe('String containing "range"');
	});
});

describe("StartsWithMatcher", () => {
	it("matches prefix", () => {
		expect(new StartsWithMatcher("index").matches("index 5")).toBe(true);
	});

	it("exact is prefix", () => {
		expect(new StartsWithMatcher("index").matches("index")).toBe(true);
	});

	it("rejects a match elsewhere", () => {
		expect(new StartsWithMatcher("index").matches("bad index")).toBe(false);
	});

	it("describes itself", () => {
		expect(new StartsWithMatcher("index").describe()).toBe('String starting with "index"');
	});
});

describe("RegexMatcher", () => {
	it("matches pattern", () => {
		expect(new RegexMatcher("^\\d+$").matches("123")).toBe(true);
	});

	it("rejects non-match", () => {
		expect(new RegexMatcher("^\\d+$").matches("abc")).toBe(false);
	});

	it("uses search semantics (not fullmatch)", () => {
		expect(new RegexMatcher("\\d+").matches("abc123def")).toBe(true);
	});

	it("describes itself", () => {
		expect(new RegexMatcher("a+").describe()).toBe('String matching "a+"');
	});

	it("rejects an unbalanced pattern", () => {
		expect(() => new RegexMatcher("(unclosed")).toThrow(InvalidPatternError);
	});

	it("rejects lookahead", () => {
		expect(() => new RegexMatcher("(?=a)b")).toThrow(InvalidPatternError);
	});

	it("rejects backreferences", () => {
		expect(() => new RegexMatcher("(a)\\1")).toThrow('invalid regex pattern "(a)\\1"');
	});

	it("keeps the pattern on the error", () => {
		try {
			new RegexMatcher("(unclosed");
			expect.unreachable("should have thrown");
		} catch (e) {
			expect(e).toBeInstanceOf(InvalidPatternError);
			if (e instanceof InvalidPatternError) {
				expect(e.pattern).toBe("(unclosed");
				expect(e.name).toBe("InvalidPatternError");
			}
		}
	});

	it("stays linear on input that backtracks under other engines", () => {
		const m = new RegexMatcher("(a+)+$");
		expect(m.matches(`${"a".repeat(100)}!`)).toBe(false);
	});
});

describe("compileMessageMatch", () => {
	it.each([
		["Exact", ExactMatcher],
		["Contains", ContainsMatcher],
		["StartsWith", StartsWithMatcher],
		["Regex", RegexMatcher],
	] as const)("compiles %s", (matchType, type) => {
		expect(compileMessageMatch(matchType, "x")).toBeInstanceOf(type);
	});

	it("covers every match type", () => {
		expect(MESSAGE_MATCH_TYPES).toEqual(["Exact", "Contains", "StartsWith", "Regex"]);
	});
});
