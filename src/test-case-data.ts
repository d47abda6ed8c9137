import type { ArgumentSet } from "./types.ts";

/**
 * A case-source element that carries its argument list explicitly.
 *
 * Use it when the arguments would otherwise be read differently: a single
 * array argument, or an array whose length happens to equal the method's
 * parameter count but should be passed as one value.
 *
 *   static cases = [new TestCaseData([1, 2, 3]), new TestCaseData("a", "b")];
 */
export class TestCaseData {
	readonly args: ArgumentSet;

	constructor(...args: unknown[]) {
		this.args = Object.freeze(args);
	}
}
