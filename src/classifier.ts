import { TestAnnotation, TestCaseAnnotation, TestCaseSourceAnnotation } from "./annotations.ts";
import type { MethodInfo } from "./reflect.ts";

/**
 * True if the method, or a declaration it overrides, carries a test
 * marker, an inline case or a case source.
 *
 * Only looks at markers. Nothing is expanded or validated, so non-tests
 * are rejected before any case source is touched.
 */
export function isTestMethod(method: MethodInfo): boolean {
	return (
		method.isDefined(TestAnnotation, true) ||
		method.isDefined(TestCaseAnnotation, true) ||
		method.isDefined(TestCaseSourceAnnotation, true)
	);
}
