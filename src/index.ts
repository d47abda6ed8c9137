// Core types
export type { ArgumentSet, BuildOptions, ParameterInfo, PropertyValue, RunState } from "./types.ts";
// Test utilities (summarize, RecordingLogger): import from "caseloom/testing"

// Annotations
export {
	CategoryAnnotation,
	DescriptionAnnotation,
	ExpectedExceptionAnnotation,
	ExplicitAnnotation,
	IgnoreAnnotation,
	PropertyAnnotation,
	TestAnnotation,
	TestCaseAnnotation,
	TestCaseSourceAnnotation,
	TimeoutAnnotation,
	expectedException,
	markTest,
	testCase,
	testCaseSource,
} from "./annotations.ts";
export type {
	Annotation,
	AnnotationType,
	ErrorType,
	ExpectedExceptionOptions,
} from "./annotations.ts";
export { TestCaseData } from "./test-case-data.ts";

// Reflection
export {
	FieldMember,
	MethodInfo,
	MethodMember,
	PropertyMember,
	TypeInfo,
	typeInfoOf,
} from "./reflect.ts";
export type { Constructor, MemberInfo, TypeInfoOptions } from "./reflect.ts";

// Fixtures
export {
	Fixture,
	FixtureBuilder,
	FixtureDefinitionError,
	UnknownTypeError,
	loadFixture,
} from "./fixture.ts";
export type { FixtureBuilderOptions, MethodDeclaration, TypeTable } from "./fixture.ts";

// Manifests
export {
	ConfigParseError,
	FixtureConfig,
	MethodConfig,
	SourceConfig,
	parseFixtureConfig,
} from "./config.ts";
export type { AnnotationConfig } from "./config.ts";

// Building
export { isTestMethod } from "./classifier.ts";
export { getTestCaseData, toArgumentSet } from "./expander.ts";
export {
	ARGUMENTS_MISSING,
	ARGUMENTS_NOT_ALLOWED,
	MUST_RETURN_VOID,
	VOID_RETURN_TYPES,
	argumentCountMismatch,
	buildFixture,
	buildFrom,
	buildTestMethod,
	signatureProblem,
} from "./builder.ts";
export {
	MAX_STRING_DISPLAY_LENGTH,
	ParameterizedMethodSuite,
	TestMethod,
	formatArgument,
	leaves,
	testName,
} from "./test.ts";
export type { Test } from "./test.ts";

// Expected exceptions
export { ExpectedExceptionProcessor } from "./expected-exception.ts";
export type { ExceptionOutcome } from "./expected-exception.ts";
export {
	ContainsMatcher,
	ExactMatcher,
	MESSAGE_MATCH_TYPES,
	RegexMatcher,
	StartsWithMatcher,
	compileMessageMatch,
} from "./string-matchers.ts";
export type { MessageMatchType, MessageMatcher } from "./string-matchers.ts";

// Errors and logging
export { CaseSourceError, CaseloomError, InvalidPatternError } from "./errors.ts";
export { NOOP_LOGGER } from "./logger.ts";
export type { Logger } from "./logger.ts";
