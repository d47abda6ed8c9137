import type { Logger } from "./logger.ts";

/**
 * Ordered argument values bound to one test case.
 *
 * Opaque to the builder: only the length takes part in validation.
 */
export type ArgumentSet = readonly unknown[];

/** A declared parameter of a test method. `type` is informational only. */
export interface ParameterInfo {
	readonly name: string;
	readonly type?: string;
}

/**
 * Whether a built test may be executed.
 *
 * Signature validation only ever assigns `Runnable` or `NotRunnable`.
 * `Ignored` and `Explicit` come from common metadata on a valid test.
 */
export type RunState = "Runnable" | "NotRunnable" | "Ignored" | "Explicit";

/** Values a PropertyAnnotation may carry. */
export type PropertyValue = string | number | boolean;

/** Options shared by the expander and the builder. */
export interface BuildOptions {
	/** Receives diagnostics; defaults to NOOP_LOGGER. */
	readonly logger?: Logger;
}
