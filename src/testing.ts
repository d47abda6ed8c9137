import type { Logger } from "./logger.ts";
import { type Test, leaves } from "./test.ts";
import type { ArgumentSet, RunState } from "./types.ts";

/** Plain-data view of one built test, for assertions and fixtures. */
export interface TestSummary {
	name: string;
	runState: RunState;
	reason: string | null;
	args: ArgumentSet | null;
}

/** Leaves of a built test as plain data, in order. */
export function summarize(test: Test): TestSummary[] {
	return leaves(test).map((t) => ({
		name: t.name,
		runState: t.runState,
		reason: t.reason,
		args: t.args,
	}));
}

/** Logger that keeps every message with its level. */
export class RecordingLogger implements Logger {
	readonly messages: { level: keyof Logger; message: string }[] = [];

	log(message: string): void {
		this.messages.push({ level: "log", message });
	}

	info(message: string): void {
		this.messages.push({ level: "info", message });
	}

	warn(message: string): void {
		this.messages.push({ level: "warn", message });
	}

	error(message: string): void {
		this.messages.push({ level: "error", message });
	}
}
