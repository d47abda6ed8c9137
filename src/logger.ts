/**
 * Minimal logging surface. `console` satisfies it, so callers can pass
 * `{ logger: console }` without an adapter.
 */
export interface Logger {
	log(message: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}

/** Default logger: discards everything. */
export const NOOP_LOGGER: Logger = Object.freeze({
	log(): void {},
	info(): void {},
	warn(): void {},
	error(): void {},
});
