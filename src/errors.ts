/** Base class for every error raised by caseloom. */
export class CaseloomError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "CaseloomError";
	}
}

/**
 * A case source was resolved but could not produce its cases: the source
 * type failed to construct, the member threw, or the value is not iterable.
 *
 * Unlike an unresolved source name this is never softened into "no cases".
 */
export class CaseSourceError extends CaseloomError {
	readonly sourceName: string;
	readonly sourceType: string;

	constructor(sourceName: string, sourceType: string, reason: string, options?: ErrorOptions) {
		super(`case source ${sourceType}.${sourceName}: ${reason}`, options);
		this.name = "CaseSourceError";
		this.sourceName = sourceName;
		this.sourceType = sourceType;
	}
}

/** A message pattern could not be compiled. */
export class InvalidPatternError extends CaseloomError {
	readonly pattern: string;

	constructor(pattern: string, reason: string) {
		super(`invalid regex pattern "${pattern}": ${reason}`);
		this.name = "InvalidPatternError";
		this.pattern = pattern;
	}
}
