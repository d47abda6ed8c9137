/**
 * Fixture registration.
 *
 * JavaScript keeps neither parameter types nor return types at run time, and
 * no attributes at all, so a fixture's test methods are declared once at
 * registration time. The result is an immutable Fixture of MethodInfo
 * descriptors that the builder consumes.
 *
 *   const fixture = new FixtureBuilder(MathTests)
 *     .method("add", { parameters: ["a", "b"] }, testCase(1, 2), testCase(3, 4))
 *     .method("isZero", {}, testCaseSource("zeros"))
 *     .build();
 */

import type { Annotation } from "./annotations.ts";
import { TestCaseSourceAnnotation } from "./annotations.ts";
import { type AnnotationConfig, type FixtureConfig, SourceConfig } from "./config.ts";
import { CaseloomError } from "./errors.ts";
import { type Constructor, MethodInfo, TypeInfo, typeInfoOf } from "./reflect.ts";
import type { ParameterInfo } from "./types.ts";

// =====================================================================
// Errors
// =====================================================================

/** A fixture declaration does not fit its class. */
export class FixtureDefinitionError extends CaseloomError {
	readonly fixture: string;

	constructor(fixture: string, message: string) {
		super(`${fixture}: ${message}`);
		this.name = "FixtureDefinitionError";
		this.fixture = fixture;
	}
}

/** A manifest names a class that is not in the type table. */
export class UnknownTypeError extends CaseloomError {
	readonly typeName: string;
	readonly available: string[];

	constructor(typeName: string, available: string[]) {
		const sorted = [...available].sort();
		const msg =
			sorted.length > 0
				? `unknown type: "${typeName}" (registered: ${sorted.join(", ")})`
				: `unknown type: "${typeName}" (no types are registered)`;
		super(msg);
		this.name = "UnknownTypeError";
		this.typeName = typeName;
		this.available = sorted;
	}
}

// =====================================================================
// Fixture
// =====================================================================

export class Fixture {
	readonly methods: readonly MethodInfo[];

	constructor(
		readonly type: TypeInfo,
		methods: readonly MethodInfo[],
	) {
		this.methods = Object.freeze([...methods]);
		Object.freeze(this);
	}

	get name(): string {
		return this.type.name;
	}

	method(name: string): MethodInfo | undefined {
		return this.methods.find((m) => m.name === name);
	}

	methodNames(): string[] {
		return this.methods.map((m) => m.name);
	}
}

// =====================================================================
// Builder
// =====================================================================

export interface MethodDeclaration {
	/** Defaults to the method's JavaScript arity, named arg0, arg1, ... */
	readonly parameters?: readonly (string | ParameterInfo)[];
	/** Defaults to "void". */
	readonly returns?: string;
}

export interface FixtureBuilderOptions {
	/** Instance fields the class declares, so case sources can name them. */
	readonly fields?: readonly string[];
	/** Fixture of the parent class; its methods are inherited. */
	readonly base?: Fixture;
}

/**
 * Declares the test methods of one class.
 *
 * Methods of `base` that are not declared again are inherited as they are.
 * A method declared again keeps a link to the base declaration, so markers
 * on the base still classify it as a test.
 */
export class FixtureBuilder {
	private readonly type: TypeInfo;
	private readonly base: Fixture | null;
	private readonly declared = new Map<string, MethodInfo>();

	constructor(type: Constructor | TypeInfo, options: FixtureBuilderOptions = {}) {
		const info = typeInfoOf(type);
		this.base = options.base ?? null;

		// Instance fields of the parent class exist on derived instances too.
		const fields = new Set([...info.fields, ...(this.base?.type.fields ?? []), ...(options.fields ?? [])]);
		this.type = fields.size === info.fields.length ? info : new TypeInfo(info.type, { fields: [...fields] });

		if (this.base !== null && !(this.type.type.prototype instanceof this.base.type.type)) {
			throw new FixtureDefinitionError(this.type.name, `does not extend ${this.base.name}`);
		}
	}

	method(name: string, declaration: MethodDeclaration = {}, ...annotations: Annotation[]): this {
		const fn = this.type.getMethod(name);
		if (fn === null) {
			throw new FixtureDefinitionError(this.type.name, `no method named "${name}"`);
		}
		if (this.declared.has(name)) {
			throw new FixtureDefinitionError(this.type.name, `method "${name}" is declared twice`);
		}

		const parameters =
			declaration.parameters?.map(toParameterInfo) ??
			Array.from({ length: fn.length }, (_, i) => ({ name: `arg${i}` }));

		this.declared.set(
			name,
			new MethodInfo(
				name,
				this.type,
				parameters,
				declaration.returns ?? "void",
				annotations,
				this.base?.method(name) ?? null,
			),
		);
		return this;
	}

	/** Freeze the fixture: declared methods in order, then inherited ones. */
	build(): Fixture {
		const methods = [...this.declared.values()];
		for (const inherited of this.base?.methods ?? []) {
			if (this.declared.has(inherited.name)) continue;
			methods.push(
				new MethodInfo(
					inherited.name,
					this.type,
					inherited.parameters,
					inherited.returnType,
					inherited.annotations,
					inherited.baseMethod,
				),
			);
		}
		return new Fixture(this.type, methods);
	}
}

function toParameterInfo(p: string | ParameterInfo): ParameterInfo {
	return typeof p === "string" ? { name: p } : p;
}

// =====================================================================
// Manifest loading
// =====================================================================

export type TypeTable = Readonly<Record<string, Constructor | TypeInfo>>;

/**
 * Load a parsed manifest into a Fixture.
 *
 * Class names are looked up in `types`. An unknown name throws
 * UnknownTypeError; undeclared methods throw FixtureDefinitionError.
 */
export function loadFixture(config: FixtureConfig, types: TypeTable): Fixture {
	const builder = new FixtureBuilder(lookupType(config.fixture, types), { fields: config.fields });

	for (const method of config.methods) {
		const declaration: MethodDeclaration = {
			...(method.parameters === null ? {} : { parameters: method.parameters }),
			...(method.returns === null ? {} : { returns: method.returns }),
		};
		builder.method(
			method.name,
			declaration,
			...method.annotations.map((a) => resolveAnnotation(a, types)),
		);
	}

	return builder.build();
}

function resolveAnnotation(config: AnnotationConfig, types: TypeTable): Annotation {
	if (config instanceof SourceConfig) {
		return new TestCaseSourceAnnotation(
			config.sourceName,
			config.sourceTypeName === null ? null : lookupType(config.sourceTypeName, types),
		);
	}
	return config;
}

function lookupType(name: string, types: TypeTable): Constructor | TypeInfo {
	const type = Object.hasOwn(types, name) ? types[name] : undefined;
	if (type === undefined) {
		throw new UnknownTypeError(name, Object.keys(types));
	}
	return type;
}
