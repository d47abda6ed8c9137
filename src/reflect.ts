/**
 * Runtime reflection over classes.
 *
 * A TypeInfo wraps a zero-argument constructible class and resolves member
 * names the way case sources need them: static members live on the
 * constructor (and its parent constructors), instance members on the
 * prototype chain, and instance fields, which exist only on constructed
 * objects, are declared up front.
 *
 * MethodInfo is the descriptor of one test method: parameters and return
 * type as declared at registration, plus its annotations.
 */

import type { Annotation, AnnotationType } from "./annotations.ts";
import type { ParameterInfo } from "./types.ts";

/** A class that can be constructed without arguments. */
export type Constructor<T extends object = object> = new () => T;

/** Own properties every class constructor has; never treated as members. */
const FUNCTION_OWN_KEYS = new Set(["length", "name", "prototype"]);

// =====================================================================
// Members
// =====================================================================

/** Data field: read as is. */
export class FieldMember {
	readonly kind = "field";

	constructor(
		readonly name: string,
		readonly isStatic: boolean,
	) {}

	getValue(target: object): unknown {
		return Reflect.get(target, this.name);
	}
}

/** Accessor property: the getter runs with `target` as receiver. */
export class PropertyMember {
	readonly kind = "property";

	constructor(
		readonly name: string,
		readonly isStatic: boolean,
	) {}

	getValue(target: object): unknown {
		return Reflect.get(target, this.name);
	}
}

/** Method: invoked on `target` without arguments. */
export class MethodMember {
	readonly kind = "method";

	constructor(
		readonly name: string,
		readonly isStatic: boolean,
	) {}

	getValue(target: object): unknown {
		const fn: unknown = Reflect.get(target, this.name);
		if (typeof fn !== "function") {
			throw new TypeError(`${this.name} is not a function`);
		}
		return Reflect.apply(fn, target, []);
	}
}

export type MemberInfo = FieldMember | PropertyMember | MethodMember;

function findDescriptor(start: object, name: string, stop: object): PropertyDescriptor | undefined {
	for (let o: object | null = start; o !== null && o !== stop; o = Object.getPrototypeOf(o)) {
		const descriptor = Object.getOwnPropertyDescriptor(o, name);
		if (descriptor !== undefined) return descriptor;
	}
	return undefined;
}

// Class fields are enumerable, class methods are not.
function memberFromDescriptor(name: string, descriptor: PropertyDescriptor, isStatic: boolean): MemberInfo {
	if (descriptor.get !== undefined || descriptor.set !== undefined) {
		return new PropertyMember(name, isStatic);
	}
	if (typeof descriptor.value === "function" && descriptor.enumerable !== true) {
		return new MethodMember(name, isStatic);
	}
	return new FieldMember(name, isStatic);
}

// =====================================================================
// TypeInfo
// =====================================================================

export interface TypeInfoOptions {
	/** Instance fields to expose. They cannot be seen without constructing. */
	readonly fields?: readonly string[];
}

export class TypeInfo<T extends object = object> {
	readonly name: string;
	readonly fields: readonly string[];

	constructor(
		readonly type: Constructor<T>,
		options: TypeInfoOptions = {},
	) {
		this.name = type.name === "" ? "(anonymous)" : type.name;
		this.fields = Object.freeze([...(options.fields ?? [])]);
		Object.freeze(this);
	}

	/**
	 * Every member called `name`, static and instance, at any depth of the
	 * class hierarchy. A subclass member shadows the parent's one of the same
	 * kind; a static and an instance member of the same name are both returned.
	 */
	getMembers(name: string): MemberInfo[] {
		const members: MemberInfo[] = [];

		if (!FUNCTION_OWN_KEYS.has(name)) {
			const found = findDescriptor(this.type, name, Function.prototype);
			if (found !== undefined) members.push(memberFromDescriptor(name, found, true));
		}

		if (this.fields.includes(name)) {
			members.push(new FieldMember(name, false));
		}

		if (name !== "constructor") {
			const prototype: object = this.type.prototype;
			const found = findDescriptor(prototype, name, Object.prototype);
			if (found !== undefined) members.push(memberFromDescriptor(name, found, false));
		}

		return members;
	}

	/** Prototype method called `name`, if the class has one. */
	getMethod(name: string): ((...args: never[]) => unknown) | null {
		if (name === "constructor") return null;
		const prototype: object = this.type.prototype;
		const found = findDescriptor(prototype, name, Object.prototype);
		if (found === undefined || typeof found.value !== "function") return null;
		return found.value;
	}

	/** Zero-argument construction. Errors from the constructor propagate. */
	construct(): T {
		return new this.type();
	}
}

/** Wrap a constructor, leaving an existing TypeInfo as it is. */
export function typeInfoOf(type: TypeInfo | Constructor): TypeInfo {
	return type instanceof TypeInfo ? type : new TypeInfo(type);
}

// =====================================================================
// MethodInfo
// =====================================================================

/**
 * Descriptor of one fixture method.
 *
 * `fixture` is the type the method was reflected from, which for an
 * inherited method is the derived fixture. `baseMethod` is the declaration
 * this one overrides; inherited annotation lookups walk that chain.
 */
export class MethodInfo {
	readonly parameters: readonly ParameterInfo[];
	readonly annotations: readonly Annotation[];

	constructor(
		readonly name: string,
		readonly fixture: TypeInfo,
		parameters: readonly ParameterInfo[],
		readonly returnType: string,
		annotations: readonly Annotation[],
		readonly baseMethod: MethodInfo | null = null,
	) {
		this.parameters = Object.freeze(parameters.map((p) => Object.freeze({ ...p })));
		this.annotations = Object.freeze([...annotations]);
		Object.freeze(this);
	}

	get fullName(): string {
		return `${this.fixture.name}.${this.name}`;
	}

	/** Annotations of the given class, own first, then each base declaration's. */
	getAnnotations<A extends Annotation>(type: AnnotationType<A>, inherit = false): A[] {
		const found = this.annotations.filter((a): a is A => a instanceof type);
		if (inherit && this.baseMethod !== null) {
			found.push(...this.baseMethod.getAnnotations(type, true));
		}
		return found;
	}

	/** All annotations, own first, then each base declaration's. */
	getAllAnnotations(inherit = false): Annotation[] {
		const found = [...this.annotations];
		if (inherit && this.baseMethod !== null) {
			found.push(...this.baseMethod.getAllAnnotations(true));
		}
		return found;
	}

	isDefined<A extends Annotation>(type: AnnotationType<A>, inherit = false): boolean {
		return this.getAnnotations(type, inherit).length > 0;
	}
}
