/**
 * Structural type model shared by the registry, the layout cache and
 * the lowering passes.
 */

export type TVar = number;

export type Span = { line: number; column: number; start: number; end: number };

export const TypeKind = {
    // Reference to a declared type, possibly applied to arguments
    Named: 0,
    // Type parameter of a generic declaration
    Param: 1,

    // Composite types
    Tuple: 2,
    Array: 3,

    // Indirections
    Ptr: 4,
    Fn: 5,
} as const satisfies Record<string, number>;

export type TypeKindValue = (typeof TypeKind)[keyof typeof TypeKind];

export type NamedType = {
    kind: typeof TypeKind.Named;
    tvar: TVar;
    name: string;
    args: Type[];
};

export type ParamType = {
    kind: typeof TypeKind.Param;
    name: string;
};

export type TupleType = {
    kind: typeof TypeKind.Tuple;
    elements: Type[];
};

export type ArrayType = {
    kind: typeof TypeKind.Array;
    element: Type;
    length: number;
};

export type PtrType = {
    kind: typeof TypeKind.Ptr;
    inner: Type;
    mutable: boolean;
};

export type FnType = {
    kind: typeof TypeKind.Fn;
    params: Type[];
    returnType: Type;
};

export type Type =
    | NamedType
    | ParamType
    | TupleType
    | ArrayType
    | PtrType
    | FnType;

// ============================================================================
// Constructors
// ============================================================================

function makeNamedType(tvar: TVar, name: string, args: Type[] = []): Type {
    return { kind: TypeKind.Named, tvar, name, args };
}

function makeParamType(name: string): Type {
    return { kind: TypeKind.Param, name };
}

function makeTupleType(elements: Type[]): Type {
    return { kind: TypeKind.Tuple, elements };
}

function makeUnitType(): Type {
    return makeTupleType([]);
}

function makeArrayType(element: Type, length: number): Type {
    return { kind: TypeKind.Array, element, length };
}

function makePtrType(inner: Type, mutable: boolean = false): Type {
    return { kind: TypeKind.Ptr, inner, mutable };
}

function makeFnType(params: Type[], returnType: Type): Type {
    return { kind: TypeKind.Fn, params, returnType };
}

// ============================================================================
// Type Utilities
// ============================================================================

function typesEqual(a: Type[], b: Type[]): boolean {
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
        if (!typeEquals(a[i], b[i])) return false;
    }
    return true;
}

function typeEquals(a: Type, b: Type): boolean {
    switch (a.kind) {
        case TypeKind.Named:
            return (
                b.kind === TypeKind.Named &&
                a.tvar === b.tvar &&
                typesEqual(a.args, b.args)
            );
        case TypeKind.Param:
            return b.kind === TypeKind.Param && a.name === b.name;
        case TypeKind.Tuple:
            return (
                b.kind === TypeKind.Tuple && typesEqual(a.elements, b.elements)
            );
        case TypeKind.Array:
            return (
                b.kind === TypeKind.Array &&
                a.length === b.length &&
                typeEquals(a.element, b.element)
            );
        case TypeKind.Ptr:
            return (
                b.kind === TypeKind.Ptr &&
                a.mutable === b.mutable &&
                typeEquals(a.inner, b.inner)
            );
        case TypeKind.Fn:
            return (
                b.kind === TypeKind.Fn &&
                typesEqual(a.params, b.params) &&
                typeEquals(a.returnType, b.returnType)
            );
    }
}

/**
 * Convert type to human-readable string
 */
function typeToString(type: Type): string {
    switch (type.kind) {
        case TypeKind.Named:
            if (type.args.length === 0) return type.name;
            return `${type.name}<${type.args.map(typeToString).join(", ")}>`;
        case TypeKind.Param:
            return type.name;
        case TypeKind.Tuple:
            if (type.elements.length === 1) {
                return `(${typeToString(type.elements[0])},)`;
            }
            return `(${type.elements.map(typeToString).join(", ")})`;
        case TypeKind.Array:
            return `[${typeToString(type.element)}; ${type.length}]`;
        case TypeKind.Ptr:
            return `*${type.mutable ? "mut" : "const"} ${typeToString(type.inner)}`;
        case TypeKind.Fn: {
            const params = type.params.map(typeToString).join(", ");
            return `fn(${params}) -> ${typeToString(type.returnType)}`;
        }
    }
}

/**
 * Replace type parameters by their bound arguments.
 * Parameters without a binding are left in place.
 */
function substituteType(type: Type, bindings: ReadonlyMap<string, Type>): Type {
    if (bindings.size === 0) return type;
    switch (type.kind) {
        case TypeKind.Param:
            return bindings.get(type.name) ?? type;
        case TypeKind.Named:
            if (type.args.length === 0) return type;
            return makeNamedType(
                type.tvar,
                type.name,
                type.args.map((arg) => substituteType(arg, bindings)),
            );
        case TypeKind.Tuple:
            return makeTupleType(
                type.elements.map((el) => substituteType(el, bindings)),
            );
        case TypeKind.Array:
            return makeArrayType(
                substituteType(type.element, bindings),
                type.length,
            );
        case TypeKind.Ptr:
            return makePtrType(substituteType(type.inner, bindings), type.mutable);
        case TypeKind.Fn:
            return makeFnType(
                type.params.map((p) => substituteType(p, bindings)),
                substituteType(type.returnType, bindings),
            );
    }
}

function makeTypeBindings(
    params: readonly string[],
    args: readonly Type[],
): Map<string, Type> {
    const bindings = new Map<string, Type>();
    params.forEach((param, i) => {
        const arg = args[i];
        if (arg !== undefined) bindings.set(param, arg);
    });
    return bindings;
}

/**
 * True when no type parameter occurs anywhere inside the type.
 */
function isConcreteType(type: Type): boolean {
    switch (type.kind) {
        case TypeKind.Param:
            return false;
        case TypeKind.Named:
            return type.args.every(isConcreteType);
        case TypeKind.Tuple:
            return type.elements.every(isConcreteType);
        case TypeKind.Array:
            return isConcreteType(type.element);
        case TypeKind.Ptr:
            return isConcreteType(type.inner);
        case TypeKind.Fn:
            return (
                type.params.every(isConcreteType) &&
                isConcreteType(type.returnType)
            );
    }
}

export {
    // Constructors
    makeNamedType,
    makeParamType,
    makeTupleType,
    makeUnitType,
    makeArrayType,
    makePtrType,
    makeFnType,
    // Type utilities
    typeEquals,
    typeToString,
    substituteType,
    makeTypeBindings,
    isConcreteType,
};
