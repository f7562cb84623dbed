import { BUILTIN_TYPES, BUILTIN_TYPE_NAMES, type BuiltinTypeName } from "./builtin_types";
import type { ScalarKind } from "./builtin_types";
import { internalError } from "./diagnostics";
import { makeNamedType, type Span, type TVar, type Type } from "./types";

// ============================================================================
// Type Definitions
// ============================================================================

export enum TypeDefKind {
    Builtin,
    Struct,
    Enum,
}

export type StructFieldDef = {
    name: string;
    type: Type;
};

export type EnumVariantDef = {
    name: string;
    payload: Type[];
};

export type BuiltinTypeDef = {
    kind: TypeDefKind.Builtin;
    size: number;
    align: number;
    scalar: ScalarKind | null;
};

export type StructTypeDef = {
    kind: TypeDefKind.Struct;
    params: string[];
    fields: StructFieldDef[];
};

export type EnumTypeDef = {
    kind: TypeDefKind.Enum;
    params: string[];
    variants: EnumVariantDef[];
};

export type TypeDefinition = {
    tvar: TVar;
    name: string;
    span: Span;
    def: BuiltinTypeDef | StructTypeDef | EnumTypeDef;
};

const NO_SPAN: Span = Object.freeze({ line: 0, column: 0, start: 0, end: 0 });

function isGenericDefinition(definition: TypeDefinition): boolean {
    return definition.def.kind !== TypeDefKind.Builtin && definition.def.params.length > 0;
}

// ============================================================================
// Registry
// ============================================================================

/**
 * Read-only table of every declared type, keyed by TVar.
 * Instances only come out of {@link TypeRegistryBuilder.build}.
 */
export class TypeRegistry {
    readonly #definitions: ReadonlyMap<TVar, TypeDefinition>;
    readonly #builtins: ReadonlyMap<string, TVar>;

    constructor(
        definitions: ReadonlyMap<TVar, TypeDefinition>,
        builtins: ReadonlyMap<string, TVar>,
    ) {
        this.#definitions = definitions;
        this.#builtins = builtins;
    }

    lookupType(tvar: TVar): TypeDefinition {
        return (
            this.#definitions.get(tvar) ??
            internalError(`unknown type variable #${tvar}`)
        );
    }

    has(tvar: TVar): boolean {
        return this.#definitions.has(tvar);
    }

    /**
     * All definitions in ascending TVar order.
     */
    definitions(): TypeDefinition[] {
        return [...this.#definitions.values()].sort((a, b) => a.tvar - b.tvar);
    }

    get size(): number {
        return this.#definitions.size;
    }

    builtinTVar(name: BuiltinTypeName): TVar {
        return (
            this.#builtins.get(name) ??
            internalError(`builtin type \`${name}\` is not registered`)
        );
    }

    /**
     * Named type referring to a registered builtin
     */
    builtinType(name: BuiltinTypeName): Type {
        return makeNamedType(this.builtinTVar(name), name);
    }
}

export class TypeRegistryBuilder {
    #definitions: Map<TVar, TypeDefinition>;
    #builtins: Map<string, TVar>;
    #declared: Map<TVar, string>;
    #nextTVar: TVar;
    #built: boolean;

    constructor() {
        this.#definitions = new Map();
        this.#builtins = new Map();
        this.#declared = new Map();
        this.#nextTVar = 1;
        this.#built = false;
    }

    #fresh(): TVar {
        if (this.#built) {
            internalError("type registry modified after it was built");
        }
        return this.#nextTVar++;
    }

    #insert(definition: TypeDefinition): TVar {
        this.#definitions.set(definition.tvar, Object.freeze(definition));
        return definition.tvar;
    }

    /**
     * Register every builtin scalar type. Returns the name-to-TVar map.
     */
    addBuiltins(): ReadonlyMap<string, TVar> {
        for (const name of BUILTIN_TYPE_NAMES) {
            if (this.#builtins.has(name)) continue;
            const spec = BUILTIN_TYPES[name];
            const tvar = this.#insert({
                tvar: this.#fresh(),
                name,
                span: NO_SPAN,
                def: {
                    kind: TypeDefKind.Builtin,
                    size: spec.size,
                    align: spec.align,
                    scalar: spec.scalar,
                },
            });
            this.#builtins.set(name, tvar);
        }
        return this.#builtins;
    }

    builtinType(name: BuiltinTypeName): Type {
        const tvar =
            this.#builtins.get(name) ??
            internalError(`builtin type \`${name}\` is not registered`);
        return makeNamedType(tvar, name);
    }

    /**
     * Reserve a TVar before its fields are known, so that mutually
     * recursive declarations can refer to each other.
     */
    declare(name: string): TVar {
        const tvar = this.#fresh();
        this.#declared.set(tvar, name);
        return tvar;
    }

    #take(tvar: TVar | null, name: string): TVar {
        if (tvar === null) return this.#fresh();
        const declaredName = this.#declared.get(tvar);
        if (declaredName === undefined) {
            internalError(`type variable #${tvar} was not declared`);
        }
        if (declaredName !== name) {
            internalError(
                `type variable #${tvar} declared as \`${declaredName}\`, defined as \`${name}\``,
            );
        }
        this.#declared.delete(tvar);
        return tvar;
    }

    addStruct(
        name: string,
        fields: StructFieldDef[],
        options: { params?: string[]; span?: Span; tvar?: TVar } = {},
    ): TVar {
        const { params = [], span = NO_SPAN, tvar = null } = options;
        return this.#insert({
            tvar: this.#take(tvar, name),
            name,
            span,
            def: { kind: TypeDefKind.Struct, params, fields },
        });
    }

    addEnum(
        name: string,
        variants: EnumVariantDef[],
        options: { params?: string[]; span?: Span; tvar?: TVar } = {},
    ): TVar {
        const { params = [], span = NO_SPAN, tvar = null } = options;
        return this.#insert({
            tvar: this.#take(tvar, name),
            name,
            span,
            def: { kind: TypeDefKind.Enum, params, variants },
        });
    }

    build(): TypeRegistry {
        if (this.#declared.size > 0) {
            const names = [...this.#declared.values()].join(", ");
            internalError(`declared types were never defined: ${names}`);
        }
        this.#built = true;
        return new TypeRegistry(new Map(this.#definitions), new Map(this.#builtins));
    }
}

export { NO_SPAN, isGenericDefinition };
