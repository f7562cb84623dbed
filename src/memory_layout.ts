/**
 * Memory Layout Calculation
 *
 * Computes size, alignment, and member offsets for every registered type
 * once, then answers lookups without recomputing anything.
 */

import { SCALAR_NAMES, ScalarKind } from "./builtin_types";
import {
    type Diagnostic,
    formatUnboundedRecursiveType,
    internalError,
    note,
    spanToSourceSpan,
    withRelated,
} from "./diagnostics";
import { findCycle, makeDependencyGraph, topoSort } from "./type_sort";
import {
    TypeDefKind,
    isGenericDefinition,
    type TypeDefinition,
    type TypeRegistry,
} from "./type_registry";
import {
    TypeKind,
    makeTypeBindings,
    substituteType,
    typeToString,
    type TVar,
    type Type,
} from "./types";

// ============================================================================
// Layout Structure
// ============================================================================

export const POINTER_SIZE = 8;
export const REGISTER_SIZE = 8;

export enum ReprKind {
    Scalar,
    Aggregate,
    Array,
}

export type LayoutMember = {
    name: string;
    offset: number;
    layout: Layout;
};

export type ScalarRepr = { kind: ReprKind.Scalar; scalar: ScalarKind };

/**
 * Structs and tuples list their fields. Enums list the tag (when `tagged`)
 * followed by one member per variant, all placed at the payload offset.
 */
export type AggregateRepr = {
    kind: ReprKind.Aggregate;
    members: LayoutMember[];
    tagged: boolean;
};

export type ArrayRepr = { kind: ReprKind.Array; element: Layout; count: number };

export type Layout = {
    size: number;
    align: number;
    repr: ScalarRepr | AggregateRepr | ArrayRepr;
};

function makeLayout(size: number, align: number, repr: Layout["repr"]): Layout {
    return Object.freeze({ size, align, repr });
}

function scalarLayout(scalar: ScalarKind, size: number, align: number = size): Layout {
    return makeLayout(size, align, { kind: ReprKind.Scalar, scalar });
}

const ZERO_SIZED: Layout = makeLayout(0, 1, {
    kind: ReprKind.Aggregate,
    members: [],
    tagged: false,
});

const POINTER_LAYOUT = scalarLayout(ScalarKind.Ptr, POINTER_SIZE);
const FN_POINTER_LAYOUT = scalarLayout(ScalarKind.FnPtr, POINTER_SIZE);

// ============================================================================
// Alignment Utilities
// ============================================================================

/**
 * Align offset up to the next alignment boundary
 */
function alignTo(offset: number, alignment: number): number {
    if (alignment <= 1) return offset;
    const remainder = offset % alignment;
    if (remainder === 0) return offset;
    return offset + (alignment - remainder);
}

function isPowerOfTwo(n: number): boolean {
    return Number.isInteger(n) && n > 0 && (n & (n - 1)) === 0;
}

/**
 * Bytes needed for a discriminant that enumerates `variantCount` values.
 * Zero or one variant needs no tag at all.
 */
function calculateTagSize(variantCount: number): number {
    if (variantCount <= 1) return 0;
    if (variantCount <= 0x100) return 1;
    if (variantCount <= 0x10000) return 2;
    if (variantCount <= 0x100000000) return 4;
    return 8;
}

function tagScalar(tagSize: number): ScalarKind {
    switch (tagSize) {
        case 1:
            return ScalarKind.U8;
        case 2:
            return ScalarKind.U16;
        case 4:
            return ScalarKind.U32;
        case 8:
            return ScalarKind.U64;
        default:
            return internalError(`no tag scalar of ${tagSize} bytes`);
    }
}

// ============================================================================
// Composite Layouts
// ============================================================================

export type NamedLayout = { name: string; layout: Layout };

/**
 * Fields in declaration order, each at the running offset rounded up to
 * its alignment. Tail padding rounds the size to the largest alignment.
 */
function layoutStruct(fields: readonly NamedLayout[]): Layout {
    if (fields.length === 0) return ZERO_SIZED;

    const members: LayoutMember[] = [];
    let currentOffset = 0;
    let maxAlign = 1;
    for (const field of fields) {
        maxAlign = Math.max(maxAlign, field.layout.align);
        currentOffset = alignTo(currentOffset, field.layout.align);
        members.push({ name: field.name, offset: currentOffset, layout: field.layout });
        currentOffset += field.layout.size;
    }
    const size = alignTo(currentOffset, maxAlign);
    return makeLayout(size, maxAlign, {
        kind: ReprKind.Aggregate,
        members,
        tagged: false,
    });
}

function layoutTuple(elements: readonly Layout[]): Layout {
    return layoutStruct(elements.map((layout, i) => ({ name: String(i), layout })));
}

function layoutArray(element: Layout, count: number): Layout {
    if (count === 0) {
        return makeLayout(0, 1, { kind: ReprKind.Array, element, count });
    }
    return makeLayout(element.size * count, element.align, {
        kind: ReprKind.Array,
        element,
        count,
    });
}

/**
 * Tagged union: the tag sits at offset 0, and every variant's payload
 * (laid out as a struct) starts at the tag size rounded up to the largest
 * variant alignment. The whole is aligned to the larger of the tag and
 * variant alignments.
 */
function layoutEnum(variants: readonly { name: string; payload: Layout }[]): Layout {
    if (variants.length === 0) return ZERO_SIZED;

    const tagSize = calculateTagSize(variants.length);
    let maxVariantSize = 0;
    let maxVariantAlign = 1;
    for (const variant of variants) {
        maxVariantSize = Math.max(maxVariantSize, variant.payload.size);
        maxVariantAlign = Math.max(maxVariantAlign, variant.payload.align);
    }

    const payloadOffset = alignTo(tagSize, maxVariantAlign);
    const align = Math.max(Math.max(tagSize, 1), maxVariantAlign);
    const size = alignTo(payloadOffset + maxVariantSize, align);

    const members: LayoutMember[] = [];
    if (tagSize > 0) {
        members.push({ name: "tag", offset: 0, layout: scalarLayout(tagScalar(tagSize), tagSize) });
    }
    for (const variant of variants) {
        members.push({ name: variant.name, offset: payloadOffset, layout: variant.payload });
    }
    return makeLayout(size, align, {
        kind: ReprKind.Aggregate,
        members,
        tagged: tagSize > 0,
    });
}

/**
 * Tag member of an enum layout, or null for an untagged enum.
 */
function enumTagMember(layout: Layout): LayoutMember | null {
    if (layout.repr.kind !== ReprKind.Aggregate || !layout.repr.tagged) return null;
    return layout.repr.members[0] ?? null;
}

function enumVariantMember(layout: Layout, variant: number): LayoutMember {
    if (layout.repr.kind !== ReprKind.Aggregate) {
        return internalError("variant projection from a non-aggregate layout");
    }
    const index = variant + (layout.repr.tagged ? 1 : 0);
    return (
        layout.repr.members[index] ??
        internalError(`enum layout has no variant #${variant}`)
    );
}

function aggregateMember(layout: Layout, index: number): LayoutMember {
    if (layout.repr.kind !== ReprKind.Aggregate) {
        return internalError("member projection from a non-aggregate layout");
    }
    return layout.repr.members[index] ?? internalError(`layout has no member #${index}`);
}

// ============================================================================
// Printing and Checks
// ============================================================================

function describeLayout(layout: Layout): string {
    switch (layout.repr.kind) {
        case ReprKind.Scalar:
            return SCALAR_NAMES[layout.repr.scalar];
        case ReprKind.Array:
            return `[${describeLayout(layout.repr.element)}; ${layout.repr.count}]`;
        case ReprKind.Aggregate: {
            const members = layout.repr.members
                .map((m) => `${m.name}@${m.offset}: ${describeLayout(m.layout)}`)
                .join(", ");
            return `${layout.repr.tagged ? "tagged " : ""}{${members}}`;
        }
    }
}

/**
 * `{a@0: i32, b@4: u8} size=8 align=4`
 */
function layoutToString(layout: Layout): string {
    return `${describeLayout(layout)} size=${layout.size} align=${layout.align}`;
}

/**
 * Violated layout invariants, empty when the layout is well formed.
 */
function checkLayoutInvariants(layout: Layout, path: string = "layout"): string[] {
    const problems: string[] = [];
    if (!isPowerOfTwo(layout.align)) {
        problems.push(`${path}: alignment ${layout.align} is not a power of two`);
    }
    if (layout.size < 0 || layout.size % layout.align !== 0) {
        problems.push(`${path}: size ${layout.size} is not a multiple of ${layout.align}`);
    }
    switch (layout.repr.kind) {
        case ReprKind.Scalar:
            break;
        case ReprKind.Array: {
            const { element, count } = layout.repr;
            if (element.size * count !== layout.size) {
                problems.push(`${path}: array size does not match ${count} elements`);
            }
            problems.push(...checkLayoutInvariants(element, `${path}[]`));
            break;
        }
        case ReprKind.Aggregate: {
            let previous = 0;
            for (const member of layout.repr.members) {
                const memberPath = `${path}.${member.name}`;
                if (member.offset < previous) {
                    problems.push(`${memberPath}: offset ${member.offset} decreases`);
                }
                if (member.offset + member.layout.size > layout.size) {
                    problems.push(`${memberPath}: extends past size ${layout.size}`);
                }
                previous = member.offset;
                problems.push(...checkLayoutInvariants(member.layout, memberPath));
            }
            break;
        }
    }
    return problems;
}

/**
 * Key of a fully substituted type. Equal types have equal keys.
 */
function typeKey(type: Type): string {
    switch (type.kind) {
        case TypeKind.Named:
            if (type.args.length === 0) return `${type.name}#${type.tvar}`;
            return `${type.name}#${type.tvar}<${type.args.map(typeKey).join(",")}>`;
        case TypeKind.Param:
            return internalError(`type parameter \`${type.name}\` reached layout`);
        case TypeKind.Tuple:
            return `(${type.elements.map(typeKey).join(",")})`;
        case TypeKind.Array:
            return `[${typeKey(type.element)};${type.length}]`;
        case TypeKind.Ptr:
            return "*";
        case TypeKind.Fn:
            return "fn";
    }
}

// ============================================================================
// Layout Cache
// ============================================================================

export type LayoutComputation = {
    cache: LayoutCache;
    diagnostics: Diagnostic[];
};

/**
 * Layouts of every registered type, computed once by
 * {@link LayoutCache.compute} and immutable afterwards.
 */
class LayoutCache {
    readonly #byTVar: ReadonlyMap<TVar, Layout>;
    readonly #byKey: ReadonlyMap<string, Layout>;

    private constructor(
        byTVar: ReadonlyMap<TVar, Layout>,
        byKey: ReadonlyMap<string, Layout>,
    ) {
        this.#byTVar = byTVar;
        this.#byKey = byKey;
    }

    /**
     * Lay out every registered type in dependency order, then every
     * generic instantiation, tuple and array among `extraTypes`. Types on
     * a direct-embedding cycle are reported and left out, together with
     * the types that embed them.
     */
    static compute(
        registry: TypeRegistry,
        extraTypes: Iterable<Type> = [],
        options: { file?: string } = {},
    ): LayoutComputation {
        const graph = makeDependencyGraph(registry);
        const { order, cycles, blocked } = topoSort(graph);
        const diagnostics: Diagnostic[] = [];

        const cycleSet = new Set(cycles);
        for (const tvar of cycles) {
            const definition = registry.lookupType(tvar);
            const path = findCycle(graph, tvar, cycleSet) ?? [tvar];
            const names = path.map((member) => registry.lookupType(member).name);
            let diag = formatUnboundedRecursiveType(
                definition.name,
                spanToSourceSpan(definition.span, options.file),
                names,
            );
            for (const member of path) {
                if (member === tvar) continue;
                const other = registry.lookupType(member);
                diag = withRelated(
                    diag,
                    spanToSourceSpan(other.span, options.file),
                    `\`${other.name}\` is part of the cycle`,
                );
            }
            diagnostics.push(diag);
        }
        for (const tvar of blocked) {
            const definition = registry.lookupType(tvar);
            diagnostics.push(
                note(
                    `\`${definition.name}\` has no layout because it embeds a recursive type`,
                    spanToSourceSpan(definition.span, options.file),
                ),
            );
        }

        const builder = new LayoutBuilder(registry, new Set([...cycles, ...blocked]));
        for (const tvar of order) {
            const definition = registry.lookupType(tvar);
            if (isGenericDefinition(definition)) continue;
            builder.resolveDefinition(definition);
        }
        for (const type of extraTypes) {
            builder.resolve(type);
        }
        return {
            cache: new LayoutCache(builder.byTVar, builder.byKey),
            diagnostics,
        };
    }

    /**
     * Layout of a concrete type. Tuples and arrays that were not
     * precomputed are composed from cached member layouts.
     */
    getLayout(type: Type): Layout {
        switch (type.kind) {
            case TypeKind.Ptr:
                return POINTER_LAYOUT;
            case TypeKind.Fn:
                return FN_POINTER_LAYOUT;
            case TypeKind.Param:
                return internalError(`type parameter \`${type.name}\` has no layout`);
            case TypeKind.Named:
                if (type.args.length === 0) return this.getTVarLayout(type.tvar);
                return (
                    this.#byKey.get(typeKey(type)) ??
                    internalError(`no layout for \`${typeToString(type)}\``)
                );
            case TypeKind.Tuple:
                return (
                    this.#byKey.get(typeKey(type)) ??
                    layoutTuple(type.elements.map((el) => this.getLayout(el)))
                );
            case TypeKind.Array:
                return (
                    this.#byKey.get(typeKey(type)) ??
                    layoutArray(this.getLayout(type.element), type.length)
                );
        }
    }

    getTVarLayout(tvar: TVar): Layout {
        return this.#byTVar.get(tvar) ?? internalError(`no layout for type variable #${tvar}`);
    }

    hasLayout(type: Type): boolean {
        switch (type.kind) {
            case TypeKind.Ptr:
            case TypeKind.Fn:
                return true;
            case TypeKind.Param:
                return false;
            case TypeKind.Named:
                if (type.args.length === 0) return this.#byTVar.has(type.tvar);
                return this.#byKey.has(typeKey(type));
            case TypeKind.Tuple:
                return type.elements.every((el) => this.hasLayout(el));
            case TypeKind.Array:
                return this.hasLayout(type.element);
        }
    }

    /**
     * Number of cached layouts, by TVar and by instantiation key.
     */
    get size(): number {
        return this.#byTVar.size + this.#byKey.size;
    }
}

/**
 * Mutable side of {@link LayoutCache.compute}. Each layout is computed at
 * most once; `resolve` returns null for types that embed an unsized type.
 */
class LayoutBuilder {
    readonly byTVar: Map<TVar, Layout>;
    readonly byKey: Map<string, Layout>;
    readonly #registry: TypeRegistry;
    readonly #unsized: ReadonlySet<TVar>;

    constructor(registry: TypeRegistry, unsized: ReadonlySet<TVar>) {
        this.byTVar = new Map();
        this.byKey = new Map();
        this.#registry = registry;
        this.#unsized = unsized;
    }

    resolveDefinition(definition: TypeDefinition): Layout | null {
        const cached = this.byTVar.get(definition.tvar);
        if (cached) return cached;
        if (this.#unsized.has(definition.tvar)) return null;
        const layout = this.#layoutDefinition(definition, new Map());
        if (layout) this.byTVar.set(definition.tvar, layout);
        return layout;
    }

    resolve(type: Type): Layout | null {
        switch (type.kind) {
            case TypeKind.Ptr:
                return POINTER_LAYOUT;
            case TypeKind.Fn:
                return FN_POINTER_LAYOUT;
            case TypeKind.Param:
                return internalError(`type parameter \`${type.name}\` has no layout`);
            case TypeKind.Named: {
                if (this.#unsized.has(type.tvar)) return null;
                const definition = this.#registry.lookupType(type.tvar);
                if (type.args.length === 0) {
                    if (isGenericDefinition(definition)) {
                        return internalError(
                            `generic type \`${definition.name}\` used without arguments`,
                        );
                    }
                    return this.resolveDefinition(definition);
                }
                return this.#memo(type, () => {
                    const params =
                        definition.def.kind === TypeDefKind.Builtin ? [] : definition.def.params;
                    return this.#layoutDefinition(
                        definition,
                        makeTypeBindings(params, type.args),
                    );
                });
            }
            case TypeKind.Tuple:
                return this.#memo(type, () => {
                    const elements: Layout[] = [];
                    for (const el of type.elements) {
                        const layout = this.resolve(el);
                        if (!layout) return null;
                        elements.push(layout);
                    }
                    return layoutTuple(elements);
                });
            case TypeKind.Array:
                return this.#memo(type, () => {
                    const element = this.resolve(type.element);
                    return element ? layoutArray(element, type.length) : null;
                });
        }
    }

    #memo(type: Type, compute: () => Layout | null): Layout | null {
        const key = typeKey(type);
        const cached = this.byKey.get(key);
        if (cached) return cached;
        const layout = compute();
        if (layout) this.byKey.set(key, layout);
        return layout;
    }

    #resolveAll(types: readonly Type[], bindings: ReadonlyMap<string, Type>): Layout[] | null {
        const layouts: Layout[] = [];
        for (const type of types) {
            const layout = this.resolve(substituteType(type, bindings));
            if (!layout) return null;
            layouts.push(layout);
        }
        return layouts;
    }

    #layoutDefinition(
        definition: TypeDefinition,
        bindings: ReadonlyMap<string, Type>,
    ): Layout | null {
        const { def } = definition;
        switch (def.kind) {
            case TypeDefKind.Builtin:
                if (def.scalar === null) {
                    return def.size === 0
                        ? ZERO_SIZED
                        : internalError(`builtin \`${definition.name}\` has no scalar kind`);
                }
                return scalarLayout(def.scalar, def.size, def.align);
            case TypeDefKind.Struct: {
                const layouts = this.#resolveAll(
                    def.fields.map((field) => field.type),
                    bindings,
                );
                if (!layouts) return null;
                return layoutStruct(
                    def.fields.map((field, i) => ({ name: field.name, layout: layouts[i] })),
                );
            }
            case TypeDefKind.Enum: {
                const variants: { name: string; payload: Layout }[] = [];
                for (const variant of def.variants) {
                    const layouts = this.#resolveAll(variant.payload, bindings);
                    if (!layouts) return null;
                    variants.push({ name: variant.name, payload: layoutTuple(layouts) });
                }
                return layoutEnum(variants);
            }
        }
    }
}

// ============================================================================
// Exports
// ============================================================================

export {
    makeLayout,
    scalarLayout,
    ZERO_SIZED,
    POINTER_LAYOUT,
    FN_POINTER_LAYOUT,
    // Composite layouts
    layoutStruct,
    layoutTuple,
    layoutArray,
    layoutEnum,
    enumTagMember,
    enumVariantMember,
    aggregateMember,
    // Utilities
    alignTo,
    isPowerOfTwo,
    calculateTagSize,
    layoutToString,
    checkLayoutInvariants,
    typeKey,
    // Cache
    LayoutCache,
};
