import type { Layout } from "./memory_layout";
import type { SymbolId } from "./symbol_table";
import type { Span, Type } from "./types";

// ============================================================================
// MIR Node Kinds (distinct range from the typed tree)
// ============================================================================

export enum MExprKind {
    Unit = 300,
    Const = 301,
    Local = 302,
    Global = 303,
    Tuple = 304,
    StructCons = 305,
    EnumCons = 306,
    ArrayLit = 307,
    Call = 308,
    Builtin = 309,
    Field = 310,
    VariantField = 311,
    EnumTag = 312,
    Index = 313,
    AddrOf = 314,
    Deref = 315,
    Assign = 316,
    Return = 317,
    If = 318,
    While = 319,

    // Only before flattening
    Block = 330,
    Let = 331,

    // Only after flattening
    Sequence = 340,
    LetIn = 341,
}

export enum StorageClass {
    Register = 0,
    Stack = 1,
}

export type VarId = number;

export type MBinding = {
    id: VarId;
    name: string;
    ty: Type;
    layout: Layout;
    mutable: boolean;
};

type Node<K extends MExprKind, T> = { kind: K; ty: Type; layout: Layout; span: Span } & T;

export type MUnit = Node<MExprKind.Unit, object>;
export type MConst = Node<MExprKind.Const, { value: number }>;
export type MLocal = Node<MExprKind.Local, { id: VarId }>;
export type MGlobal = Node<MExprKind.Global, { symbol: SymbolId }>;
export type MTuple = Node<MExprKind.Tuple, { elements: MExpr[] }>;
// `fields` in source order; `index` is the declaration position
export type MStructCons = Node<
    MExprKind.StructCons,
    { fields: { index: number; value: MExpr }[] }
>;
export type MEnumCons = Node<MExprKind.EnumCons, { variant: number; args: MExpr[] }>;
export type MArrayLit = Node<MExprKind.ArrayLit, { elements: MExpr[] }>;
export type MCall = Node<MExprKind.Call, { callee: MExpr; args: MExpr[] }>;
export type MBuiltin = Node<MExprKind.Builtin, { op: string; args: MExpr[] }>;
export type MField = Node<MExprKind.Field, { base: MExpr; index: number }>;
export type MVariantField = Node<
    MExprKind.VariantField,
    { base: MExpr; variant: number; index: number }
>;
export type MEnumTag = Node<MExprKind.EnumTag, { base: MExpr }>;
export type MIndex = Node<MExprKind.Index, { base: MExpr; index: MExpr }>;
export type MAddrOf = Node<MExprKind.AddrOf, { place: MExpr }>;
export type MDeref = Node<MExprKind.Deref, { ptr: MExpr }>;
export type MAssign = Node<MExprKind.Assign, { place: MExpr; value: MExpr }>;
export type MReturn = Node<MExprKind.Return, { value: MExpr | null }>;
export type MIf = Node<MExprKind.If, { cond: MExpr; then: MExpr; else: MExpr | null }>;
export type MWhile = Node<MExprKind.While, { cond: MExpr; body: MExpr }>;
export type MBlock = Node<MExprKind.Block, { stmts: MExpr[]; tail: MExpr | null }>;
export type MLet = Node<MExprKind.Let, { binding: MBinding; init: MExpr }>;
export type MSequence = Node<MExprKind.Sequence, { first: MExpr; second: MExpr }>;
export type MLetIn = Node<
    MExprKind.LetIn,
    { binding: MBinding; storage: StorageClass; init: MExpr; body: MExpr }
>;

export type MExpr =
    | MUnit
    | MConst
    | MLocal
    | MGlobal
    | MTuple
    | MStructCons
    | MEnumCons
    | MArrayLit
    | MCall
    | MBuiltin
    | MField
    | MVariantField
    | MEnumTag
    | MIndex
    | MAddrOf
    | MDeref
    | MAssign
    | MReturn
    | MIf
    | MWhile
    | MBlock
    | MLet
    | MSequence
    | MLetIn;

export type MParam = {
    binding: MBinding;
    storage: StorageClass;
};

export type MirFunction = {
    symbol: SymbolId;
    name: string;
    params: MParam[];
    returnType: Type;
    returnLayout: Layout;
    bindings: ReadonlyMap<VarId, MBinding>;
    storage: ReadonlyMap<VarId, StorageClass>;
    body: MExpr;
};

// ============================================================================
// Constructors
// ============================================================================

type Meta = { ty: Type; layout: Layout; span: Span };

export function makeMUnit(meta: Meta): MUnit {
    return { kind: MExprKind.Unit, ...meta };
}

export function makeMSequence(first: MExpr, second: MExpr): MSequence {
    return {
        kind: MExprKind.Sequence,
        ty: second.ty,
        layout: second.layout,
        span: second.span,
        first,
        second,
    };
}

export function makeMLetIn(
    binding: MBinding,
    storage: StorageClass,
    init: MExpr,
    body: MExpr,
): MLetIn {
    return {
        kind: MExprKind.LetIn,
        ty: body.ty,
        layout: body.layout,
        span: init.span,
        binding,
        storage,
        init,
        body,
    };
}

/**
 * Direct sub-expressions in evaluation order.
 */
export function mirChildren(expr: MExpr): MExpr[] {
    switch (expr.kind) {
        case MExprKind.Unit:
        case MExprKind.Const:
        case MExprKind.Local:
        case MExprKind.Global:
            return [];
        case MExprKind.Tuple:
        case MExprKind.ArrayLit:
            return expr.elements;
        case MExprKind.StructCons:
            return expr.fields.map((f) => f.value);
        case MExprKind.EnumCons:
        case MExprKind.Builtin:
            return expr.args;
        case MExprKind.Call:
            return [expr.callee, ...expr.args];
        case MExprKind.Field:
        case MExprKind.VariantField:
        case MExprKind.EnumTag:
            return [expr.base];
        case MExprKind.Index:
            return [expr.base, expr.index];
        case MExprKind.AddrOf:
            return [expr.place];
        case MExprKind.Deref:
            return [expr.ptr];
        case MExprKind.Assign:
            return [expr.place, expr.value];
        case MExprKind.Return:
            return expr.value ? [expr.value] : [];
        case MExprKind.If:
            return expr.else ? [expr.cond, expr.then, expr.else] : [expr.cond, expr.then];
        case MExprKind.While:
            return [expr.cond, expr.body];
        case MExprKind.Block:
            return expr.tail ? [...expr.stmts, expr.tail] : expr.stmts;
        case MExprKind.Let:
            return [expr.init];
        case MExprKind.Sequence:
            return [expr.first, expr.second];
        case MExprKind.LetIn:
            return [expr.init, expr.body];
    }
}
