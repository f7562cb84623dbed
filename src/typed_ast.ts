import type { SymbolId, SymbolTable } from "./symbol_table";
import { SymbolKind } from "./symbol_table";
import type { TypeRegistry } from "./type_registry";
import { TypeKind, isConcreteType, type Span, type Type } from "./types";

// ============================================================================
// Typed Expression Kinds
// ============================================================================

/**
 * Fully type-checked expression trees handed over by inference. Every
 * node carries its final, concrete type.
 */
export enum TExprKind {
    Unit = 100,
    IntLit = 101,
    BoolLit = 102,
    Local = 103,
    Global = 104,
    Tuple = 105,
    Call = 106,
    Field = 107,
    Block = 108,
    Let = 109,
    Return = 110,
    Assign = 111,
    Ref = 112,
    Deref = 113,
    StructCons = 114,
    EnumCons = 115,
    EnumTag = 116,
    VariantField = 117,
    If = 118,
    While = 119,
    Index = 120,
    ArrayLit = 121,
}

type Node<K extends TExprKind, T> = { kind: K; ty: Type; span: Span } & T;

export type TUnit = Node<TExprKind.Unit, object>;
export type TIntLit = Node<TExprKind.IntLit, { value: number }>;
export type TBoolLit = Node<TExprKind.BoolLit, { value: boolean }>;
export type TLocal = Node<TExprKind.Local, { name: string }>;
export type TGlobal = Node<TExprKind.Global, { symbol: SymbolId }>;
export type TTuple = Node<TExprKind.Tuple, { elements: TExpr[] }>;
export type TCall = Node<TExprKind.Call, { callee: TExpr; args: TExpr[] }>;
// Struct fields by name, tuple elements by their decimal index
export type TField = Node<TExprKind.Field, { base: TExpr; field: string }>;
export type TBlock = Node<TExprKind.Block, { stmts: TExpr[]; tail: TExpr | null }>;
// Only valid as a block statement
export type TLet = Node<TExprKind.Let, { name: string; mutable: boolean; init: TExpr }>;
export type TReturn = Node<TExprKind.Return, { value: TExpr | null }>;
export type TAssign = Node<TExprKind.Assign, { place: TExpr; value: TExpr }>;
export type TRef = Node<TExprKind.Ref, { place: TExpr; mutable: boolean }>;
export type TDeref = Node<TExprKind.Deref, { ptr: TExpr }>;
export type TStructCons = Node<
    TExprKind.StructCons,
    { fields: { name: string; value: TExpr }[] }
>;
export type TEnumCons = Node<TExprKind.EnumCons, { ctor: SymbolId; args: TExpr[] }>;
export type TEnumTag = Node<TExprKind.EnumTag, { value: TExpr }>;
export type TVariantField = Node<
    TExprKind.VariantField,
    { value: TExpr; variant: number; index: number }
>;
export type TIf = Node<
    TExprKind.If,
    { cond: TExpr; then: TExpr; else: TExpr | null }
>;
export type TWhile = Node<TExprKind.While, { cond: TExpr; body: TExpr }>;
export type TIndex = Node<TExprKind.Index, { base: TExpr; index: TExpr }>;
export type TArrayLit = Node<TExprKind.ArrayLit, { elements: TExpr[] }>;

export type TExpr =
    | TUnit
    | TIntLit
    | TBoolLit
    | TLocal
    | TGlobal
    | TTuple
    | TCall
    | TField
    | TBlock
    | TLet
    | TReturn
    | TAssign
    | TRef
    | TDeref
    | TStructCons
    | TEnumCons
    | TEnumTag
    | TVariantField
    | TIf
    | TWhile
    | TIndex
    | TArrayLit;

// ============================================================================
// Functions and Programs
// ============================================================================

export type TParam = {
    name: string;
    ty: Type;
    mutable: boolean;
};

export type TypedFunction = {
    symbol: SymbolId;
    name: string;
    params: TParam[];
    returnType: Type;
    body: TExpr;
    span: Span;
};

export type TypedProgram = {
    file?: string;
    registry: TypeRegistry;
    symbols: SymbolTable;
    functions: TypedFunction[];
};

// ============================================================================
// Traversal
// ============================================================================

/**
 * Direct sub-expressions in evaluation order.
 */
export function childExprs(expr: TExpr): TExpr[] {
    switch (expr.kind) {
        case TExprKind.Unit:
        case TExprKind.IntLit:
        case TExprKind.BoolLit:
        case TExprKind.Local:
        case TExprKind.Global:
            return [];
        case TExprKind.Tuple:
        case TExprKind.ArrayLit:
            return expr.elements;
        case TExprKind.Call:
            return [expr.callee, ...expr.args];
        case TExprKind.Field:
            return [expr.base];
        case TExprKind.Block:
            return expr.tail ? [...expr.stmts, expr.tail] : expr.stmts;
        case TExprKind.Let:
            return [expr.init];
        case TExprKind.Return:
            return expr.value ? [expr.value] : [];
        case TExprKind.Assign:
            return [expr.place, expr.value];
        case TExprKind.Ref:
            return [expr.place];
        case TExprKind.Deref:
            return [expr.ptr];
        case TExprKind.StructCons:
            return expr.fields.map((f) => f.value);
        case TExprKind.EnumCons:
            return expr.args;
        case TExprKind.EnumTag:
        case TExprKind.VariantField:
            return [expr.value];
        case TExprKind.If:
            return expr.else ? [expr.cond, expr.then, expr.else] : [expr.cond, expr.then];
        case TExprKind.While:
            return [expr.cond, expr.body];
        case TExprKind.Index:
            return [expr.base, expr.index];
    }
}

function collectExprTypes(expr: TExpr, out: Type[]): void {
    out.push(expr.ty);
    if (expr.kind === TExprKind.Let) out.push(expr.init.ty);
    for (const child of childExprs(expr)) collectExprTypes(child, out);
}

function collectSignatureTypes(types: readonly Type[], out: Type[]): void {
    for (const type of types) {
        out.push(type);
        if (type.kind === TypeKind.Fn) {
            collectSignatureTypes([...type.params, type.returnType], out);
        }
    }
}

/**
 * Every concrete type the program mentions: signatures of non-generic
 * symbols, parameters, and the type of each expression. These are the
 * instantiations the layout cache precomputes.
 */
export function collectProgramTypes(program: TypedProgram): Type[] {
    const types: Type[] = [];
    for (const info of program.symbols.symbols()) {
        switch (info.sym.kind) {
            case SymbolKind.Function:
                if (info.sym.typeParams.length > 0) break;
                collectSignatureTypes([...info.sym.params, info.sym.returnType], types);
                break;
            case SymbolKind.TypeConstructor:
                collectSignatureTypes(info.sym.args, types);
                break;
            case SymbolKind.TypeAlias:
                collectSignatureTypes([info.sym.target], types);
                break;
        }
    }
    for (const fn of program.functions) {
        collectSignatureTypes(fn.params.map((p) => p.ty), types);
        collectSignatureTypes([fn.returnType], types);
        collectExprTypes(fn.body, types);
    }
    return types.filter(isConcreteType);
}
