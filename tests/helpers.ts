import type { BuiltinTypeName } from "../src/builtin_types";
import type { SymbolId } from "../src/symbol_table";
import { TExprKind, type TExpr, type TLet, type TParam, type TypedFunction } from "../src/typed_ast";
import { TypeRegistryBuilder } from "../src/type_registry";
import { makeTupleType, makeUnitType, type Span, type Type } from "../src/types";

export const SPAN: Span = { line: 1, column: 1, start: 0, end: 1 };

export function spanAt(line: number, column: number, length: number = 1): Span {
    return { line, column, start: 0, end: length };
}

/**
 * Registry builder with the builtins already registered, and a lookup
 * for their named types.
 */
export function makeRegistry(): {
    builder: TypeRegistryBuilder;
    ty: (name: BuiltinTypeName) => Type;
} {
    const builder = new TypeRegistryBuilder();
    builder.addBuiltins();
    return { builder, ty: (name) => builder.builtinType(name) };
}

// ---------------------------------------------------------------------------
// Typed tree builders
// ---------------------------------------------------------------------------

export const T = {
    unit(): TExpr {
        return { kind: TExprKind.Unit, ty: makeUnitType(), span: SPAN };
    },
    int(value: number, ty: Type): TExpr {
        return { kind: TExprKind.IntLit, ty, span: SPAN, value };
    },
    bool(value: boolean, ty: Type): TExpr {
        return { kind: TExprKind.BoolLit, ty, span: SPAN, value };
    },
    local(name: string, ty: Type): TExpr {
        return { kind: TExprKind.Local, ty, span: SPAN, name };
    },
    global(symbol: SymbolId, ty: Type): TExpr {
        return { kind: TExprKind.Global, ty, span: SPAN, symbol };
    },
    tuple(elements: TExpr[]): TExpr {
        return {
            kind: TExprKind.Tuple,
            ty: makeTupleType(elements.map((e) => e.ty)),
            span: SPAN,
            elements,
        };
    },
    call(callee: TExpr, args: TExpr[], ty: Type): TExpr {
        return { kind: TExprKind.Call, ty, span: SPAN, callee, args };
    },
    field(base: TExpr, field: string, ty: Type): TExpr {
        return { kind: TExprKind.Field, ty, span: SPAN, base, field };
    },
    block(stmts: TExpr[], tail: TExpr | null, ty?: Type): TExpr {
        return {
            kind: TExprKind.Block,
            ty: ty ?? tail?.ty ?? makeUnitType(),
            span: SPAN,
            stmts,
            tail,
        };
    },
    let(name: string, init: TExpr, mutable: boolean = false): TLet {
        return { kind: TExprKind.Let, ty: makeUnitType(), span: SPAN, name, mutable, init };
    },
    ret(value: TExpr | null, ty: Type): TExpr {
        return { kind: TExprKind.Return, ty, span: SPAN, value };
    },
    assign(place: TExpr, value: TExpr): TExpr {
        return { kind: TExprKind.Assign, ty: makeUnitType(), span: SPAN, place, value };
    },
    ref(place: TExpr, ty: Type, mutable: boolean = false): TExpr {
        return { kind: TExprKind.Ref, ty, span: SPAN, place, mutable };
    },
    deref(ptr: TExpr, ty: Type): TExpr {
        return { kind: TExprKind.Deref, ty, span: SPAN, ptr };
    },
    struct(ty: Type, fields: [string, TExpr][]): TExpr {
        return {
            kind: TExprKind.StructCons,
            ty,
            span: SPAN,
            fields: fields.map(([name, value]) => ({ name, value })),
        };
    },
    variant(ctor: SymbolId, args: TExpr[], ty: Type): TExpr {
        return { kind: TExprKind.EnumCons, ty, span: SPAN, ctor, args };
    },
    tag(value: TExpr, ty: Type): TExpr {
        return { kind: TExprKind.EnumTag, ty, span: SPAN, value };
    },
    variantField(value: TExpr, variant: number, index: number, ty: Type): TExpr {
        return { kind: TExprKind.VariantField, ty, span: SPAN, value, variant, index };
    },
    if(cond: TExpr, then: TExpr, otherwise: TExpr | null, ty: Type): TExpr {
        return { kind: TExprKind.If, ty, span: SPAN, cond, then, else: otherwise };
    },
    while(cond: TExpr, body: TExpr): TExpr {
        return { kind: TExprKind.While, ty: makeUnitType(), span: SPAN, cond, body };
    },
    index(base: TExpr, index: TExpr, ty: Type): TExpr {
        return { kind: TExprKind.Index, ty, span: SPAN, base, index };
    },
    array(elements: TExpr[], ty: Type): TExpr {
        return { kind: TExprKind.ArrayLit, ty, span: SPAN, elements };
    },
};

export function param(name: string, ty: Type, mutable: boolean = false): TParam {
    return { name, ty, mutable };
}

export function typedFunction(
    symbol: SymbolId,
    name: string,
    params: TParam[],
    returnType: Type,
    body: TExpr,
): TypedFunction {
    return { symbol, name, params, returnType, body, span: SPAN };
}
