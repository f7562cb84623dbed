import { StorageClass, MExprKind, type MExpr, type MirFunction, type VarId } from "./mir";
import type { SymbolId, SymbolTable } from "./symbol_table";
import { typeToString } from "./types";

// ============================================================================
// Helpers
// ============================================================================

type Names = {
    local: (id: VarId) => string;
    global: (symbol: SymbolId) => string;
};

function storageName(storage: StorageClass): string {
    return storage === StorageClass.Register ? "reg" : "stack";
}

function form(head: string, ...items: string[]): string {
    return items.length === 0 ? `(${head})` : `(${head} ${items.join(" ")})`;
}

// ============================================================================
// Expressions
// ============================================================================

function printExpr(expr: MExpr, names: Names): string {
    const p = (e: MExpr) => printExpr(e, names);
    switch (expr.kind) {
        case MExprKind.Unit:
            return "()";
        case MExprKind.Const:
            return String(expr.value);
        case MExprKind.Local:
            return names.local(expr.id);
        case MExprKind.Global:
            return `@${names.global(expr.symbol)}`;
        case MExprKind.Tuple:
            return form("tuple", ...expr.elements.map(p));
        case MExprKind.StructCons:
            return form("struct", ...expr.fields.map((f) => `.${f.index}=${p(f.value)}`));
        case MExprKind.EnumCons:
            return form("variant", String(expr.variant), ...expr.args.map(p));
        case MExprKind.ArrayLit:
            return form("array", ...expr.elements.map(p));
        case MExprKind.Call:
            return form("call", p(expr.callee), ...expr.args.map(p));
        case MExprKind.Builtin:
            return form(expr.op, ...expr.args.map(p));
        case MExprKind.Field:
            return form("field", p(expr.base), String(expr.index));
        case MExprKind.VariantField:
            return form("variant-field", p(expr.base), String(expr.variant), String(expr.index));
        case MExprKind.EnumTag:
            return form("tag", p(expr.base));
        case MExprKind.Index:
            return form("index", p(expr.base), p(expr.index));
        case MExprKind.AddrOf:
            return form("addr", p(expr.place));
        case MExprKind.Deref:
            return form("deref", p(expr.ptr));
        case MExprKind.Assign:
            return form("assign", p(expr.place), p(expr.value));
        case MExprKind.Return:
            return expr.value ? form("return", p(expr.value)) : form("return");
        case MExprKind.If:
            return expr.else
                ? form("if", p(expr.cond), p(expr.then), p(expr.else))
                : form("if", p(expr.cond), p(expr.then));
        case MExprKind.While:
            return form("while", p(expr.cond), p(expr.body));
        case MExprKind.Block: {
            const stmts = expr.stmts.map(p);
            return form("block", ...stmts, "=>", expr.tail ? p(expr.tail) : "()");
        }
        case MExprKind.Let:
            return form("let", names.local(expr.binding.id), p(expr.init));
        case MExprKind.Sequence:
            return form("seq", p(expr.first), p(expr.second));
        case MExprKind.LetIn:
            return form(
                "let-in",
                names.local(expr.binding.id),
                storageName(expr.storage),
                p(expr.init),
                p(expr.body),
            );
    }
}

function makeNames(fn: MirFunction | null, symbols: SymbolTable | null): Names {
    return {
        local: (id) => {
            const binding = fn?.bindings.get(id);
            return binding ? `${binding.name}.${id}` : `_.${id}`;
        },
        global: (symbol) =>
            symbols?.has(symbol) ? symbols.lookupSymbol(symbol).name : `#${symbol}`,
    };
}

/**
 * Single-line S-expression of a MIR tree. Locals print as `name.id`.
 */
export function printMirExpr(
    expr: MExpr,
    fn: MirFunction | null = null,
    symbols: SymbolTable | null = null,
): string {
    return printExpr(expr, makeNames(fn, symbols));
}

// ============================================================================
// Functions
// ============================================================================

export function printMirFunction(fn: MirFunction, symbols: SymbolTable | null = null): string {
    const names = makeNames(fn, symbols);
    const params = fn.params
        .map(
            ({ binding, storage }) =>
                `${names.local(binding.id)}: ${storageName(storage)} ${typeToString(binding.ty)}`,
        )
        .join(", ");
    return `fn ${fn.name}(${params}) -> ${typeToString(fn.returnType)} = ${printExpr(fn.body, names)}`;
}
