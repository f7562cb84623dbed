import {
    CExprKind,
    CORE_TYPE_NAMES,
    type CExpr,
    type CoreFunction,
    type CoreProgram,
    type CoreSignature,
    type CoreType,
} from "./core";
import { StorageClass } from "./mir";

// ============================================================================
// Helpers
// ============================================================================

function local(id: number): string {
    return `%${id}`;
}

function printType(ty: CoreType | null): string {
    return ty === null ? "()" : CORE_TYPE_NAMES[ty];
}

function storageName(storage: StorageClass): string {
    return storage === StorageClass.Register ? "reg" : "stack";
}

function form(head: string, ...items: string[]): string {
    return items.length === 0 ? `(${head})` : `(${head} ${items.join(" ")})`;
}

// ============================================================================
// Expressions
// ============================================================================

/**
 * Single-line S-expression of a Core tree.
 */
export function printCoreExpr(expr: CExpr): string {
    const p = printCoreExpr;
    switch (expr.kind) {
        case CExprKind.Unit:
            return "()";
        case CExprKind.Const:
            return `${expr.value}:${printType(expr.ty)}`;
        case CExprKind.Local:
            return local(expr.id);
        case CExprKind.Global:
            return `@${expr.name}`;
        case CExprKind.Let:
            return form(
                "let",
                local(expr.id),
                storageName(expr.storage),
                printType(expr.ty),
                p(expr.init),
                p(expr.body),
            );
        case CExprKind.Seq:
            return form("seq", p(expr.first), p(expr.second));
        case CExprKind.Set:
            return form("set", local(expr.id), p(expr.value));
        case CExprKind.StackSlot:
            return form("slot", String(expr.slot), String(expr.size), String(expr.align));
        case CExprKind.PtrOffset:
            return form("offset", p(expr.ptr), String(expr.offset));
        case CExprKind.PtrIndex:
            return form("ptr-index", p(expr.ptr), p(expr.index), String(expr.stride));
        case CExprKind.Load:
            return form("load", printType(expr.ty), p(expr.ptr), String(expr.offset));
        case CExprKind.Store:
            return form(
                "store",
                printType(expr.ty),
                p(expr.ptr),
                String(expr.offset),
                p(expr.value),
            );
        case CExprKind.Copy:
            return form("copy", p(expr.dst), p(expr.src), String(expr.size));
        case CExprKind.Extract:
            return form("extract", printType(expr.ty), p(expr.value), String(expr.offset));
        case CExprKind.Insert:
            return form(
                "insert",
                printType(expr.ty),
                p(expr.value),
                String(expr.offset),
                printType(expr.fieldTy),
                p(expr.field),
            );
        case CExprKind.Call:
            return form("call", p(expr.callee), ...expr.args.map(p));
        case CExprKind.Builtin:
            return form(expr.op, printType(expr.ty), ...expr.args.map(p));
        case CExprKind.Return:
            return expr.value ? form("return", p(expr.value)) : form("return");
        case CExprKind.If:
            return form("if", p(expr.cond), p(expr.then), p(expr.else));
        case CExprKind.While:
            return form("while", p(expr.cond), p(expr.body));
    }
}

// ============================================================================
// Functions
// ============================================================================

export function printCoreFunction(fn: CoreFunction): string {
    const params = fn.params
        .map((param) => `${local(param.id)} ${param.name}: ${storageName(param.storage)} ${printType(param.ty)}`)
        .join(", ");
    return `fn ${fn.linkName}(${params}) -> ${printType(fn.ret)} {\n  ${printCoreExpr(fn.body)}\n}`;
}

function printSignature(sig: CoreSignature): string {
    const linkage = sig.isExtern ? "extern " : "";
    const params = sig.params.map(printType).join(", ");
    return `${linkage}decl ${sig.linkName}(${params}) -> ${printType(sig.ret)}`;
}

export function printCoreProgram(program: CoreProgram): string {
    const sections: string[] = [];
    for (const sig of program.signatures) {
        sections.push(printSignature(sig));
    }
    for (const fn of program.functions) {
        sections.push(printCoreFunction(fn));
    }
    return sections.join("\n\n");
}
