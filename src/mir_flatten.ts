import { internalError } from "./diagnostics";
import { ZERO_SIZED } from "./memory_layout";
import {
    MExprKind,
    makeMLetIn,
    makeMSequence,
    makeMUnit,
    type MBlock,
    type MExpr,
    type StorageClass,
    type VarId,
} from "./mir";
import { makeUnitType } from "./types";

/**
 * Rewrite every block into right-nested `Sequence` / `LetIn` nodes.
 *
 * `{ s1; let x = i; s2; e }` becomes
 * `Sequence(s1, LetIn(x, i, Sequence(s2, e)))`. A block without a tail
 * yields unit, and so does a trailing `let`. Statements keep their source
 * order, and existing `Sequence` nodes are never reassociated, so running
 * this twice gives the same tree.
 */
export function flattenBlocks(
    expr: MExpr,
    storage: ReadonlyMap<VarId, StorageClass>,
): MExpr {
    const go = (e: MExpr): MExpr => flattenBlocks(e, storage);
    switch (expr.kind) {
        case MExprKind.Unit:
        case MExprKind.Const:
        case MExprKind.Local:
        case MExprKind.Global:
            return expr;
        case MExprKind.Tuple:
            return { ...expr, elements: expr.elements.map(go) };
        case MExprKind.ArrayLit:
            return { ...expr, elements: expr.elements.map(go) };
        case MExprKind.StructCons:
            return {
                ...expr,
                fields: expr.fields.map((f) => ({ index: f.index, value: go(f.value) })),
            };
        case MExprKind.EnumCons:
            return { ...expr, args: expr.args.map(go) };
        case MExprKind.Builtin:
            return { ...expr, args: expr.args.map(go) };
        case MExprKind.Call:
            return { ...expr, callee: go(expr.callee), args: expr.args.map(go) };
        case MExprKind.Field:
            return { ...expr, base: go(expr.base) };
        case MExprKind.VariantField:
            return { ...expr, base: go(expr.base) };
        case MExprKind.EnumTag:
            return { ...expr, base: go(expr.base) };
        case MExprKind.Index:
            return { ...expr, base: go(expr.base), index: go(expr.index) };
        case MExprKind.AddrOf:
            return { ...expr, place: go(expr.place) };
        case MExprKind.Deref:
            return { ...expr, ptr: go(expr.ptr) };
        case MExprKind.Assign:
            return { ...expr, place: go(expr.place), value: go(expr.value) };
        case MExprKind.Return:
            return { ...expr, value: expr.value ? go(expr.value) : null };
        case MExprKind.If:
            return {
                ...expr,
                cond: go(expr.cond),
                then: go(expr.then),
                else: expr.else ? go(expr.else) : null,
            };
        case MExprKind.While:
            return { ...expr, cond: go(expr.cond), body: go(expr.body) };
        case MExprKind.Sequence:
            return makeMSequence(go(expr.first), go(expr.second));
        case MExprKind.LetIn:
            return makeMLetIn(expr.binding, expr.storage, go(expr.init), go(expr.body));
        case MExprKind.Block:
            return flattenBlock(expr, storage);
        case MExprKind.Let:
            return internalError(
                `binding \`${expr.binding.name}\` appears outside of a block`,
            );
    }
}

function flattenBlock(
    block: MBlock,
    storage: ReadonlyMap<VarId, StorageClass>,
): MExpr {
    let rest: MExpr = block.tail
        ? flattenBlocks(block.tail, storage)
        : makeMUnit({ ty: makeUnitType(), layout: ZERO_SIZED, span: block.span });

    for (let i = block.stmts.length - 1; i >= 0; i--) {
        const stmt = block.stmts[i];
        if (stmt.kind === MExprKind.Let) {
            const { binding } = stmt;
            const storageClass =
                storage.get(binding.id) ??
                internalError(`no storage class for \`${binding.name}\``);
            rest = makeMLetIn(
                binding,
                storageClass,
                flattenBlocks(stmt.init, storage),
                rest,
            );
        } else {
            rest = makeMSequence(flattenBlocks(stmt, storage), rest);
        }
    }
    return rest;
}
