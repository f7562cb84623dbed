import { internalError } from "./diagnostics";
import { REGISTER_SIZE, type Layout } from "./memory_layout";
import {
    MExprKind,
    StorageClass,
    mirChildren,
    type MBinding,
    type MExpr,
    type VarId,
} from "./mir";

/**
 * A value fits one machine register when it has no bytes at all or
 * exactly the width of an integer register slot.
 */
export function fitsRegister(layout: Layout): boolean {
    const { size } = layout;
    return size === 0 || (size <= REGISTER_SIZE && (size & (size - 1)) === 0);
}

/**
 * Local a place expression is rooted at, looking through projections but
 * not through dereferences.
 */
export function placeRoot(place: MExpr): VarId | null {
    switch (place.kind) {
        case MExprKind.Local:
            return place.id;
        case MExprKind.Field:
        case MExprKind.VariantField:
        case MExprKind.Index:
            return placeRoot(place.base);
        default:
            return null;
    }
}

/**
 * Locals whose address is needed anywhere in `body`: taken with `&`, or
 * indexed by a value not known until run time.
 */
export function addressTakenLocals(body: MExpr): Set<VarId> {
    const taken = new Set<VarId>();
    const visit = (expr: MExpr): void => {
        if (expr.kind === MExprKind.AddrOf) {
            const root = placeRoot(expr.place);
            if (root !== null) taken.add(root);
        } else if (expr.kind === MExprKind.Index && expr.index.kind !== MExprKind.Const) {
            const root = placeRoot(expr.base);
            if (root !== null) taken.add(root);
        }
        for (const child of mirChildren(expr)) visit(child);
    };
    visit(body);
    return taken;
}

export function collectBindings(body: MExpr, out: MBinding[] = []): MBinding[] {
    if (body.kind === MExprKind.Let || body.kind === MExprKind.LetIn) {
        out.push(body.binding);
    }
    for (const child of mirChildren(body)) collectBindings(child, out);
    return out;
}

/**
 * Storage class of every parameter and local of a function. Decided over
 * the whole body, so an `&x` after the binding of `x` still counts.
 */
export function analyzeStorage(
    params: readonly MBinding[],
    body: MExpr,
): Map<VarId, StorageClass> {
    const taken = addressTakenLocals(body);
    const storage = new Map<VarId, StorageClass>();
    for (const binding of [...params, ...collectBindings(body)]) {
        if (storage.has(binding.id)) {
            internalError(`binding #${binding.id} \`${binding.name}\` is bound twice`);
        }
        storage.set(
            binding.id,
            fitsRegister(binding.layout) && !taken.has(binding.id)
                ? StorageClass.Register
                : StorageClass.Stack,
        );
    }
    return storage;
}
