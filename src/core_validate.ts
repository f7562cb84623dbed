import {
    CExprKind,
    CORE_TYPE_SIZES,
    splitOffset,
    type CExpr,
    type CoreFunction,
    type CoreVar,
} from "./core";
import { StorageClass } from "./mir";

// ============================================================================
// Validation Error Types
// ============================================================================

const ValidationErrorKind = {
    UndefinedLocal: 0,
    DuplicateDefinition: 1,
    StackBindingWrite: 2,
    SlotOutOfBounds: 3,
    ReturnArity: 4,
} as const;

type ValidationErrorKindValue =
    (typeof ValidationErrorKind)[keyof typeof ValidationErrorKind];

type ValidationError = {
    kind: ValidationErrorKindValue;
    message: string;
    local?: CoreVar;
};

type ValidationResult = {
    ok: boolean;
    errors: ValidationError[];
};

function makeValidationError(
    kind: ValidationErrorKindValue,
    message: string,
    local?: CoreVar,
): ValidationError {
    return { kind, message, local };
}

function errUndefinedLocal(id: CoreVar, context: string): ValidationError {
    return makeValidationError(
        ValidationErrorKind.UndefinedLocal,
        `Undefined local %${id} in ${context}`,
        id,
    );
}

function errDuplicateDefinition(id: CoreVar): ValidationError {
    return makeValidationError(
        ValidationErrorKind.DuplicateDefinition,
        `Local %${id} is defined twice`,
        id,
    );
}

function errStackBindingWrite(id: CoreVar): ValidationError {
    return makeValidationError(
        ValidationErrorKind.StackBindingWrite,
        `Set of stack-bound local %${id}; its slot must be written through a store`,
        id,
    );
}

function errSlotOutOfBounds(
    id: CoreVar,
    offset: number,
    size: number,
    slotSize: number,
): ValidationError {
    return makeValidationError(
        ValidationErrorKind.SlotOutOfBounds,
        `Access of ${size} bytes at offset ${offset} is outside the ${slotSize}-byte slot %${id}`,
        id,
    );
}

function errReturnArity(fnName: string, expected: boolean): ValidationError {
    return makeValidationError(
        ValidationErrorKind.ReturnArity,
        expected
            ? `Function ${fnName} returns a value but a return has none`
            : `Function ${fnName} returns nothing but a return has a value`,
    );
}

// ============================================================================
// Validation Context
// ============================================================================

type LocalInfo = {
    storage: StorageClass;
    // Byte size of the slot the local points at, when it is bound to one
    slotSize: number | null;
};

type ValidationCtx = {
    fn: CoreFunction;
    locals: Map<CoreVar, LocalInfo>;
    errors: ValidationError[];
};

function defineLocal(ctx: ValidationCtx, id: CoreVar, info: LocalInfo): void {
    if (ctx.locals.has(id)) {
        ctx.errors.push(errDuplicateDefinition(id));
    }
    ctx.locals.set(id, info);
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Structural checks on a lowered function: every local is defined where
 * it is used, stack-bound locals are never reassigned, constant accesses
 * stay inside their slot, and returns agree with the signature.
 */
function validateFunction(fn: CoreFunction): ValidationResult {
    const ctx: ValidationCtx = { fn, locals: new Map(), errors: [] };
    for (const param of fn.params) {
        defineLocal(ctx, param.id, { storage: param.storage, slotSize: null });
    }
    validateExpr(fn.body, ctx);
    return { ok: ctx.errors.length === 0, errors: ctx.errors };
}

function checkAccess(ptr: CExpr, offset: number, size: number, ctx: ValidationCtx): void {
    const split = splitOffset(ptr);
    if (split.base.kind !== CExprKind.Local) return;
    const info = ctx.locals.get(split.base.id);
    if (!info || info.slotSize === null) return;
    const start = split.offset + offset;
    if (start < 0 || start + size > info.slotSize) {
        ctx.errors.push(errSlotOutOfBounds(split.base.id, start, size, info.slotSize));
    }
}

function validateExpr(expr: CExpr, ctx: ValidationCtx): void {
    switch (expr.kind) {
        case CExprKind.Unit:
        case CExprKind.Const:
        case CExprKind.Global:
        case CExprKind.StackSlot:
            return;
        case CExprKind.Local:
            if (!ctx.locals.has(expr.id)) {
                ctx.errors.push(errUndefinedLocal(expr.id, ctx.fn.name));
            }
            return;
        case CExprKind.Let: {
            validateExpr(expr.init, ctx);
            const slotSize =
                expr.storage === StorageClass.Stack && expr.init.kind === CExprKind.StackSlot
                    ? expr.init.size
                    : null;
            defineLocal(ctx, expr.id, { storage: expr.storage, slotSize });
            validateExpr(expr.body, ctx);
            ctx.locals.delete(expr.id);
            return;
        }
        case CExprKind.Seq:
            validateExpr(expr.first, ctx);
            validateExpr(expr.second, ctx);
            return;
        case CExprKind.Set: {
            const info = ctx.locals.get(expr.id);
            if (!info) {
                ctx.errors.push(errUndefinedLocal(expr.id, ctx.fn.name));
            } else if (info.storage === StorageClass.Stack) {
                ctx.errors.push(errStackBindingWrite(expr.id));
            }
            validateExpr(expr.value, ctx);
            return;
        }
        case CExprKind.PtrOffset:
            validateExpr(expr.ptr, ctx);
            return;
        case CExprKind.PtrIndex:
            validateExpr(expr.ptr, ctx);
            validateExpr(expr.index, ctx);
            return;
        case CExprKind.Load:
            validateExpr(expr.ptr, ctx);
            checkAccess(expr.ptr, expr.offset, CORE_TYPE_SIZES[expr.ty], ctx);
            return;
        case CExprKind.Store:
            validateExpr(expr.ptr, ctx);
            validateExpr(expr.value, ctx);
            checkAccess(expr.ptr, expr.offset, CORE_TYPE_SIZES[expr.ty], ctx);
            return;
        case CExprKind.Copy:
            validateExpr(expr.dst, ctx);
            validateExpr(expr.src, ctx);
            checkAccess(expr.dst, 0, expr.size, ctx);
            checkAccess(expr.src, 0, expr.size, ctx);
            return;
        case CExprKind.Extract:
            validateExpr(expr.value, ctx);
            return;
        case CExprKind.Insert:
            validateExpr(expr.value, ctx);
            validateExpr(expr.field, ctx);
            return;
        case CExprKind.Call:
            validateExpr(expr.callee, ctx);
            for (const arg of expr.args) validateExpr(arg, ctx);
            return;
        case CExprKind.Builtin:
            for (const arg of expr.args) validateExpr(arg, ctx);
            return;
        case CExprKind.Return: {
            const expected = ctx.fn.ret !== null;
            if (expected !== (expr.value !== null)) {
                ctx.errors.push(errReturnArity(ctx.fn.name, expected));
            }
            if (expr.value) validateExpr(expr.value, ctx);
            return;
        }
        case CExprKind.If:
            validateExpr(expr.cond, ctx);
            validateExpr(expr.then, ctx);
            validateExpr(expr.else, ctx);
            return;
        case CExprKind.While:
            validateExpr(expr.cond, ctx);
            validateExpr(expr.body, ctx);
            return;
    }
}

export { ValidationErrorKind, validateFunction };

export type { ValidationError, ValidationResult };
