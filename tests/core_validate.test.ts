import { describe, test, expect } from "vitest";
import { CExprKind, CoreType, cConst, cLocal, cSeq, cUnit, type CExpr, type CoreFunction } from "../src/core";
import { ValidationErrorKind, validateFunction } from "../src/core_validate";
import { StorageClass } from "../src/mir";

function fnWith(body: CExpr, ret: CoreType | null = CoreType.I64): CoreFunction {
    return {
        symbol: 1,
        name: "scan",
        linkName: "scan",
        params: [{ id: 9, name: "p", storage: StorageClass.Register, ty: CoreType.I64 }],
        ret,
        body,
    };
}

function slotLet(id: number, size: number, align: number, body: CExpr): CExpr {
    return {
        kind: CExprKind.Let,
        id,
        storage: StorageClass.Stack,
        ty: CoreType.Usize,
        init: { kind: CExprKind.StackSlot, slot: 0, size, align },
        body,
    };
}

describe("validateFunction", () => {
    test("accepts in-bounds slot accesses", () => {
        const body = slotLet(
            1,
            8,
            8,
            cSeq(
                { kind: CExprKind.Store, ty: CoreType.I32, ptr: cLocal(1, CoreType.Usize), offset: 4, value: cConst(CoreType.I32, 3) },
                { kind: CExprKind.Load, ty: CoreType.I64, ptr: cLocal(1, CoreType.Usize), offset: 0 },
            ),
        );
        expect(validateFunction(fnWith(body))).toEqual({ ok: true, errors: [] });
    });

    test("reports an access past the end of its slot", () => {
        const body = slotLet(1, 4, 4, {
            kind: CExprKind.Load,
            ty: CoreType.I64,
            ptr: cLocal(1, CoreType.Usize),
            offset: 0,
        });
        const result = validateFunction(fnWith(body));
        expect(result.ok).toBe(false);
        expect(result.errors).toEqual([
            {
                kind: ValidationErrorKind.SlotOutOfBounds,
                message: "Access of 8 bytes at offset 0 is outside the 4-byte slot %1",
                local: 1,
            },
        ]);
    });

    test("constant pointer offsets count toward the bound", () => {
        const body = slotLet(1, 8, 4, {
            kind: CExprKind.Load,
            ty: CoreType.I32,
            ptr: { kind: CExprKind.PtrOffset, ptr: cLocal(1, CoreType.Usize), offset: 4 },
            offset: 4,
        });
        const [error] = validateFunction(fnWith(body, CoreType.I32)).errors;
        expect(error.message).toBe("Access of 4 bytes at offset 8 is outside the 8-byte slot %1");
    });

    test("reports locals used outside their scope", () => {
        const body = cSeq(slotLet(1, 8, 8, cUnit()), cLocal(1, CoreType.Usize));
        const result = validateFunction(fnWith(body));
        expect(result.errors.map((e) => e.kind)).toEqual([ValidationErrorKind.UndefinedLocal]);
        expect(result.errors[0].message).toBe("Undefined local %1 in scan");
    });

    test("stack-bound locals cannot be reassigned", () => {
        const body = slotLet(1, 8, 8, { kind: CExprKind.Set, id: 1, value: cConst(CoreType.Usize, 0) });
        const [error] = validateFunction(fnWith(body)).errors;
        expect(error.kind).toBe(ValidationErrorKind.StackBindingWrite);
        expect(error.local).toBe(1);
    });

    test("rebinding a live local is reported", () => {
        const body: CExpr = {
            kind: CExprKind.Let,
            id: 9,
            storage: StorageClass.Register,
            ty: CoreType.I64,
            init: cConst(CoreType.I64, 1),
            body: cLocal(9, CoreType.I64),
        };
        const [error] = validateFunction(fnWith(body)).errors;
        expect(error.message).toBe("Local %9 is defined twice");
    });

    test("returns must match the result type", () => {
        const bare = validateFunction(fnWith({ kind: CExprKind.Return, value: null }));
        expect(bare.errors[0].message).toBe("Function scan returns a value but a return has none");

        const extra = validateFunction(
            fnWith({ kind: CExprKind.Return, value: cLocal(9, CoreType.I64) }, null),
        );
        expect(extra.errors[0].kind).toBe(ValidationErrorKind.ReturnArity);
        expect(extra.errors[0].message).toBe(
            "Function scan returns nothing but a return has a value",
        );
    });
});
