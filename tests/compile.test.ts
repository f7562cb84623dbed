import { describe, test, expect } from "vitest";
import { compile, lowerProgram } from "../src/compile";
import { SymbolTableBuilder } from "../src/symbol_table";
import type { TypedProgram } from "../src/typed_ast";
import { makeFnType, makeNamedType, makeUnitType } from "../src/types";
import { T, makeRegistry, param, spanAt, typedFunction } from "./helpers";

function adderProgram(): TypedProgram {
    const { builder, ty } = makeRegistry();
    const i32 = ty("i32");
    const symbols = new SymbolTableBuilder();
    const plus = symbols.addFunction("plus", [i32, i32], i32, { attributes: ['builtin = "add"'] });
    const sum = symbols.addFunction("sum", [i32, i32], i32);
    const table = symbols.build();
    return {
        file: "sum.x",
        registry: builder.build(),
        symbols: table,
        functions: [
            typedFunction(
                sum,
                "sum",
                [param("a", i32), param("b", i32)],
                i32,
                T.call(
                    T.global(plus, makeFnType([i32, i32], i32)),
                    [T.local("a", i32), T.local("b", i32)],
                    i32,
                ),
            ),
        ],
    };
}

function listProgram(withUser: boolean): TypedProgram {
    const { builder, ty } = makeRegistry();
    const list = builder.declare("List");
    builder.addStruct(
        "List",
        [
            { name: "head", type: ty("i32") },
            { name: "tail", type: makeNamedType(list, "List") },
        ],
        { tvar: list, span: spanAt(3, 8, 4) },
    );
    const symbols = new SymbolTableBuilder();
    if (withUser) {
        symbols.addFunction("f", [makeNamedType(list, "List")], makeUnitType());
    }
    return { file: "main.x", registry: builder.build(), symbols: symbols.build(), functions: [] };
}

describe("lowerProgram", () => {
    test("lowers every function and records the stages", () => {
        const result = lowerProgram(adderProgram(), { trace: true });
        expect(result.ok).toBe(true);
        expect(result.errors).toEqual([]);
        expect(result.trace[0]).toMatch(/^layout: \d+ layouts, 0 diagnostics$/);
        expect(result.trace.slice(1)).toEqual([
            "signatures: 0 unsized",
            "fn sum(a.1: reg i32, b.2: reg i32) -> i32 = (add a.1 b.2)",
            "fn _M3sum_2(%1 a: reg i32, %2 b: reg i32) -> i32 {\n  (add i32 %1 %2)\n}",
            "frame _M3sum_2: size=0 align=1",
        ]);
        expect(result.frames?.get("_M3sum_2")).toEqual({ slots: new Map(), size: 0, align: 1 });
    });

    test("tracing is off by default", () => {
        expect(lowerProgram(adderProgram()).trace).toEqual([]);
    });

    test("a recursive type stops the pipeline", () => {
        const result = lowerProgram(listProgram(false));
        expect(result.ok).toBe(false);
        expect(result.core).toBeUndefined();
        expect(result.errors).toEqual([
            {
                message: "[E0072] recursive type `List` has infinite size",
                span: { line: 3, column: 8, length: 4 },
                kind: "layout",
            },
        ]);
    });

    test("signatures mentioning an unsized type are reported once", () => {
        const result = lowerProgram(listProgram(true));
        expect(result.errors.map((e) => [e.kind, e.message])).toEqual([
            ["layout", "[E0072] recursive type `List` has infinite size"],
            ["signature", "[E0277] the size of `List` used by `f` cannot be known"],
        ]);
    });

    test("internal faults are reported per function", () => {
        const { builder, ty } = makeRegistry();
        const i32 = ty("i32");
        const symbols = new SymbolTableBuilder();
        const broken = symbols.addFunction("f", [], i32);
        const fine = symbols.addFunction("g", [], i32);
        const table = symbols.build();
        const result = lowerProgram({
            registry: builder.build(),
            symbols: table,
            functions: [
                typedFunction(broken, "f", [], i32, T.local("y", i32)),
                typedFunction(fine, "g", [], i32, T.int(4, i32)),
            ],
        });
        expect(result.ok).toBe(false);
        expect(result.errors).toEqual([
            { message: "MIR construction of `f` failed: unknown local `y`", kind: "internal" },
        ]);
        expect(result.core?.functions.map((fn) => fn.name)).toEqual(["g"]);
    });
});

describe("compile", () => {
    test("prints declarations before function bodies", () => {
        const result = compile(adderProgram());
        expect(result.text).toBe(
            "decl _M3sum_2(i32, i32) -> i32\n\n" +
                "fn _M3sum_2(%1 a: reg i32, %2 b: reg i32) -> i32 {\n  (add i32 %1 %2)\n}",
        );
    });

    test("failed programs have no text", () => {
        expect(compile(listProgram(false)).text).toBeUndefined();
    });
});
