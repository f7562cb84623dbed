import { describe, test, expect } from "vitest";
import { ScalarKind } from "../src/builtin_types";
import { InternalCompilerError, Level } from "../src/diagnostics";
import {
    LayoutCache,
    ReprKind,
    ZERO_SIZED,
    alignTo,
    calculateTagSize,
    checkLayoutInvariants,
    layoutArray,
    layoutEnum,
    layoutStruct,
    layoutToString,
    layoutTuple,
    makeLayout,
    scalarLayout,
    typeKey,
} from "../src/memory_layout";
import {
    makeArrayType,
    makeNamedType,
    makeParamType,
    makePtrType,
    makeTupleType,
} from "../src/types";
import { makeRegistry, spanAt } from "./helpers";

const I32 = scalarLayout(ScalarKind.I32, 4);
const U8 = scalarLayout(ScalarKind.U8, 1);
const I64 = scalarLayout(ScalarKind.I64, 8);

describe("alignment", () => {
    test("alignTo rounds up to the boundary", () => {
        expect(alignTo(0, 4)).toBe(0);
        expect(alignTo(1, 4)).toBe(4);
        expect(alignTo(4, 4)).toBe(4);
        expect(alignTo(5, 8)).toBe(8);
        expect(alignTo(7, 1)).toBe(7);
    });

    test("tag size follows the variant count", () => {
        expect(calculateTagSize(0)).toBe(0);
        expect(calculateTagSize(1)).toBe(0);
        expect(calculateTagSize(2)).toBe(1);
        expect(calculateTagSize(256)).toBe(1);
        expect(calculateTagSize(257)).toBe(2);
        expect(calculateTagSize(65536)).toBe(2);
        expect(calculateTagSize(65537)).toBe(4);
    });
});

describe("composite layouts", () => {
    test("struct fields are packed in declaration order", () => {
        const layout = layoutStruct([
            { name: "a", layout: I32 },
            { name: "b", layout: U8 },
            { name: "c", layout: I32 },
        ]);
        expect(layout.size).toBe(12);
        expect(layout.align).toBe(4);
        if (layout.repr.kind !== ReprKind.Aggregate) throw new Error("expected aggregate");
        expect(layout.repr.members.map((m) => m.offset)).toEqual([0, 4, 8]);
        expect(checkLayoutInvariants(layout)).toEqual([]);
    });

    test("tail padding rounds size to the largest alignment", () => {
        const layout = layoutStruct([
            { name: "a", layout: I64 },
            { name: "b", layout: U8 },
        ]);
        expect(layoutToString(layout)).toBe("{a@0: i64, b@8: u8} size=16 align=8");
    });

    test("empty struct and unit are zero-sized", () => {
        expect(layoutStruct([])).toBe(ZERO_SIZED);
        expect(layoutTuple([])).toBe(ZERO_SIZED);
        expect(ZERO_SIZED.size).toBe(0);
        expect(ZERO_SIZED.align).toBe(1);
    });

    test("arrays multiply the element size", () => {
        const layout = layoutArray(I32, 3);
        expect(layoutToString(layout)).toBe("[i32; 3] size=12 align=4");
        const empty = layoutArray(I64, 0);
        expect(empty.size).toBe(0);
        expect(empty.align).toBe(1);
    });

    test("enum payloads share the offset after the tag", () => {
        const layout = layoutEnum([
            { name: "A", payload: layoutTuple([]) },
            { name: "B", payload: layoutTuple([I64]) },
            { name: "C", payload: layoutTuple([U8]) },
        ]);
        expect(layout.size).toBe(16);
        expect(layout.align).toBe(8);
        expect(layoutToString(layout)).toBe(
            "tagged {tag@0: u8, A@8: {}, B@8: {0@0: i64}, C@8: {0@0: u8}} size=16 align=8",
        );
        expect(checkLayoutInvariants(layout)).toEqual([]);
    });

    test("single-variant enum has no tag", () => {
        const layout = layoutEnum([{ name: "Only", payload: layoutTuple([I32]) }]);
        expect(layoutToString(layout)).toBe("{Only@0: {0@0: i32}} size=4 align=4");
    });

    test("fieldless single-variant enum is zero-sized", () => {
        const layout = layoutEnum([{ name: "Unit", payload: layoutTuple([]) }]);
        expect(layout.size).toBe(0);
        expect(layout.align).toBe(1);
    });

    test("invariant checker reports a misaligned size", () => {
        const bad = makeLayout(6, 4, { kind: ReprKind.Scalar, scalar: ScalarKind.U32 });
        expect(checkLayoutInvariants(bad)).toEqual(["layout: size 6 is not a multiple of 4"]);
    });
});

describe("typeKey", () => {
    test("equal types share a key", () => {
        const { ty } = makeRegistry();
        const a = makeTupleType([ty("i32"), makeArrayType(ty("u8"), 4)]);
        const b = makeTupleType([ty("i32"), makeArrayType(ty("u8"), 4)]);
        expect(typeKey(a)).toBe(typeKey(b));
        expect(typeKey(makePtrType(ty("i32")))).toBe(typeKey(makePtrType(ty("u8"))));
    });

    test("type parameters have no key", () => {
        expect(() => typeKey(makeParamType("T"))).toThrow(InternalCompilerError);
    });
});

describe("LayoutCache", () => {
    test("lays out nested structs", () => {
        const { builder, ty } = makeRegistry();
        const inner = builder.addStruct("Inner", [
            { name: "a", type: ty("i32") },
            { name: "b", type: ty("i32") },
        ]);
        const outer = builder.addStruct("Outer", [
            { name: "flag", type: ty("bool") },
            { name: "inner", type: makeNamedType(inner, "Inner") },
        ]);
        const { cache, diagnostics } = LayoutCache.compute(builder.build());
        expect(diagnostics).toEqual([]);
        expect(cache.getTVarLayout(inner).size).toBe(8);
        expect(cache.getTVarLayout(inner).align).toBe(4);
        expect(layoutToString(cache.getTVarLayout(outer))).toBe(
            "{flag@0: bool, inner@4: {a@0: i32, b@4: i32}} size=12 align=4",
        );
    });

    test("every builtin gets a layout", () => {
        const { builder, ty } = makeRegistry();
        const { cache } = LayoutCache.compute(builder.build());
        expect(cache.size).toBe(14);
        expect(cache.getLayout(ty("never"))).toBe(ZERO_SIZED);
        expect(layoutToString(cache.getLayout(ty("char")))).toBe("char size=4 align=4");
    });

    test("pointers and functions are one pointer wide", () => {
        const { builder, ty } = makeRegistry();
        const { cache } = LayoutCache.compute(builder.build());
        expect(layoutToString(cache.getLayout(makePtrType(ty("u8"))))).toBe(
            "ptr size=8 align=8",
        );
    });

    test("a pointer breaks a self-reference", () => {
        const { builder, ty } = makeRegistry();
        const node = builder.declare("Node");
        builder.addStruct(
            "Node",
            [
                { name: "value", type: ty("i32") },
                { name: "next", type: makePtrType(makeNamedType(node, "Node")) },
            ],
            { tvar: node },
        );
        const { cache, diagnostics } = LayoutCache.compute(builder.build());
        expect(diagnostics).toEqual([]);
        expect(layoutToString(cache.getTVarLayout(node))).toBe(
            "{value@0: i32, next@8: ptr} size=16 align=8",
        );
    });

    test("direct self-embedding is reported and left without a layout", () => {
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
        const holder = builder.addStruct("Holder", [
            { name: "list", type: makeNamedType(list, "List") },
        ]);
        const plain = builder.addStruct("Plain", [{ name: "x", type: ty("u8") }]);
        const { cache, diagnostics } = LayoutCache.compute(builder.build(), [], {
            file: "main.x",
        });

        expect(diagnostics).toHaveLength(2);
        const [recursive, dependent] = diagnostics;
        expect(recursive.level).toBe(Level.Error);
        expect(recursive.code).toBe("E0072");
        expect(recursive.message).toBe("recursive type `List` has infinite size");
        expect(recursive.hint).toBe("insert a pointer to break the cycle");
        expect(recursive.span?.start).toEqual({ line: 3, column: 8, file: "main.x" });
        expect(dependent.level).toBe(Level.Note);
        expect(dependent.message).toBe(
            "`Holder` has no layout because it embeds a recursive type",
        );

        expect(cache.hasLayout(makeNamedType(list, "List"))).toBe(false);
        expect(cache.hasLayout(makeNamedType(holder, "Holder"))).toBe(false);
        expect(cache.getTVarLayout(plain).size).toBe(1);
        expect(() => cache.getTVarLayout(list)).toThrow(InternalCompilerError);
    });

    test("mutual recursion names the whole cycle", () => {
        const { builder } = makeRegistry();
        const a = builder.declare("A");
        const b = builder.declare("B");
        builder.addStruct("A", [{ name: "b", type: makeNamedType(b, "B") }], { tvar: a });
        builder.addStruct("B", [{ name: "a", type: makeNamedType(a, "A") }], { tvar: b });
        const { diagnostics } = LayoutCache.compute(builder.build());

        expect(diagnostics.map((d) => d.message)).toEqual([
            "recursive type `A` has infinite size",
            "recursive type `B` has infinite size",
        ]);
        expect(diagnostics[0].hint).toBe("insert a pointer somewhere along the cycle A -> B -> A");
        expect(diagnostics[0].related?.map((r) => r.message)).toEqual([
            "`B` is part of the cycle",
        ]);
    });

    test("generic instantiations come from the extra types", () => {
        const { builder, ty } = makeRegistry();
        const pair = builder.addStruct(
            "Pair",
            [
                { name: "first", type: makeParamType("T") },
                { name: "second", type: makeParamType("T") },
            ],
            { params: ["T"] },
        );
        const pairU8 = makeNamedType(pair, "Pair", [ty("u8")]);
        const pairU16 = makeNamedType(pair, "Pair", [ty("u16")]);
        const { cache } = LayoutCache.compute(builder.build(), [pairU8]);

        expect(layoutToString(cache.getLayout(pairU8))).toBe(
            "{first@0: u8, second@1: u8} size=2 align=1",
        );
        expect(cache.hasLayout(pairU16)).toBe(false);
        expect(() => cache.getLayout(pairU16)).toThrow(InternalCompilerError);
    });

    test("tuples not seen before are composed from members", () => {
        const { builder, ty } = makeRegistry();
        const { cache } = LayoutCache.compute(builder.build());
        const layout = cache.getLayout(makeTupleType([ty("u8"), ty("u32")]));
        expect(layoutToString(layout)).toBe("{0@0: u8, 1@4: u32} size=8 align=4");
    });

    test("type parameters have no layout", () => {
        const { builder } = makeRegistry();
        const { cache } = LayoutCache.compute(builder.build());
        expect(cache.hasLayout(makeParamType("T"))).toBe(false);
        expect(() => cache.getLayout(makeParamType("T"))).toThrow(InternalCompilerError);
    });

    test("a generic that stores its argument behind a pointer breaks the cycle", () => {
        const { builder, ty } = makeRegistry();
        const box = builder.addStruct("Box", [{ name: "p", type: makePtrType(makeParamType("T")) }], {
            params: ["T"],
        });
        const node = builder.declare("Node");
        const boxed = makeNamedType(box, "Box", [makeNamedType(node, "Node")]);
        builder.addStruct(
            "Node",
            [
                { name: "v", type: ty("i32") },
                { name: "next", type: boxed },
            ],
            { tvar: node },
        );
        const { cache, diagnostics } = LayoutCache.compute(builder.build(), [boxed]);
        expect(diagnostics).toEqual([]);
        expect(layoutToString(cache.getTVarLayout(node))).toBe(
            "{v@0: i32, next@8: {p@0: ptr}} size=16 align=8",
        );
        expect(cache.getLayout(boxed).size).toBe(8);
    });

    test("every computed layout is well formed", () => {
        const { builder, ty } = makeRegistry();
        const pair = builder.addStruct(
            "Pair",
            [
                { name: "first", type: makeParamType("T") },
                { name: "second", type: ty("u8") },
            ],
            { params: ["T"] },
        );
        const shape = builder.addEnum("Shape", [
            { name: "Dot", payload: [] },
            { name: "Line", payload: [ty("i16"), ty("i64")] },
            { name: "Bytes", payload: [makeArrayType(ty("u8"), 5)] },
        ]);
        builder.addStruct("Mixed", [
            { name: "flag", type: ty("bool") },
            { name: "shape", type: makeNamedType(shape, "Shape") },
            { name: "pairs", type: makeArrayType(makeNamedType(pair, "Pair", [ty("u32")]), 3) },
            { name: "tail", type: makeTupleType([ty("char"), ty("u16")]) },
        ]);
        const registry = builder.build();
        const extra = [
            makeNamedType(pair, "Pair", [ty("u32")]),
            makeNamedType(pair, "Pair", [makeNamedType(shape, "Shape")]),
        ];
        const { cache, diagnostics } = LayoutCache.compute(registry, extra);
        expect(diagnostics).toEqual([]);

        const layouts = [
            ...registry
                .definitions()
                .filter((definition) => definition.name !== "Pair")
                .map((definition) => cache.getTVarLayout(definition.tvar)),
            ...extra.map((type) => cache.getLayout(type)),
        ];
        expect(layouts).toHaveLength(18);
        for (const layout of layouts) {
            expect(checkLayoutInvariants(layout)).toEqual([]);
        }
    });
});
