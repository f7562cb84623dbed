import { describe, test, expect } from "vitest";
import {
    isConcreteType,
    makeArrayType,
    makeFnType,
    makeNamedType,
    makeParamType,
    makePtrType,
    makeTupleType,
    makeTypeBindings,
    substituteType,
    typeEquals,
    typeToString,
} from "../src/types";

const I32 = makeNamedType(1, "i32");
const U8 = makeNamedType(2, "u8");

describe("typeToString", () => {
    test("prints every form", () => {
        expect(typeToString(makeNamedType(9, "Pair", [I32, U8]))).toBe("Pair<i32, u8>");
        expect(typeToString(makeTupleType([]))).toBe("()");
        expect(typeToString(makeTupleType([I32]))).toBe("(i32,)");
        expect(typeToString(makeArrayType(U8, 4))).toBe("[u8; 4]");
        expect(typeToString(makePtrType(I32, true))).toBe("*mut i32");
        expect(typeToString(makeFnType([I32], U8))).toBe("fn(i32) -> u8");
    });
});

describe("typeEquals", () => {
    test("compares structure, not identity", () => {
        expect(typeEquals(makeArrayType(I32, 2), makeArrayType(makeNamedType(1, "i32"), 2))).toBe(true);
        expect(typeEquals(makeArrayType(I32, 2), makeArrayType(I32, 3))).toBe(false);
        expect(typeEquals(makePtrType(I32), makePtrType(I32, true))).toBe(false);
        expect(typeEquals(makeTupleType([I32]), I32)).toBe(false);
    });
});

describe("substituteType", () => {
    test("replaces bound parameters everywhere", () => {
        const bindings = makeTypeBindings(["T", "U"], [I32]);
        const generic = makeFnType([makePtrType(makeParamType("T"))], makeParamType("U"));
        const result = substituteType(generic, bindings);
        expect(typeToString(result)).toBe("fn(*const i32) -> U");
        expect(isConcreteType(result)).toBe(false);
        expect(isConcreteType(substituteType(makeParamType("T"), bindings))).toBe(true);
    });
});
