/**
 * Scalar representation kinds carried by layouts, and the builtin
 * types and operations every registry starts with.
 */
export enum ScalarKind {
    Bool,
    Char,
    U8,
    U16,
    U32,
    U64,
    Usize,
    I8,
    I16,
    I32,
    I64,
    Isize,
    // Data pointer (indirection)
    Ptr,
    // Code pointer
    FnPtr,
}

export const SCALAR_NAMES = Object.freeze({
    [ScalarKind.Bool]: "bool",
    [ScalarKind.Char]: "char",
    [ScalarKind.U8]: "u8",
    [ScalarKind.U16]: "u16",
    [ScalarKind.U32]: "u32",
    [ScalarKind.U64]: "u64",
    [ScalarKind.Usize]: "usize",
    [ScalarKind.I8]: "i8",
    [ScalarKind.I16]: "i16",
    [ScalarKind.I32]: "i32",
    [ScalarKind.I64]: "i64",
    [ScalarKind.Isize]: "isize",
    [ScalarKind.Ptr]: "ptr",
    [ScalarKind.FnPtr]: "fnptr",
} satisfies Record<ScalarKind, string>);

export type BuiltinTypeSpec = Readonly<{
    size: number;
    align: number;
    scalar: ScalarKind | null;
}>;

// `never` and `order` have no scalar payload of their own: `never` is
// uninhabited, `order` is a one-byte comparison result.
export const BUILTIN_TYPES = Object.freeze({
    never: Object.freeze({ size: 0, align: 1, scalar: null }),
    bool: Object.freeze({ size: 1, align: 1, scalar: ScalarKind.Bool }),
    order: Object.freeze({ size: 1, align: 1, scalar: ScalarKind.I8 }),
    char: Object.freeze({ size: 4, align: 4, scalar: ScalarKind.Char }),
    u8: Object.freeze({ size: 1, align: 1, scalar: ScalarKind.U8 }),
    u16: Object.freeze({ size: 2, align: 2, scalar: ScalarKind.U16 }),
    u32: Object.freeze({ size: 4, align: 4, scalar: ScalarKind.U32 }),
    u64: Object.freeze({ size: 8, align: 8, scalar: ScalarKind.U64 }),
    usize: Object.freeze({ size: 8, align: 8, scalar: ScalarKind.Usize }),
    i8: Object.freeze({ size: 1, align: 1, scalar: ScalarKind.I8 }),
    i16: Object.freeze({ size: 2, align: 2, scalar: ScalarKind.I16 }),
    i32: Object.freeze({ size: 4, align: 4, scalar: ScalarKind.I32 }),
    i64: Object.freeze({ size: 8, align: 8, scalar: ScalarKind.I64 }),
    isize: Object.freeze({ size: 8, align: 8, scalar: ScalarKind.Isize }),
} satisfies Record<string, BuiltinTypeSpec>);

export type BuiltinTypeName = keyof typeof BUILTIN_TYPES;

export const BUILTIN_TYPE_NAMES = Object.freeze(
    Object.keys(BUILTIN_TYPES).filter(isBuiltinTypeName),
);

export function isBuiltinTypeName(name: string): name is BuiltinTypeName {
    return Object.hasOwn(BUILTIN_TYPES, name);
}

export const BUILTIN_OPERATIONS = Object.freeze({
    ADD: "add",
    SUB: "sub",
    MUL: "mul",
    DIV: "div",
    REM: "rem",
    NEG: "neg",
    EQ: "eq",
    NE: "ne",
    LT: "lt",
    LE: "le",
    GT: "gt",
    GE: "ge",
    AND: "and",
    OR: "or",
    NOT: "not",
});

const UNARY_OPERATIONS: ReadonlySet<string> = new Set<string>([
    BUILTIN_OPERATIONS.NEG,
    BUILTIN_OPERATIONS.NOT,
]);

const KNOWN_OPERATIONS: ReadonlySet<string> = new Set(
    Object.values(BUILTIN_OPERATIONS),
);

/**
 * Number of operands a builtin operation takes, or null for unknown names.
 */
export function builtinOperationArity(name: string): number | null {
    if (!KNOWN_OPERATIONS.has(name)) return null;
    return UNARY_OPERATIONS.has(name) ? 1 : 2;
}
