import { ScalarKind } from "./builtin_types";
import { REGISTER_SIZE, ReprKind, type Layout } from "./memory_layout";
import type { StorageClass } from "./mir";
import type { SymbolId } from "./symbol_table";

// ============================================================================
// Core Primitive Types
// ============================================================================

export enum CoreType {
    U8 = 0,
    U16 = 1,
    U32 = 2,
    U64 = 3,
    Usize = 4,
    I8 = 5,
    I16 = 6,
    I32 = 7,
    I64 = 8,
    Isize = 9,
}

export const CORE_TYPE_NAMES = Object.freeze({
    [CoreType.U8]: "u8",
    [CoreType.U16]: "u16",
    [CoreType.U32]: "u32",
    [CoreType.U64]: "u64",
    [CoreType.Usize]: "usize",
    [CoreType.I8]: "i8",
    [CoreType.I16]: "i16",
    [CoreType.I32]: "i32",
    [CoreType.I64]: "i64",
    [CoreType.Isize]: "isize",
} satisfies Record<CoreType, string>);

export const CORE_TYPE_SIZES = Object.freeze({
    [CoreType.U8]: 1,
    [CoreType.U16]: 2,
    [CoreType.U32]: 4,
    [CoreType.U64]: 8,
    [CoreType.Usize]: 8,
    [CoreType.I8]: 1,
    [CoreType.I16]: 2,
    [CoreType.I32]: 4,
    [CoreType.I64]: 8,
    [CoreType.Isize]: 8,
} satisfies Record<CoreType, number>);

// Adding a scalar kind without a row here fails to type-check
const SCALAR_TO_CORE = Object.freeze({
    [ScalarKind.Bool]: CoreType.U8,
    [ScalarKind.Char]: CoreType.U32,
    [ScalarKind.U8]: CoreType.U8,
    [ScalarKind.U16]: CoreType.U16,
    [ScalarKind.U32]: CoreType.U32,
    [ScalarKind.U64]: CoreType.U64,
    [ScalarKind.Usize]: CoreType.Usize,
    [ScalarKind.I8]: CoreType.I8,
    [ScalarKind.I16]: CoreType.I16,
    [ScalarKind.I32]: CoreType.I32,
    [ScalarKind.I64]: CoreType.I64,
    [ScalarKind.Isize]: CoreType.Isize,
    [ScalarKind.Ptr]: CoreType.Usize,
    [ScalarKind.FnPtr]: CoreType.Usize,
} satisfies Record<ScalarKind, CoreType>);

function coreTypeOfScalar(kind: ScalarKind): CoreType {
    return SCALAR_TO_CORE[kind];
}

function unsignedOfWidth(size: number): CoreType | null {
    switch (size) {
        case 1:
            return CoreType.U8;
        case 2:
            return CoreType.U16;
        case 4:
            return CoreType.U32;
        case 8:
            return CoreType.U64;
        default:
            return null;
    }
}

/**
 * Values that travel as an address of their bytes rather than in a
 * register: everything non-empty that is not 1, 2, 4 or 8 bytes wide.
 */
function isMemoryClass(layout: Layout): boolean {
    return layout.size > REGISTER_SIZE || (layout.size > 0 && unsignedOfWidth(layout.size) === null);
}

/**
 * Core type a value of this layout is carried in. Scalars use the
 * table above, register-sized aggregates the unsigned integer of their
 * width, memory-class values their address. Zero-sized values have none.
 */
function coreTypeOfLayout(layout: Layout): CoreType | null {
    if (layout.size === 0) return null;
    if (layout.repr.kind === ReprKind.Scalar) return coreTypeOfScalar(layout.repr.scalar);
    return unsignedOfWidth(layout.size) ?? CoreType.Usize;
}

// ============================================================================
// Core Expressions
// ============================================================================

export enum CExprKind {
    Unit = 700,
    Const = 701,
    Local = 702,
    Global = 703,
    Let = 704,
    Seq = 705,
    Set = 706,
    StackSlot = 707,
    PtrOffset = 708,
    PtrIndex = 709,
    Load = 710,
    Store = 711,
    Copy = 712,
    Extract = 713,
    Insert = 714,
    Call = 715,
    Builtin = 716,
    Return = 717,
    If = 718,
    While = 719,
}

export type CoreVar = number;

export type CUnit = { kind: CExprKind.Unit };
export type CConst = { kind: CExprKind.Const; ty: CoreType; value: number };
export type CLocal = { kind: CExprKind.Local; id: CoreVar; ty: CoreType };
// Address of a function, by link name
export type CGlobal = { kind: CExprKind.Global; name: string };
export type CLet = {
    kind: CExprKind.Let;
    id: CoreVar;
    storage: StorageClass;
    ty: CoreType;
    init: CExpr;
    body: CExpr;
};
export type CSeq = { kind: CExprKind.Seq; first: CExpr; second: CExpr };
export type CSet = { kind: CExprKind.Set; id: CoreVar; value: CExpr };
// Address of a fresh frame slot; `slot` is unique within a function
export type CStackSlot = { kind: CExprKind.StackSlot; slot: number; size: number; align: number };
export type CPtrOffset = { kind: CExprKind.PtrOffset; ptr: CExpr; offset: number };
export type CPtrIndex = { kind: CExprKind.PtrIndex; ptr: CExpr; index: CExpr; stride: number };
export type CLoad = { kind: CExprKind.Load; ty: CoreType; ptr: CExpr; offset: number };
// Evaluates `ptr`, then `value`
export type CStore = {
    kind: CExprKind.Store;
    ty: CoreType;
    ptr: CExpr;
    offset: number;
    value: CExpr;
};
export type CCopy = { kind: CExprKind.Copy; dst: CExpr; src: CExpr; size: number };
// Bytes `offset..offset + size(ty)` of a register-resident aggregate
export type CExtract = { kind: CExprKind.Extract; ty: CoreType; value: CExpr; offset: number };
export type CInsert = {
    kind: CExprKind.Insert;
    ty: CoreType;
    value: CExpr;
    offset: number;
    fieldTy: CoreType;
    field: CExpr;
};
export type CCall = {
    kind: CExprKind.Call;
    callee: CExpr;
    args: CExpr[];
    ret: CoreType | null;
};
export type CBuiltin = { kind: CExprKind.Builtin; op: string; ty: CoreType; args: CExpr[] };
export type CReturn = { kind: CExprKind.Return; value: CExpr | null };
export type CIf = {
    kind: CExprKind.If;
    ty: CoreType | null;
    cond: CExpr;
    then: CExpr;
    else: CExpr;
};
export type CWhile = { kind: CExprKind.While; cond: CExpr; body: CExpr };

export type CExpr =
    | CUnit
    | CConst
    | CLocal
    | CGlobal
    | CLet
    | CSeq
    | CSet
    | CStackSlot
    | CPtrOffset
    | CPtrIndex
    | CLoad
    | CStore
    | CCopy
    | CExtract
    | CInsert
    | CCall
    | CBuiltin
    | CReturn
    | CIf
    | CWhile;

// ============================================================================
// Functions and Programs
// ============================================================================

export type CoreParam = {
    id: CoreVar;
    name: string;
    storage: StorageClass;
    ty: CoreType;
};

export type CoreSignature = {
    symbol: SymbolId;
    name: string;
    linkName: string;
    params: CoreType[];
    // Trailing hidden address parameter for memory-class results
    sret: boolean;
    ret: CoreType | null;
    isExtern: boolean;
};

export type CoreFunction = {
    symbol: SymbolId;
    name: string;
    linkName: string;
    params: CoreParam[];
    ret: CoreType | null;
    body: CExpr;
};

export type CoreProgram = {
    signatures: CoreSignature[];
    functions: CoreFunction[];
};

// ============================================================================
// Constructors
// ============================================================================

const UNIT: CUnit = Object.freeze({ kind: CExprKind.Unit });

function cUnit(): CExpr {
    return UNIT;
}

function cConst(ty: CoreType, value: number): CExpr {
    return { kind: CExprKind.Const, ty, value };
}

function cLocal(id: CoreVar, ty: CoreType): CExpr {
    return { kind: CExprKind.Local, id, ty };
}

/**
 * `first` for its effects, then `second`. A unit `first` is dropped.
 */
function cSeq(first: CExpr, second: CExpr): CExpr {
    if (first.kind === CExprKind.Unit) return second;
    return { kind: CExprKind.Seq, first, second };
}

function cPtrOffset(ptr: CExpr, offset: number): CExpr {
    if (offset === 0) return ptr;
    if (ptr.kind === CExprKind.PtrOffset) {
        return { kind: CExprKind.PtrOffset, ptr: ptr.ptr, offset: ptr.offset + offset };
    }
    return { kind: CExprKind.PtrOffset, ptr, offset };
}

/**
 * Split a constant offset off an address, for loads and stores.
 */
function splitOffset(ptr: CExpr): { base: CExpr; offset: number } {
    if (ptr.kind === CExprKind.PtrOffset) return { base: ptr.ptr, offset: ptr.offset };
    return { base: ptr, offset: 0 };
}

/**
 * True for expressions without side effects that can be dropped.
 */
function isPure(expr: CExpr): boolean {
    switch (expr.kind) {
        case CExprKind.Unit:
        case CExprKind.Const:
        case CExprKind.Local:
        case CExprKind.Global:
            return true;
        case CExprKind.PtrOffset:
            return isPure(expr.ptr);
        default:
            return false;
    }
}

export {
    SCALAR_TO_CORE,
    coreTypeOfScalar,
    coreTypeOfLayout,
    unsignedOfWidth,
    isMemoryClass,
    cUnit,
    cConst,
    cLocal,
    cSeq,
    cPtrOffset,
    splitOffset,
    isPure,
};
