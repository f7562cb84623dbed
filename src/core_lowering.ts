import {
    CExprKind,
    CoreType,
    cConst,
    cLocal,
    cPtrOffset,
    cSeq,
    cUnit,
    coreTypeOfLayout,
    isMemoryClass,
    isPure,
    splitOffset,
    type CExpr,
    type CoreFunction,
    type CoreParam,
    type CoreSignature,
    type CoreVar,
} from "./core";
import { internalError } from "./diagnostics";
import {
    ReprKind,
    aggregateMember,
    enumTagMember,
    enumVariantMember,
    type Layout,
    type LayoutCache,
} from "./memory_layout";
import {
    MExprKind,
    StorageClass,
    type MBinding,
    type MCall,
    type MEnumCons,
    type MExpr,
    type MirFunction,
} from "./mir";
import {
    SymbolKind,
    symbolLinkName,
    type SymbolId,
    type SymbolTable,
} from "./symbol_table";

// ============================================================================
// Signatures
// ============================================================================

function coreTypeOf(layout: Layout): CoreType {
    return coreTypeOfLayout(layout) ?? internalError("zero-sized value has no core type");
}

/**
 * Core signature of every non-generic function that is not a builtin
 * operation. Zero-sized parameters are dropped; a memory-class result
 * adds a trailing address parameter the callee writes through.
 */
export function lowerCoreSymbols(symbols: SymbolTable, layouts: LayoutCache): CoreSignature[] {
    const signatures: CoreSignature[] = [];
    for (const info of symbols.symbols()) {
        if (info.sym.kind !== SymbolKind.Function) continue;
        if (info.sym.typeParams.length > 0 || info.attributes.builtinName !== null) continue;
        const params = info.sym.params
            .map((p) => layouts.getLayout(p))
            .filter((layout) => layout.size > 0)
            .map(coreTypeOf);
        const retLayout = layouts.getLayout(info.sym.returnType);
        const sret = isMemoryClass(retLayout);
        if (sret) params.push(CoreType.Usize);
        signatures.push({
            symbol: info.id,
            name: info.name,
            linkName: symbolLinkName(info),
            params,
            sret,
            ret: coreTypeOfLayout(retLayout),
            isExtern: info.attributes.isExtern,
        });
    }
    return signatures;
}

// ============================================================================
// Places
// ============================================================================

enum HomeKind {
    Register,
    Slot,
    Empty,
}

// Where a MIR binding lives in the Core function
type Home =
    | { kind: HomeKind.Register; id: CoreVar; ty: CoreType }
    | { kind: HomeKind.Slot; id: CoreVar }
    | { kind: HomeKind.Empty };

enum AccessKind {
    Memory,
    Register,
    Empty,
}

/**
 * A place or value being projected: bytes at an address, bytes at an
 * offset inside a register value (whose binding is `root`, if any), or
 * nothing at all beyond the effects needed to reach it.
 */
type Access =
    | { kind: AccessKind.Memory; addr: CExpr }
    | {
          kind: AccessKind.Register;
          value: CExpr;
          ty: CoreType;
          offset: number;
          root: CoreVar | null;
          rootLayout: Layout;
      }
    | { kind: AccessKind.Empty; effects: CExpr };

// A member written by a constructor; `value` lowers it when its turn comes
type Part = { offset: number; layout: Layout; value: () => CExpr };

// ============================================================================
// Function Lowering
// ============================================================================

/**
 * Lower a flattened MIR function to Core. Aggregate access becomes
 * address arithmetic with typed loads and stores, or `Extract`/`Insert`
 * on register-resident values.
 */
export function lowerCoreFunction(fn: MirFunction, symbols: SymbolTable): CoreFunction {
    return new CoreLowerer(fn, symbols).lower();
}

class CoreLowerer {
    readonly #fn: MirFunction;
    readonly #symbols: SymbolTable;
    readonly #homes: Map<number, Home>;
    #nextVar: CoreVar;
    #nextSlot: number;
    #sret: CoreVar | null;

    constructor(fn: MirFunction, symbols: SymbolTable) {
        this.#fn = fn;
        this.#symbols = symbols;
        this.#homes = new Map();
        let maxId = 0;
        for (const id of fn.bindings.keys()) {
            if (id > maxId) maxId = id;
        }
        this.#nextVar = maxId + 1;
        this.#nextSlot = 0;
        this.#sret = null;
    }

    #fresh(): CoreVar {
        return this.#nextVar++;
    }

    #stackSlot(layout: Layout): CExpr {
        return {
            kind: CExprKind.StackSlot,
            slot: this.#nextSlot++,
            size: layout.size,
            align: layout.align,
        };
    }

    /**
     * `let id = <slot for layout> in body(id)`
     */
    #withSlot(layout: Layout, body: (addr: CExpr, id: CoreVar) => CExpr): CExpr {
        const id = this.#fresh();
        return {
            kind: CExprKind.Let,
            id,
            storage: StorageClass.Stack,
            ty: CoreType.Usize,
            init: this.#stackSlot(layout),
            body: body(cLocal(id, CoreType.Usize), id),
        };
    }

    lower(): CoreFunction {
        const fn = this.#fn;
        const params: CoreParam[] = [];
        const prologue: { id: CoreVar; slot: CExpr; spill: CExpr }[] = [];

        for (const { binding, storage } of fn.params) {
            const { layout } = binding;
            if (layout.size === 0 && storage === StorageClass.Register) {
                this.#homes.set(binding.id, { kind: HomeKind.Empty });
                continue;
            }
            if (layout.size === 0) {
                // Address taken: still gets a zero-byte slot
                const id = this.#fresh();
                this.#homes.set(binding.id, { kind: HomeKind.Slot, id });
                prologue.push({ id, slot: this.#stackSlot(layout), spill: cUnit() });
                continue;
            }
            const ty = coreTypeOf(layout);
            params.push({ id: binding.id, name: binding.name, storage, ty });
            if (storage === StorageClass.Register) {
                this.#homes.set(binding.id, { kind: HomeKind.Register, id: binding.id, ty });
                continue;
            }
            const id = this.#fresh();
            this.#homes.set(binding.id, { kind: HomeKind.Slot, id });
            const slot = cLocal(id, CoreType.Usize);
            prologue.push({
                id,
                slot: this.#stackSlot(layout),
                spill: this.#storeValue(slot, layout, cLocal(binding.id, ty)),
            });
        }

        if (isMemoryClass(fn.returnLayout)) {
            this.#sret = this.#fresh();
            params.push({
                id: this.#sret,
                name: "sret",
                storage: StorageClass.Register,
                ty: CoreType.Usize,
            });
        }

        // A body that ends in `return` has no value of its own to hand back
        let body =
            fn.body.layout.size === 0
                ? this.#value(fn.body)
                : this.#returning(this.#value(fn.body), fn.returnLayout);
        for (let i = prologue.length - 1; i >= 0; i--) {
            const entry = prologue[i];
            body = {
                kind: CExprKind.Let,
                id: entry.id,
                storage: StorageClass.Stack,
                ty: CoreType.Usize,
                init: entry.slot,
                body: cSeq(entry.spill, body),
            };
        }

        const info = this.#symbols.lookupSymbol(fn.symbol);
        return {
            symbol: fn.symbol,
            name: fn.name,
            linkName: symbolLinkName(info),
            params,
            ret: coreTypeOfLayout(fn.returnLayout),
            body,
        };
    }

    /**
     * A memory-class result is copied into the caller's slot, whose
     * address is then returned.
     */
    #returning(value: CExpr, layout: Layout): CExpr {
        if (this.#sret === null) return value;
        const sret = cLocal(this.#sret, CoreType.Usize);
        return cSeq({ kind: CExprKind.Copy, dst: sret, src: value, size: layout.size }, sret);
    }

    #linkName(symbol: SymbolId): string {
        return symbolLinkName(this.#symbols.lookupSymbol(symbol));
    }

    // ========================================================================
    // Values
    // ========================================================================

    /**
     * Core expression computing the value of `expr`: an integer for
     * register-sized values, an address for memory-class values, and an
     * effect-only expression for zero-sized values.
     */
    #value(expr: MExpr): CExpr {
        switch (expr.kind) {
            case MExprKind.Unit:
                return cUnit();
            case MExprKind.Const:
                if (expr.layout.size === 0) return cUnit();
                return cConst(coreTypeOf(expr.layout), expr.value);
            case MExprKind.Global:
                return { kind: CExprKind.Global, name: this.#linkName(expr.symbol) };
            case MExprKind.Local:
            case MExprKind.Field:
            case MExprKind.VariantField:
            case MExprKind.Index:
            case MExprKind.Deref:
                return this.#read(this.#access(expr), expr.layout);
            case MExprKind.Tuple:
                return this.#construct(
                    expr.layout,
                    expr.elements.map((element, i) => {
                        const member = aggregateMember(expr.layout, i);
                        return this.#part(member.offset, member.layout, element);
                    }),
                    null,
                );
            case MExprKind.StructCons:
                return this.#construct(
                    expr.layout,
                    expr.fields.map(({ index, value }) => {
                        const member = aggregateMember(expr.layout, index);
                        return this.#part(member.offset, member.layout, value);
                    }),
                    null,
                );
            case MExprKind.ArrayLit: {
                if (expr.layout.repr.kind !== ReprKind.Array) {
                    return internalError("array literal without an array layout");
                }
                const element = expr.layout.repr.element;
                return this.#construct(
                    expr.layout,
                    expr.elements.map((value, i) =>
                        this.#part(i * element.size, element, value),
                    ),
                    null,
                );
            }
            case MExprKind.EnumCons:
                return this.#constructVariant(expr);
            case MExprKind.Call:
                return this.#call(expr);
            case MExprKind.Builtin:
                return {
                    kind: CExprKind.Builtin,
                    op: expr.op,
                    ty: coreTypeOf(expr.layout),
                    args: expr.args.map((a) => this.#value(a)),
                };
            case MExprKind.EnumTag:
                return this.#enumTag(expr.base, expr.layout);
            case MExprKind.AddrOf:
                return this.#addressOf(expr.place);
            case MExprKind.Assign:
                return this.#assign(expr.place, expr.value);
            case MExprKind.Return: {
                const value = expr.value;
                if (value === null || value.layout.size === 0) {
                    const effects = value ? this.#value(value) : cUnit();
                    return cSeq(effects, { kind: CExprKind.Return, value: null });
                }
                return {
                    kind: CExprKind.Return,
                    value: this.#returning(this.#value(value), value.layout),
                };
            }
            case MExprKind.If:
                return {
                    kind: CExprKind.If,
                    ty: coreTypeOfLayout(expr.layout),
                    cond: this.#value(expr.cond),
                    then: this.#value(expr.then),
                    else: expr.else ? this.#value(expr.else) : cUnit(),
                };
            case MExprKind.While:
                return {
                    kind: CExprKind.While,
                    cond: this.#value(expr.cond),
                    body: this.#value(expr.body),
                };
            case MExprKind.Sequence:
                return cSeq(this.#value(expr.first), this.#value(expr.second));
            case MExprKind.LetIn:
                return this.#letIn(expr.binding, expr.storage, expr.init, expr.body);
            case MExprKind.Block:
            case MExprKind.Let:
                return internalError("unflattened block reached core lowering");
        }
    }

    #letIn(binding: MBinding, storage: StorageClass, init: MExpr, body: MExpr): CExpr {
        const initValue = this.#value(init);
        const { layout } = binding;
        if (storage === StorageClass.Register) {
            if (layout.size === 0) {
                this.#homes.set(binding.id, { kind: HomeKind.Empty });
                return cSeq(initValue, this.#value(body));
            }
            const ty = coreTypeOf(layout);
            this.#homes.set(binding.id, { kind: HomeKind.Register, id: binding.id, ty });
            return {
                kind: CExprKind.Let,
                id: binding.id,
                storage: StorageClass.Register,
                ty,
                init: initValue,
                body: this.#value(body),
            };
        }
        return this.#withSlot(layout, (slot, id) => {
            this.#homes.set(binding.id, { kind: HomeKind.Slot, id });
            return cSeq(this.#storeValue(slot, layout, initValue), this.#value(body));
        });
    }

    /**
     * Write `value` to `ptr`: a typed store for register-sized values, a
     * byte copy for memory-class values, only its effects when zero-sized.
     */
    #storeValue(ptr: CExpr, layout: Layout, value: CExpr): CExpr {
        if (layout.size === 0) {
            return isPure(ptr) ? value : cSeq(ptr, value);
        }
        if (isMemoryClass(layout)) {
            return { kind: CExprKind.Copy, dst: ptr, src: value, size: layout.size };
        }
        const { base, offset } = splitOffset(ptr);
        return { kind: CExprKind.Store, ty: coreTypeOf(layout), ptr: base, offset, value };
    }

    #part(offset: number, layout: Layout, value: MExpr): Part {
        return { offset, layout, value: () => this.#value(value) };
    }

    /**
     * Build an aggregate from its members, evaluated in the order given.
     * Register-sized results are assembled with `Insert`; anything else,
     * or anything holding a memory-class member, is written to a slot.
     */
    #construct(layout: Layout, parts: readonly Part[], tag: Part | null): CExpr {
        if (layout.size === 0) {
            const effects = parts.map((part) => part.value());
            let result = cUnit();
            for (let i = effects.length - 1; i >= 0; i--) result = cSeq(effects[i], result);
            return result;
        }
        const registerBuild =
            !isMemoryClass(layout) && parts.every((p) => !isMemoryClass(p.layout));
        if (registerBuild) {
            const ty = coreTypeOf(layout);
            let acc: CExpr = cConst(ty, 0);
            for (const part of tag ? [tag, ...parts] : parts) {
                const field = part.value();
                if (part.layout.size === 0) {
                    if (isPure(field)) continue;
                    const id = this.#fresh();
                    acc = {
                        kind: CExprKind.Let,
                        id,
                        storage: StorageClass.Register,
                        ty,
                        init: acc,
                        body: cSeq(field, cLocal(id, ty)),
                    };
                    continue;
                }
                acc = {
                    kind: CExprKind.Insert,
                    ty,
                    value: acc,
                    offset: part.offset,
                    fieldTy: coreTypeOf(part.layout),
                    field,
                };
            }
            return acc;
        }
        return this.#withSlot(layout, (slot) => {
            const stores = (tag ? [tag, ...parts] : parts).map((part) =>
                this.#storeValue(cPtrOffset(slot, part.offset), part.layout, part.value()),
            );
            let result: CExpr = isMemoryClass(layout)
                ? slot
                : { kind: CExprKind.Load, ty: coreTypeOf(layout), ptr: slot, offset: 0 };
            for (let i = stores.length - 1; i >= 0; i--) result = cSeq(stores[i], result);
            return result;
        });
    }

    #constructVariant(expr: MEnumCons): CExpr {
        const variant = enumVariantMember(expr.layout, expr.variant);
        const parts = expr.args.map((value, i) => {
            const member = aggregateMember(variant.layout, i);
            return this.#part(variant.offset + member.offset, member.layout, value);
        });
        const tagMember = enumTagMember(expr.layout);
        const tag: Part | null = tagMember
            ? {
                  offset: tagMember.offset,
                  layout: tagMember.layout,
                  value: () => cConst(coreTypeOf(tagMember.layout), expr.variant),
              }
            : null;
        return this.#construct(expr.layout, parts, tag);
    }

    #call(expr: MCall): CExpr {
        const callee = this.#value(expr.callee);
        const lowered = expr.args.map((arg) => ({ layout: arg.layout, value: this.#value(arg) }));
        const retLayout = expr.layout;

        const build = (args: CExpr[]): CExpr => {
            if (isMemoryClass(retLayout)) {
                return this.#withSlot(retLayout, (slot) => ({
                    kind: CExprKind.Call,
                    callee,
                    args: [...args, slot],
                    ret: CoreType.Usize,
                }));
            }
            return { kind: CExprKind.Call, callee, args, ret: coreTypeOfLayout(retLayout) };
        };

        // A memory-class argument is an address; copy it out before a later
        // argument's effects can write through it
        let lastImpure = -1;
        lowered.forEach((arg, i) => {
            if (!isPure(arg.value)) lastImpure = i;
        });
        const bindAll = lowered.some((a) => a.layout.size === 0 && !isPure(a.value));
        const snapshot = lowered.some((a, i) => i < lastImpure && isMemoryClass(a.layout));
        if (!bindAll && !snapshot) {
            return build(lowered.filter((a) => a.layout.size > 0).map((a) => a.value));
        }

        // Zero-sized arguments are dropped, their effects kept in order
        type Step =
            | { id: CoreVar; ty: CoreType; value: CExpr }
            | { id: CoreVar; slot: CExpr; value: CExpr; size: number }
            | { effect: CExpr };
        const steps: Step[] = [];
        const args: CExpr[] = [];
        lowered.forEach((arg, i) => {
            if (arg.layout.size === 0) {
                if (bindAll) steps.push({ effect: arg.value });
                return;
            }
            if (i < lastImpure && isMemoryClass(arg.layout)) {
                const id = this.#fresh();
                steps.push({
                    id,
                    slot: this.#stackSlot(arg.layout),
                    value: arg.value,
                    size: arg.layout.size,
                });
                args.push(cLocal(id, CoreType.Usize));
                return;
            }
            if (!bindAll) {
                args.push(arg.value);
                return;
            }
            const id = this.#fresh();
            const ty = coreTypeOf(arg.layout);
            steps.push({ id, ty, value: arg.value });
            args.push(cLocal(id, ty));
        });
        let result = build(args);
        for (let i = steps.length - 1; i >= 0; i--) {
            const step = steps[i];
            if ("effect" in step) {
                result = cSeq(step.effect, result);
            } else if ("slot" in step) {
                const slot = cLocal(step.id, CoreType.Usize);
                result = {
                    kind: CExprKind.Let,
                    id: step.id,
                    storage: StorageClass.Stack,
                    ty: CoreType.Usize,
                    init: step.slot,
                    body: cSeq({ kind: CExprKind.Copy, dst: slot, src: step.value, size: step.size }, result),
                };
            } else {
                result = {
                    kind: CExprKind.Let,
                    id: step.id,
                    storage: StorageClass.Register,
                    ty: step.ty,
                    init: step.value,
                    body: result,
                };
            }
        }
        return result;
    }

    #enumTag(base: MExpr, layout: Layout): CExpr {
        const ty = coreTypeOf(layout);
        const access = this.#access(base);
        const tag = enumTagMember(base.layout);
        if (tag === null) {
            return cSeq(this.#discard(access), cConst(ty, 0));
        }
        if (coreTypeOf(tag.layout) !== ty) {
            return internalError("enum tag read at a different width");
        }
        return this.#read(this.#project(access, tag.offset), tag.layout);
    }

    // ========================================================================
    // Access paths
    // ========================================================================

    #access(expr: MExpr): Access {
        switch (expr.kind) {
            case MExprKind.Local:
                return this.#localAccess(expr.id, expr.layout);
            case MExprKind.Field: {
                const member = aggregateMember(expr.base.layout, expr.index);
                return this.#project(this.#access(expr.base), member.offset);
            }
            case MExprKind.VariantField: {
                const variant = enumVariantMember(expr.base.layout, expr.variant);
                const member = aggregateMember(variant.layout, expr.index);
                return this.#project(this.#access(expr.base), variant.offset + member.offset);
            }
            case MExprKind.Index: {
                const stride = expr.layout.size;
                if (expr.index.kind === MExprKind.Const) {
                    return this.#project(this.#access(expr.base), expr.index.value * stride);
                }
                const addr = this.#addressOf(expr.base);
                return {
                    kind: AccessKind.Memory,
                    addr: { kind: CExprKind.PtrIndex, ptr: addr, index: this.#value(expr.index), stride },
                };
            }
            case MExprKind.Deref:
                return { kind: AccessKind.Memory, addr: this.#value(expr.ptr) };
            default:
                break;
        }
        const value = this.#value(expr);
        if (expr.layout.size === 0) return { kind: AccessKind.Empty, effects: value };
        if (isMemoryClass(expr.layout)) return { kind: AccessKind.Memory, addr: value };
        const ty = coreTypeOf(expr.layout);
        return {
            kind: AccessKind.Register,
            value,
            ty,
            offset: 0,
            root: null,
            rootLayout: expr.layout,
        };
    }

    #localAccess(id: number, layout: Layout): Access {
        const home = this.#homes.get(id) ?? internalError(`local #${id} has no home`);
        switch (home.kind) {
            case HomeKind.Empty:
                return { kind: AccessKind.Empty, effects: cUnit() };
            case HomeKind.Slot:
                return { kind: AccessKind.Memory, addr: cLocal(home.id, CoreType.Usize) };
            case HomeKind.Register:
                return {
                    kind: AccessKind.Register,
                    value: cLocal(home.id, home.ty),
                    ty: home.ty,
                    offset: 0,
                    root: home.id,
                    rootLayout: layout,
                };
        }
    }

    #project(access: Access, offset: number): Access {
        switch (access.kind) {
            case AccessKind.Memory:
                return { kind: AccessKind.Memory, addr: cPtrOffset(access.addr, offset) };
            case AccessKind.Register:
                return { ...access, offset: access.offset + offset };
            case AccessKind.Empty:
                return access;
        }
    }

    #discard(access: Access): CExpr {
        switch (access.kind) {
            case AccessKind.Memory:
                return isPure(access.addr) ? cUnit() : access.addr;
            case AccessKind.Register:
                return isPure(access.value) ? cUnit() : access.value;
            case AccessKind.Empty:
                return access.effects;
        }
    }

    #read(access: Access, layout: Layout): CExpr {
        if (layout.size === 0) return this.#discard(access);
        switch (access.kind) {
            case AccessKind.Memory: {
                if (isMemoryClass(layout)) return access.addr;
                const { base, offset } = splitOffset(access.addr);
                return { kind: CExprKind.Load, ty: coreTypeOf(layout), ptr: base, offset };
            }
            case AccessKind.Register: {
                if (isMemoryClass(layout)) {
                    return cPtrOffset(this.#spill(access), access.offset);
                }
                const ty = coreTypeOf(layout);
                if (access.offset === 0 && ty === access.ty) return access.value;
                return { kind: CExprKind.Extract, ty, value: access.value, offset: access.offset };
            }
            case AccessKind.Empty:
                return internalError("sized read from a zero-sized place");
        }
    }

    /**
     * Store a register value into a fresh slot and yield the slot address.
     */
    #spill(access: Extract<Access, { kind: AccessKind.Register }>): CExpr {
        return this.#withSlot(access.rootLayout, (slot) =>
            cSeq(
                { kind: CExprKind.Store, ty: access.ty, ptr: slot, offset: 0, value: access.value },
                slot,
            ),
        );
    }

    #addressOf(place: MExpr): CExpr {
        const access = this.#access(place);
        switch (access.kind) {
            case AccessKind.Memory:
                return access.addr;
            case AccessKind.Register:
                if (access.root !== null) {
                    return internalError("address taken of a register-resident binding");
                }
                return cPtrOffset(this.#spill(access), access.offset);
            case AccessKind.Empty:
                return cSeq(access.effects, this.#stackSlot(place.layout));
        }
    }

    #assign(place: MExpr, value: MExpr): CExpr {
        const access = this.#access(place);
        const layout = place.layout;
        switch (access.kind) {
            case AccessKind.Memory:
                return this.#storeValue(access.addr, layout, this.#value(value));
            case AccessKind.Empty:
                return cSeq(access.effects, this.#value(value));
            case AccessKind.Register: {
                const root = access.root;
                if (root === null) {
                    return internalError("assignment to a temporary value");
                }
                const field = this.#value(value);
                if (layout.size === 0) return field;
                if (isPure(field)) return this.#setField(access, root, layout, field);
                // The new value may itself write to `root`; read it back only afterwards
                const tmp = this.#fresh();
                const ty = coreTypeOf(layout);
                return {
                    kind: CExprKind.Let,
                    id: tmp,
                    storage: StorageClass.Register,
                    ty,
                    init: field,
                    body: this.#setField(access, root, layout, cLocal(tmp, ty)),
                };
            }
        }
    }

    #setField(
        access: Extract<Access, { kind: AccessKind.Register }>,
        root: CoreVar,
        layout: Layout,
        field: CExpr,
    ): CExpr {
        const current = cLocal(root, access.ty);
        if (isMemoryClass(layout)) {
            return this.#withSlot(access.rootLayout, (slot) =>
                cSeq(
                    { kind: CExprKind.Store, ty: access.ty, ptr: slot, offset: 0, value: current },
                    cSeq(
                        {
                            kind: CExprKind.Copy,
                            dst: cPtrOffset(slot, access.offset),
                            src: field,
                            size: layout.size,
                        },
                        {
                            kind: CExprKind.Set,
                            id: root,
                            value: { kind: CExprKind.Load, ty: access.ty, ptr: slot, offset: 0 },
                        },
                    ),
                ),
            );
        }
        const fieldTy = coreTypeOf(layout);
        if (access.offset === 0 && fieldTy === access.ty) {
            return { kind: CExprKind.Set, id: root, value: field };
        }
        return {
            kind: CExprKind.Set,
            id: root,
            value: {
                kind: CExprKind.Insert,
                ty: access.ty,
                value: current,
                offset: access.offset,
                fieldTy,
                field,
            },
        };
    }
}
