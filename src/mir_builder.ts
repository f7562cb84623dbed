import { builtinOperationArity } from "./builtin_types";
import { internalError } from "./diagnostics";
import type { Layout, LayoutCache } from "./memory_layout";
import {
    MExprKind,
    type MBinding,
    type MExpr,
    type MirFunction,
    type VarId,
} from "./mir";
import { flattenBlocks } from "./mir_flatten";
import { analyzeStorage } from "./storage_class";
import { SymbolKind, type SymbolTable } from "./symbol_table";
import { TExprKind, type TExpr, type TLet, type TypedFunction } from "./typed_ast";
import { TypeDefKind, type TypeRegistry } from "./type_registry";
import { TypeKind, type Span, type Type, typeToString } from "./types";

type Meta = { ty: Type; layout: Layout; span: Span };

export type MirContext = {
    registry: TypeRegistry;
    symbols: SymbolTable;
    layouts: LayoutCache;
};

/**
 * Translate one typed function into MIR: resolve names to bindings and
 * field names to declaration positions, attach layouts, decide storage
 * classes and flatten blocks.
 */
export function buildMirFunction(fn: TypedFunction, ctx: MirContext): MirFunction {
    const builder = new MirBuilder(ctx);
    const params = fn.params.map((p) => builder.bind(p.name, p.ty, p.mutable));
    const raw = builder.lower(fn.body);
    const storage = analyzeStorage(params, raw);
    const body = flattenBlocks(raw, storage);
    return {
        symbol: fn.symbol,
        name: fn.name,
        params: params.map((binding) => ({
            binding,
            storage:
                storage.get(binding.id) ??
                internalError(`parameter \`${binding.name}\` has no storage class`),
        })),
        returnType: fn.returnType,
        returnLayout: ctx.layouts.getLayout(fn.returnType),
        bindings: builder.bindings,
        storage,
        body,
    };
}

class MirBuilder {
    readonly bindings: Map<VarId, MBinding>;
    readonly #ctx: MirContext;
    #scopes: Map<string, VarId>[];
    #nextVarId: VarId;

    constructor(ctx: MirContext) {
        this.bindings = new Map();
        this.#ctx = ctx;
        this.#scopes = [new Map()];
        this.#nextVarId = 1;
    }

    bind(name: string, ty: Type, mutable: boolean): MBinding {
        const binding: MBinding = {
            id: this.#nextVarId++,
            name,
            ty,
            layout: this.#ctx.layouts.getLayout(ty),
            mutable,
        };
        this.bindings.set(binding.id, binding);
        this.#scopes[this.#scopes.length - 1].set(name, binding.id);
        return binding;
    }

    #lookup(name: string): MBinding {
        for (let i = this.#scopes.length - 1; i >= 0; i--) {
            const id = this.#scopes[i].get(name);
            if (id !== undefined) {
                return this.bindings.get(id) ?? internalError(`binding #${id} vanished`);
            }
        }
        return internalError(`unknown local \`${name}\``);
    }

    #meta(ty: Type, span: Span): Meta {
        return { ty, layout: this.#ctx.layouts.getLayout(ty), span };
    }

    lower(expr: TExpr): MExpr {
        const meta = this.#meta(expr.ty, expr.span);
        switch (expr.kind) {
            case TExprKind.Unit:
                return { kind: MExprKind.Unit, ...meta };
            case TExprKind.IntLit:
                return { kind: MExprKind.Const, ...meta, value: expr.value };
            case TExprKind.BoolLit:
                return { kind: MExprKind.Const, ...meta, value: expr.value ? 1 : 0 };
            case TExprKind.Local:
                return { kind: MExprKind.Local, ...meta, id: this.#lookup(expr.name).id };
            case TExprKind.Global:
                this.#ctx.symbols.lookupSymbol(expr.symbol);
                return { kind: MExprKind.Global, ...meta, symbol: expr.symbol };
            case TExprKind.Tuple:
                return {
                    kind: MExprKind.Tuple,
                    ...meta,
                    elements: expr.elements.map((e) => this.lower(e)),
                };
            case TExprKind.ArrayLit:
                return {
                    kind: MExprKind.ArrayLit,
                    ...meta,
                    elements: expr.elements.map((e) => this.lower(e)),
                };
            case TExprKind.StructCons:
                return {
                    kind: MExprKind.StructCons,
                    ...meta,
                    fields: expr.fields.map((f) => ({
                        index: this.#fieldIndex(expr.ty, f.name),
                        value: this.lower(f.value),
                    })),
                };
            case TExprKind.EnumCons: {
                const info = this.#ctx.symbols.lookupSymbol(expr.ctor);
                if (info.sym.kind !== SymbolKind.TypeConstructor) {
                    return internalError(`\`${info.name}\` is not a variant constructor`);
                }
                return {
                    kind: MExprKind.EnumCons,
                    ...meta,
                    variant: info.sym.variant,
                    args: expr.args.map((a) => this.lower(a)),
                };
            }
            case TExprKind.Call:
                return this.#lowerCall(expr.callee, expr.args, meta);
            case TExprKind.Field: {
                const base = this.lower(expr.base);
                return {
                    kind: MExprKind.Field,
                    ...meta,
                    base,
                    index: this.#fieldIndex(expr.base.ty, expr.field),
                };
            }
            case TExprKind.VariantField:
                return {
                    kind: MExprKind.VariantField,
                    ...meta,
                    base: this.lower(expr.value),
                    variant: expr.variant,
                    index: expr.index,
                };
            case TExprKind.EnumTag:
                return { kind: MExprKind.EnumTag, ...meta, base: this.lower(expr.value) };
            case TExprKind.Index:
                return {
                    kind: MExprKind.Index,
                    ...meta,
                    base: this.lower(expr.base),
                    index: this.lower(expr.index),
                };
            case TExprKind.Ref:
                return { kind: MExprKind.AddrOf, ...meta, place: this.lower(expr.place) };
            case TExprKind.Deref:
                return { kind: MExprKind.Deref, ...meta, ptr: this.lower(expr.ptr) };
            case TExprKind.Assign: {
                const place = this.lower(expr.place);
                return { kind: MExprKind.Assign, ...meta, place, value: this.lower(expr.value) };
            }
            case TExprKind.Return:
                return {
                    kind: MExprKind.Return,
                    ...meta,
                    value: expr.value ? this.lower(expr.value) : null,
                };
            case TExprKind.If: {
                const { then, else: otherwise } = expr;
                return {
                    kind: MExprKind.If,
                    ...meta,
                    cond: this.lower(expr.cond),
                    then: this.#scoped(() => this.lower(then)),
                    else: otherwise ? this.#scoped(() => this.lower(otherwise)) : null,
                };
            }
            case TExprKind.While:
                return {
                    kind: MExprKind.While,
                    ...meta,
                    cond: this.lower(expr.cond),
                    body: this.#scoped(() => this.lower(expr.body)),
                };
            case TExprKind.Block:
                return this.#scoped(() => {
                    const stmts = expr.stmts.map((s) =>
                        s.kind === TExprKind.Let ? this.#lowerLet(s) : this.lower(s),
                    );
                    const tail = expr.tail ? this.lower(expr.tail) : null;
                    return { kind: MExprKind.Block, ...meta, stmts, tail };
                });
            case TExprKind.Let:
                return internalError(`binding \`${expr.name}\` appears outside of a block`);
        }
    }

    #scoped<T>(f: () => T): T {
        this.#scopes.push(new Map());
        try {
            return f();
        } finally {
            this.#scopes.pop();
        }
    }

    #lowerLet(stmt: TLet): MExpr {
        // The initializer cannot see the name it defines
        const init = this.lower(stmt.init);
        const binding = this.bind(stmt.name, stmt.init.ty, stmt.mutable);
        return { kind: MExprKind.Let, ...this.#meta(stmt.ty, stmt.span), binding, init };
    }

    #lowerCall(
        callee: TExpr,
        args: readonly TExpr[],
        meta: Meta,
    ): MExpr {
        if (callee.kind === TExprKind.Global) {
            const info = this.#ctx.symbols.lookupSymbol(callee.symbol);
            const op = info.attributes.builtinName;
            if (op !== null) {
                const arity = builtinOperationArity(op);
                if (arity === null) {
                    return internalError(`\`${info.name}\` names unknown builtin \`${op}\``);
                }
                if (arity !== args.length) {
                    return internalError(
                        `builtin \`${op}\` takes ${arity} operands, got ${args.length}`,
                    );
                }
                return {
                    kind: MExprKind.Builtin,
                    ...meta,
                    op,
                    args: args.map((a) => this.lower(a)),
                };
            }
        }
        return {
            kind: MExprKind.Call,
            ...meta,
            callee: this.lower(callee),
            args: args.map((a) => this.lower(a)),
        };
    }

    /**
     * Declaration position of a named struct field or a tuple element.
     */
    #fieldIndex(ty: Type, field: string): number {
        if (ty.kind === TypeKind.Tuple) {
            const index = Number(field);
            if (!Number.isInteger(index) || index < 0 || index >= ty.elements.length) {
                return internalError(`\`${typeToString(ty)}\` has no element ${field}`);
            }
            return index;
        }
        if (ty.kind === TypeKind.Named) {
            const definition = this.#ctx.registry.lookupType(ty.tvar);
            if (definition.def.kind === TypeDefKind.Struct) {
                const index = definition.def.fields.findIndex((f) => f.name === field);
                if (index >= 0) return index;
            }
        }
        return internalError(`\`${typeToString(ty)}\` has no field \`${field}\``);
    }
}
