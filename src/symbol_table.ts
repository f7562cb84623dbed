import { internalError } from "./diagnostics";
import type { Span, TVar, Type } from "./types";

export type SymbolId = number;

export enum SymbolKind {
    Function,
    TypeAlias,
    TypeConstructor,
}

export type SymbolAttributes = {
    builtinName: string | null;
    isExtern: boolean;
    noMangle: boolean;
};

export type FunctionSymbol = {
    kind: SymbolKind.Function;
    typeParams: string[];
    params: Type[];
    returnType: Type;
};

export type TypeAliasSymbol = {
    kind: SymbolKind.TypeAlias;
    target: Type;
};

export type TypeConstructorSymbol = {
    kind: SymbolKind.TypeConstructor;
    parent: TVar;
    variant: number;
    args: Type[];
};

export type SymbolInfo = {
    id: SymbolId;
    name: string;
    span: Span;
    sym: FunctionSymbol | TypeAliasSymbol | TypeConstructorSymbol;
    attributes: SymbolAttributes;
};

const MANGLE_PREFIX = "_M";

function defaultAttributes(): SymbolAttributes {
    return { builtinName: null, isExtern: false, noMangle: false };
}

/**
 * Set symbol flags according to the attributes written on a declaration.
 * Recognized: `extern`, `no_mangle` and `builtin = "<op>"`; anything
 * else belongs to other passes and is ignored here.
 */
function parseSymbolAttributes(attributes: readonly string[]): SymbolAttributes {
    const result = defaultAttributes();
    for (const attr of attributes) {
        const trimmed = attr.trim();
        if (trimmed === "extern") {
            result.isExtern = true;
            continue;
        }
        if (trimmed === "no_mangle") {
            result.noMangle = true;
            continue;
        }
        const builtin = /^builtin\s*=\s*"([^"]+)"$/.exec(trimmed);
        if (builtin) {
            result.builtinName = builtin[1];
        }
    }
    return result;
}

/**
 * Name a symbol is emitted under. External and `no_mangle` symbols keep
 * their source name; everything else is prefixed and made unique by id.
 */
function symbolLinkName(info: SymbolInfo): string {
    if (info.attributes.isExtern || info.attributes.noMangle) {
        return info.name;
    }
    return `${MANGLE_PREFIX}${info.name.length}${info.name}_${info.id}`;
}

/**
 * Read-only table of per-declaration metadata.
 */
export class SymbolTable {
    readonly #symbols: ReadonlyMap<SymbolId, SymbolInfo>;

    constructor(symbols: ReadonlyMap<SymbolId, SymbolInfo>) {
        this.#symbols = symbols;
    }

    lookupSymbol(id: SymbolId): SymbolInfo {
        return this.#symbols.get(id) ?? internalError(`unknown symbol #${id}`);
    }

    has(id: SymbolId): boolean {
        return this.#symbols.has(id);
    }

    /**
     * All symbols in ascending id order.
     */
    symbols(): SymbolInfo[] {
        return [...this.#symbols.values()].sort((a, b) => a.id - b.id);
    }
}

type SymbolOptions = { span?: Span; attributes?: readonly string[] };

export class SymbolTableBuilder {
    #symbols: Map<SymbolId, SymbolInfo>;
    #nextId: SymbolId;
    #built: boolean;

    constructor() {
        this.#symbols = new Map();
        this.#nextId = 1;
        this.#built = false;
    }

    #add(
        name: string,
        sym: SymbolInfo["sym"],
        options: SymbolOptions,
    ): SymbolId {
        if (this.#built) {
            internalError("symbol table modified after it was built");
        }
        const { span = { line: 0, column: 0, start: 0, end: 0 }, attributes = [] } =
            options;
        const id = this.#nextId++;
        this.#symbols.set(
            id,
            Object.freeze({
                id,
                name,
                span,
                sym,
                attributes: parseSymbolAttributes(attributes),
            }),
        );
        return id;
    }

    addFunction(
        name: string,
        params: Type[],
        returnType: Type,
        options: SymbolOptions & { typeParams?: string[] } = {},
    ): SymbolId {
        const { typeParams = [] } = options;
        return this.#add(
            name,
            { kind: SymbolKind.Function, typeParams, params, returnType },
            options,
        );
    }

    addTypeAlias(name: string, target: Type, options: SymbolOptions = {}): SymbolId {
        return this.#add(name, { kind: SymbolKind.TypeAlias, target }, options);
    }

    addTypeConstructor(
        name: string,
        parent: TVar,
        variant: number,
        args: Type[],
        options: SymbolOptions = {},
    ): SymbolId {
        return this.#add(
            name,
            { kind: SymbolKind.TypeConstructor, parent, variant, args },
            options,
        );
    }

    build(): SymbolTable {
        this.#built = true;
        return new SymbolTable(new Map(this.#symbols));
    }
}

export { parseSymbolAttributes, symbolLinkName, MANGLE_PREFIX };
