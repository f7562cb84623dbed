import { TypeDefKind, type TypeDefinition, type TypeRegistry } from "./type_registry";
import { TypeKind, type TVar, type Type } from "./types";

/**
 * Direct-embedding graph: `A -> B` when a value of `A` stores a `B` inline.
 * Every registered TVar is a key, with its edges in ascending order.
 */
export type DependencyGraph = Map<TVar, TVar[]>;

export type TopoSortResult = {
    // Every TVar whose dependencies are all acyclic, dependencies first
    order: TVar[];
    // TVars that lie on a direct-embedding cycle
    cycles: TVar[];
    // TVars that are not on a cycle but embed one
    blocked: TVar[];
};

/**
 * For a TVar, whether each of its type parameters is stored inline by the
 * definition. Arguments past the end of the list count as inline.
 */
export type ArgEmbedding = (tvar: TVar) => readonly boolean[];

function argIsInline(flags: readonly boolean[], index: number): boolean {
    return index >= flags.length || flags[index];
}

/**
 * TVars a type stores inline. An argument of an applied type is embedded
 * only when the definition stores that parameter inline; pointers and
 * function types store an address only.
 */
function embeddedTVars(type: Type, out: Set<TVar>, argEmbedding: ArgEmbedding): void {
    switch (type.kind) {
        case TypeKind.Named: {
            out.add(type.tvar);
            const flags = argEmbedding(type.tvar);
            type.args.forEach((arg, i) => {
                if (argIsInline(flags, i)) embeddedTVars(arg, out, argEmbedding);
            });
            return;
        }
        case TypeKind.Tuple:
            for (const el of type.elements) embeddedTVars(el, out, argEmbedding);
            return;
        case TypeKind.Array:
            embeddedTVars(type.element, out, argEmbedding);
            return;
        case TypeKind.Param:
        case TypeKind.Ptr:
        case TypeKind.Fn:
            return;
    }
}

function memberTypes(definition: TypeDefinition): Type[] {
    switch (definition.def.kind) {
        case TypeDefKind.Builtin:
            return [];
        case TypeDefKind.Struct:
            return definition.def.fields.map((field) => field.type);
        case TypeDefKind.Enum:
            return definition.def.variants.flatMap((variant) => variant.payload);
    }
}

function inlineParams(type: Type, out: Set<string>, argEmbedding: ArgEmbedding): void {
    switch (type.kind) {
        case TypeKind.Param:
            out.add(type.name);
            return;
        case TypeKind.Named: {
            const flags = argEmbedding(type.tvar);
            type.args.forEach((arg, i) => {
                if (argIsInline(flags, i)) inlineParams(arg, out, argEmbedding);
            });
            return;
        }
        case TypeKind.Tuple:
            for (const el of type.elements) inlineParams(el, out, argEmbedding);
            return;
        case TypeKind.Array:
            inlineParams(type.element, out, argEmbedding);
            return;
        case TypeKind.Ptr:
        case TypeKind.Fn:
            return;
    }
}

/**
 * Parameter flags of every generic definition in the registry, computed
 * on first use.
 */
function makeArgEmbedding(registry: TypeRegistry): ArgEmbedding {
    const memo = new Map<TVar, readonly boolean[]>();
    const argEmbedding = (tvar: TVar): readonly boolean[] => {
        const cached = memo.get(tvar);
        if (cached) return cached;
        const definition = registry.lookupType(tvar);
        if (definition.def.kind === TypeDefKind.Builtin) return [];
        const { params } = definition.def;
        // Re-entry only happens when the definition embeds itself, which
        // is already a cycle on its own TVar
        memo.set(tvar, params.map(() => false));
        const inline = new Set<string>();
        for (const type of memberTypes(definition)) inlineParams(type, inline, argEmbedding);
        const flags = params.map((param) => inline.has(param));
        memo.set(tvar, flags);
        return flags;
    };
    return argEmbedding;
}

function definitionDependencies(definition: TypeDefinition, argEmbedding: ArgEmbedding): TVar[] {
    const deps = new Set<TVar>();
    for (const type of memberTypes(definition)) embeddedTVars(type, deps, argEmbedding);
    return [...deps].sort((a, b) => a - b);
}

function makeDependencyGraph(registry: TypeRegistry): DependencyGraph {
    const graph: DependencyGraph = new Map();
    const argEmbedding = makeArgEmbedding(registry);
    for (const definition of registry.definitions()) {
        graph.set(definition.tvar, definitionDependencies(definition, argEmbedding));
    }
    return graph;
}

/**
 * `B -> [A...]` for every `A -> B`: who embeds each node.
 */
function reverseGraph(graph: DependencyGraph): DependencyGraph {
    const reversed: DependencyGraph = new Map();
    for (const node of graph.keys()) reversed.set(node, []);
    for (const [from, tos] of graph) {
        for (const to of tos) {
            const list = reversed.get(to);
            if (list) {
                list.push(from);
            } else {
                reversed.set(to, [from]);
            }
        }
    }
    for (const list of reversed.values()) list.sort((a, b) => a - b);
    return reversed;
}

function insertSorted(queue: TVar[], tvar: TVar): void {
    let i = queue.length;
    while (i > 0 && queue[i - 1] > tvar) i--;
    queue.splice(i, 0, tvar);
}

/**
 * Kahn's algorithm with dependencies before dependents. Among nodes that
 * are ready at the same time the smallest TVar goes first.
 */
function topoSort(graph: DependencyGraph): TopoSortResult {
    const dependents = reverseGraph(graph);
    const pending = new Map<TVar, number>();
    const ready: TVar[] = [];
    for (const [node, deps] of graph) {
        const count = deps.filter((d) => graph.has(d)).length;
        pending.set(node, count);
        if (count === 0) insertSorted(ready, node);
    }

    const order: TVar[] = [];
    while (ready.length > 0) {
        const node = ready.shift();
        if (node === undefined) break;
        order.push(node);
        for (const dependent of dependents.get(node) ?? []) {
            const left = (pending.get(dependent) ?? 0) - 1;
            pending.set(dependent, left);
            if (left === 0) insertSorted(ready, dependent);
        }
    }

    const leftover = new Set<TVar>();
    for (const [node, left] of pending) {
        if (left > 0) leftover.add(node);
    }
    const cycles = cycleMembers(graph, leftover);
    const cycleSet = new Set(cycles);
    const blocked = [...leftover]
        .filter((node) => !cycleSet.has(node))
        .sort((a, b) => a - b);
    return { order, cycles, blocked };
}

/**
 * Among the nodes Kahn's algorithm could not schedule, find the ones that
 * lie on a cycle. A second peel removes nodes nothing else in the leftover
 * set embeds; the survivors are then checked for reaching themselves.
 */
function cycleMembers(graph: DependencyGraph, leftover: ReadonlySet<TVar>): TVar[] {
    const embeddedBy = new Map<TVar, number>();
    for (const node of leftover) embeddedBy.set(node, 0);
    for (const node of leftover) {
        for (const dep of graph.get(node) ?? []) {
            if (leftover.has(dep)) {
                embeddedBy.set(dep, (embeddedBy.get(dep) ?? 0) + 1);
            }
        }
    }

    const remaining = new Set(leftover);
    const peel = [...leftover].filter((node) => embeddedBy.get(node) === 0);
    while (peel.length > 0) {
        const node = peel.pop();
        if (node === undefined) break;
        remaining.delete(node);
        for (const dep of graph.get(node) ?? []) {
            if (!remaining.has(dep)) continue;
            const left = (embeddedBy.get(dep) ?? 0) - 1;
            embeddedBy.set(dep, left);
            if (left === 0) peel.push(dep);
        }
    }

    return [...remaining]
        .filter((node) => findCycle(graph, node, remaining) !== null)
        .sort((a, b) => a - b);
}

/**
 * Shortest embedding path from `start` back to itself, without the
 * repeated final node, or null when `start` is not on a cycle.
 */
function findCycle(
    graph: DependencyGraph,
    start: TVar,
    within: ReadonlySet<TVar>,
): TVar[] | null {
    const parent = new Map<TVar, TVar>();
    const queue: TVar[] = [start];
    const seen = new Set<TVar>([start]);
    while (queue.length > 0) {
        const node = queue.shift();
        if (node === undefined) break;
        for (const dep of graph.get(node) ?? []) {
            if (!within.has(dep)) continue;
            if (dep === start) {
                const path = [node];
                let current = node;
                while (current !== start) {
                    const prev = parent.get(current);
                    if (prev === undefined) break;
                    path.push(prev);
                    current = prev;
                }
                return path.reverse();
            }
            if (seen.has(dep)) continue;
            seen.add(dep);
            parent.set(dep, node);
            queue.push(dep);
        }
    }
    return null;
}

export {
    embeddedTVars,
    makeArgEmbedding,
    makeDependencyGraph,
    reverseGraph,
    topoSort,
    cycleMembers,
    findCycle,
};
