import type { CoreFunction, CoreProgram } from "./core";
import { lowerCoreFunction, lowerCoreSymbols } from "./core_lowering";
import { printCoreFunction, printCoreProgram } from "./core_printer";
import { validateFunction as validateCoreFunction } from "./core_validate";
import {
    DiagnosticCollector,
    InternalCompilerError,
    formatUnsizedSignature,
    spanToSourceSpan,
    type Diagnostic,
} from "./diagnostics";
import { LayoutCache } from "./memory_layout";
import type { MirFunction } from "./mir";
import { buildMirFunction } from "./mir_builder";
import { printMirFunction } from "./mir_printer";
import { computeFrame, type FrameLayout } from "./stack_alloc";
import { SymbolKind, type SymbolInfo } from "./symbol_table";
import { collectProgramTypes, type TypedProgram } from "./typed_ast";
import { isConcreteType, typeToString, type Type } from "./types";

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

export type CompileDiagnostic = {
    message: string;
    span?: { line: number; column: number; length?: number };
    kind?: "layout" | "signature" | "internal" | "validation";
};

export type LowerOptions = {
    validate?: boolean;
    trace?: boolean;
    computeFrames?: boolean;
};

export type LowerResult = {
    ok: boolean;
    errors: CompileDiagnostic[];
    // Every user diagnostic, notes included
    diagnostics: Diagnostic[];
    layouts?: LayoutCache;
    mir?: MirFunction[];
    core?: CoreProgram;
    // Keyed by link name
    frames?: Map<string, FrameLayout>;
    trace: string[];
};

export type CompileResult = LowerResult & { text?: string };

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function toCompileDiagnostic(
    diag: Diagnostic,
    kind: CompileDiagnostic["kind"],
): CompileDiagnostic {
    const message = diag.code ? `[${diag.code}] ${diag.message}` : diag.message;
    if (!diag.span) return { message, kind };
    const { start, end } = diag.span;
    return {
        message,
        span: {
            line: start.line,
            column: start.column,
            length: end.line === start.line ? end.column - start.column : undefined,
        },
        kind,
    };
}

/**
 * Types a symbol's signature needs laid out: function parameters and
 * result, constructor arguments, alias targets. Generic signatures are
 * skipped since only their instantiations have layouts.
 */
function signatureTypes(info: SymbolInfo): Type[] {
    switch (info.sym.kind) {
        case SymbolKind.Function:
            if (info.sym.typeParams.length > 0) return [];
            return [...info.sym.params, info.sym.returnType];
        case SymbolKind.TypeConstructor:
            return info.sym.args.filter(isConcreteType);
        case SymbolKind.TypeAlias:
            return isConcreteType(info.sym.target) ? [info.sym.target] : [];
    }
}

function checkSignatures(
    program: TypedProgram,
    layouts: LayoutCache,
    collector: DiagnosticCollector,
): void {
    for (const info of program.symbols.symbols()) {
        const reported = new Set<string>();
        for (const type of signatureTypes(info)) {
            if (layouts.hasLayout(type)) continue;
            const typeName = typeToString(type);
            if (reported.has(typeName)) continue;
            reported.add(typeName);
            collector.add(
                formatUnsizedSignature(
                    info.name,
                    typeName,
                    spanToSourceSpan(info.span, program.file),
                ),
            );
        }
    }
}

function internalFailure(
    error: unknown,
    stage: string,
    fnName: string,
): CompileDiagnostic {
    if (error instanceof InternalCompilerError) {
        return {
            message: `${stage} of \`${fnName}\` failed: ${error.message}`,
            kind: "internal",
        };
    }
    throw error;
}

// ---------------------------------------------------------------------------
// Public API: lowering pipeline
// ---------------------------------------------------------------------------

/**
 * Lay out every type, check signatures, then lower each function to MIR
 * and Core. Stops after the signature check when the program has errors.
 */
export function lowerProgram(program: TypedProgram, options: LowerOptions = {}): LowerResult {
    const { validate = true, trace = false, computeFrames = true } = options;
    const traceLines: string[] = [];
    const log = (line: string) => {
        if (trace) traceLines.push(line);
    };

    const collector = new DiagnosticCollector();
    const extraTypes = collectProgramTypes(program);
    const { cache: layouts, diagnostics: layoutDiagnostics } = LayoutCache.compute(
        program.registry,
        extraTypes,
        { file: program.file },
    );
    for (const diag of layoutDiagnostics) collector.add(diag);
    log(`layout: ${layouts.size} layouts, ${layoutDiagnostics.length} diagnostics`);

    const layoutErrors = collector.getErrors().length;
    checkSignatures(program, layouts, collector);
    log(`signatures: ${collector.getErrors().length - layoutErrors} unsized`);

    if (collector.hasErrors()) {
        const errors = collector
            .getErrors()
            .map((diag) =>
                toCompileDiagnostic(diag, diag.code === "E0072" ? "layout" : "signature"),
            );
        return {
            ok: false,
            errors,
            diagnostics: collector.getDiagnostics(),
            layouts,
            trace: traceLines,
        };
    }

    const ctx = { registry: program.registry, symbols: program.symbols, layouts };
    const mir: MirFunction[] = [];
    const functions: CoreFunction[] = [];
    const errors: CompileDiagnostic[] = [];
    for (const fn of program.functions) {
        let mirFn: MirFunction;
        try {
            mirFn = buildMirFunction(fn, ctx);
        } catch (error) {
            errors.push(internalFailure(error, "MIR construction", fn.name));
            continue;
        }
        mir.push(mirFn);
        log(printMirFunction(mirFn, program.symbols));

        let coreFn: CoreFunction;
        try {
            coreFn = lowerCoreFunction(mirFn, program.symbols);
        } catch (error) {
            errors.push(internalFailure(error, "Core lowering", fn.name));
            continue;
        }
        functions.push(coreFn);
        log(printCoreFunction(coreFn));
    }

    if (validate) {
        for (const fn of functions) {
            const result = validateCoreFunction(fn);
            for (const err of result.errors) {
                errors.push({
                    message: `in function \`${fn.name}\`: ${err.message}`,
                    kind: "validation",
                });
            }
        }
    }

    const core: CoreProgram = {
        signatures: lowerCoreSymbols(program.symbols, layouts),
        functions,
    };

    let frames: Map<string, FrameLayout> | undefined;
    if (computeFrames) {
        frames = new Map();
        for (const fn of functions) {
            const frame = computeFrame(fn);
            frames.set(fn.linkName, frame);
            log(`frame ${fn.linkName}: size=${frame.size} align=${frame.align}`);
        }
    }

    return {
        ok: errors.length === 0,
        errors,
        diagnostics: collector.getDiagnostics(),
        layouts,
        mir,
        core,
        frames,
        trace: traceLines,
    };
}

/**
 * {@link lowerProgram} plus the printed Core program.
 */
export function compile(program: TypedProgram, options: LowerOptions = {}): CompileResult {
    const result = lowerProgram(program, options);
    if (!result.ok || !result.core) return result;
    return { ...result, text: printCoreProgram(result.core) };
}
