// ============================================================================
// Diagnostics and Error Reporting
// ============================================================================

import type { Span } from "./types";

// ============================================================================
// Source Location
// ============================================================================

/**
 * 1-based position in a source file
 */
type SourceLocation = {
    file?: string;
    line: number;
    column: number;
};

// Half-open: `end` is the column just past the last character
type SourceSpan = {
    start: SourceLocation;
    end: SourceLocation;
};

function makeSourceLocation(line: number, column: number, file?: string): SourceLocation {
    return { line, column, file };
}

function makeSourceSpan(start: SourceLocation, end: SourceLocation): SourceSpan {
    return { start, end };
}

/**
 * Declaration spans only carry their first line; the width is taken from
 * the byte range and is at least one column.
 */
function spanToSourceSpan(span: Span, file?: string): SourceSpan {
    const width = Math.max(1, span.end - span.start);
    return makeSourceSpan(
        makeSourceLocation(span.line, span.column, file),
        makeSourceLocation(span.line, span.column + width, file),
    );
}

// ============================================================================
// Diagnostic Structure
// ============================================================================

enum Level {
    Error,
    Warning,
    Note,
    Help,
}

type RelatedInfo = {
    span: SourceSpan;
    message: string;
};

type Diagnostic = {
    level: Level;
    message: string;
    span?: SourceSpan;
    code?: string;
    related?: RelatedInfo[];
    hint?: string;
};

function makeDiagnostic(level: Level, message: string, span?: SourceSpan): Diagnostic {
    return { level, message, span };
}

function error(message: string, span?: SourceSpan): Diagnostic {
    return makeDiagnostic(Level.Error, message, span);
}

function note(message: string, span?: SourceSpan): Diagnostic {
    return makeDiagnostic(Level.Note, message, span);
}

// Diagnostics are values; the `with*` helpers return updated copies

function withRelated(diag: Diagnostic, span: SourceSpan, message: string): Diagnostic {
    return { ...diag, related: [...(diag.related ?? []), { span, message }] };
}

function withCode(diag: Diagnostic, code: string): Diagnostic {
    return { ...diag, code };
}

function withHint(diag: Diagnostic, hint: string): Diagnostic {
    return { ...diag, hint };
}

// ============================================================================
// Error Collection
// ============================================================================

/**
 * Ordered list of the diagnostics a pass produced
 */
class DiagnosticCollector {
    #diagnostics: Diagnostic[] = [];
    #errorCount = 0;

    add(diag: Diagnostic): void {
        this.#diagnostics.push(diag);
        if (diag.level === Level.Error) this.#errorCount++;
    }

    hasErrors(): boolean {
        return this.#errorCount > 0;
    }

    getDiagnostics(): Diagnostic[] {
        return [...this.#diagnostics];
    }

    getErrors(): Diagnostic[] {
        return this.#diagnostics.filter((d) => d.level === Level.Error);
    }
}

// ============================================================================
// Internal Consistency Faults
// ============================================================================

/**
 * Raised when an upstream guarantee does not hold (unknown TVar or symbol,
 * a type without a cached layout, an unexpected tree shape). These are
 * compiler bugs, never problems in the user's program.
 */
class InternalCompilerError extends Error {
    override name = "InternalCompilerError";
}

function internalError(message: string): never {
    throw new InternalCompilerError(message);
}

// ============================================================================
// Source Context
// ============================================================================

/**
 * Source text of one file, split into lines for snippets
 */
class SourceContext {
    readonly file?: string;
    readonly #lines: readonly string[];

    constructor(source: string, file?: string) {
        this.file = file;
        this.#lines = source.split("\n");
    }

    /**
     * Text of a 1-based line, or null past either end
     */
    getLine(lineNum: number): string | null {
        return this.#lines[lineNum - 1] ?? null;
    }

    get gutterWidth(): number {
        return String(this.#lines.length).length;
    }
}

// ============================================================================
// Diagnostic Renderer
// ============================================================================

type Palette = {
    level: Record<Level, string>;
    reset: string;
    bold: string;
    dim: string;
    caret: string;
};

const LEVEL_NAMES = {
    [Level.Error]: "error",
    [Level.Warning]: "warning",
    [Level.Note]: "note",
    [Level.Help]: "help",
} as const satisfies Record<Level, string>;

const ANSI: Palette = {
    level: {
        [Level.Error]: "\x1b[31m",
        [Level.Warning]: "\x1b[33m",
        [Level.Note]: "\x1b[36m",
        [Level.Help]: "\x1b[32m",
    },
    reset: "\x1b[0m",
    bold: "\x1b[1m",
    dim: "\x1b[2m",
    caret: "\x1b[34m",
};

const PLAIN: Palette = {
    level: { [Level.Error]: "", [Level.Warning]: "", [Level.Note]: "", [Level.Help]: "" },
    reset: "",
    bold: "",
    dim: "",
    caret: "",
};

type RenderOptions = { color?: boolean };

function formatLocation(loc: SourceLocation): string {
    return loc.file ? `${loc.file}:${loc.line}:${loc.column}` : `${loc.line}:${loc.column}`;
}

/**
 * Numbered source lines with carets under the span
 */
function renderSnippet(span: SourceSpan, ctx: SourceContext, palette: Palette): string[] {
    const { dim, reset, bold, caret } = palette;
    const width = ctx.gutterWidth;
    const out: string[] = [];
    for (let lineNum = span.start.line; lineNum <= span.end.line; lineNum++) {
        const text = ctx.getLine(lineNum);
        if (text === null) continue;
        const from = lineNum === span.start.line ? span.start.column - 1 : 0;
        const to = lineNum === span.end.line ? span.end.column - 1 : text.length;
        const carets = "^".repeat(Math.max(1, to - from));
        out.push(`${dim}${String(lineNum).padStart(width)} |${reset} ${text}`);
        out.push(`${dim}${" ".repeat(width)} |${reset} ${" ".repeat(from)}${caret}${bold}${carets}${reset}`);
    }
    return out;
}

/**
 * Render a diagnostic to text. The source snippet is only shown when a
 * source context is supplied; colour is on unless turned off.
 */
function renderDiagnostic(
    diag: Diagnostic,
    ctx: SourceContext | null,
    options: RenderOptions = {},
): string {
    const palette = options.color === false ? PLAIN : ANSI;
    const { reset, bold } = palette;
    const code = diag.code ? `${bold}[${diag.code}]${reset}` : "";
    const lines = [
        `${palette.level[diag.level]}${bold}${LEVEL_NAMES[diag.level]}${reset}${code}: ${diag.message}`,
    ];

    if (diag.span) {
        lines.push(`  --> ${formatLocation(diag.span.start)}`);
        const snippet = ctx ? renderSnippet(diag.span, ctx, palette) : [];
        if (snippet.length > 0) lines.push("", ...snippet);
    }
    if (diag.hint) {
        lines.push(`  ${palette.level[Level.Help]}hint${reset}: ${diag.hint}`);
    }
    for (const rel of diag.related ?? []) {
        lines.push(`  ${palette.level[Level.Note]}note${reset}: ${rel.message}`);
        lines.push(`    --> ${formatLocation(rel.span.start)}`);
    }
    return lines.join("\n");
}

function renderDiagnostics(
    diagnostics: readonly Diagnostic[],
    ctx: SourceContext | null,
    options: RenderOptions = {},
): string {
    return diagnostics.map((d) => renderDiagnostic(d, ctx, options)).join("\n\n");
}

// ============================================================================
// Layout Error Formatting
// ============================================================================

/**
 * A type that embeds itself without indirection needs infinite storage.
 * `cycle` lists the members in embedding order, starting at `typeName`.
 */
function formatUnboundedRecursiveType(
    typeName: string,
    span: SourceSpan,
    cycle: string[],
): Diagnostic {
    const hint =
        cycle.length > 1
            ? `insert a pointer somewhere along the cycle ${cycle.join(" -> ")} -> ${typeName}`
            : "insert a pointer to break the cycle";
    return withHint(
        withCode(error(`recursive type \`${typeName}\` has infinite size`, span), "E0072"),
        hint,
    );
}

function formatUnsizedSignature(declName: string, typeName: string, span: SourceSpan): Diagnostic {
    return withCode(
        error(`the size of \`${typeName}\` used by \`${declName}\` cannot be known`, span),
        "E0277",
    );
}

export {
    // Source Location
    makeSourceLocation,
    makeSourceSpan,
    spanToSourceSpan,
    // Diagnostic Structure
    Level,
    makeDiagnostic,
    error,
    note,
    withRelated,
    withCode,
    withHint,
    // Diagnostic Collector
    DiagnosticCollector,
    // Internal faults
    InternalCompilerError,
    internalError,
    // Source Context
    SourceContext,
    // Diagnostic Renderer
    renderDiagnostic,
    renderDiagnostics,
    // Layout Error Formatting
    formatUnboundedRecursiveType,
    formatUnsizedSignature,
};

export type { SourceLocation, SourceSpan, Diagnostic, RelatedInfo, RenderOptions };
