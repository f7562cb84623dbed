import { describe, test, expect } from "vitest";
import {
    DiagnosticCollector,
    Level,
    SourceContext,
    error,
    formatUnboundedRecursiveType,
    formatUnsizedSignature,
    makeSourceLocation,
    makeSourceSpan,
    note,
    renderDiagnostic,
    renderDiagnostics,
    spanToSourceSpan,
    withRelated,
} from "../src/diagnostics";
import { spanAt } from "./helpers";

const LIST_SPAN = spanToSourceSpan(spanAt(3, 8, 4), "main.x");

describe("spanToSourceSpan", () => {
    test("covers the declaration width on its line", () => {
        expect(LIST_SPAN).toEqual({
            start: { line: 3, column: 8, file: "main.x" },
            end: { line: 3, column: 12, file: "main.x" },
        });
    });
});

describe("renderDiagnostic", () => {
    test("plain rendering without source", () => {
        const diag = formatUnboundedRecursiveType("List", LIST_SPAN, ["List"]);
        expect(renderDiagnostic(diag, null, { color: false })).toBe(
            [
                "error[E0072]: recursive type `List` has infinite size",
                "  --> main.x:3:8",
                "  hint: insert a pointer to break the cycle",
            ].join("\n"),
        );
    });

    test("source snippets underline the span", () => {
        const source = "type A = i32;\n\nstruct List { head: i32, tail: List }";
        const ctx = new SourceContext(source, "main.x");
        const span = makeSourceSpan(makeSourceLocation(3, 8, "main.x"), makeSourceLocation(3, 12, "main.x"));
        const diag = formatUnsizedSignature("f", "List", span);
        expect(renderDiagnostic(diag, ctx, { color: false })).toBe(
            [
                "error[E0277]: the size of `List` used by `f` cannot be known",
                "  --> main.x:3:8",
                "",
                "3 | struct List { head: i32, tail: List }",
                "  |        ^^^^",
            ].join("\n"),
        );
    });

    test("related notes follow the hint", () => {
        const a = spanToSourceSpan(spanAt(1, 8), "m.x");
        const b = spanToSourceSpan(spanAt(2, 8), "m.x");
        const diag = withRelated(
            formatUnboundedRecursiveType("A", a, ["A", "B"]),
            b,
            "`B` is part of the cycle",
        );
        expect(renderDiagnostics([diag], null, { color: false })).toBe(
            [
                "error[E0072]: recursive type `A` has infinite size",
                "  --> m.x:1:8",
                "  hint: insert a pointer somewhere along the cycle A -> B -> A",
                "  note: `B` is part of the cycle",
                "    --> m.x:2:8",
            ].join("\n"),
        );
    });
});

describe("DiagnosticCollector", () => {
    test("notes do not count as errors", () => {
        const collector = new DiagnosticCollector();
        collector.add(note("just saying"));
        expect(collector.hasErrors()).toBe(false);
        collector.add(error("broken"));
        expect(collector.hasErrors()).toBe(true);
        expect(collector.getErrors().map((d) => d.message)).toEqual(["broken"]);
        expect(collector.getDiagnostics().map((d) => d.level)).toEqual([Level.Note, Level.Error]);
    });
});
