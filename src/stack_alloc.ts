/**
 * Stack Allocation
 *
 * Assigns frame offsets to the stack slots of a lowered function.
 */

import { CExprKind, type CExpr, type CoreFunction, type CStackSlot } from "./core";
import { alignTo } from "./memory_layout";

// ============================================================================
// Frame Layout
// ============================================================================

interface FrameLayout {
    // Slot number to (negative) offset from the frame base
    slots: Map<number, number>;
    size: number;
    align: number;
}

function makeFrameLayout(
    slots: Map<number, number>,
    size: number,
    align: number,
): FrameLayout {
    return { slots, size, align };
}

// ============================================================================
// Stack Slot Allocator
// ============================================================================

class StackAllocator {
    currentOffset: number; // Current frame offset (negative, grows downward)
    maxAlign: number;
    slots: Map<number, number>;

    constructor() {
        this.currentOffset = 0;
        this.maxAlign = 1;
        this.slots = new Map();
    }

    allocSlot(slot: CStackSlot): number {
        this.maxAlign = Math.max(this.maxAlign, slot.align);
        const alignedOffset = alignDown(this.currentOffset - slot.size, slot.align);
        this.currentOffset = alignedOffset;
        this.slots.set(slot.slot, alignedOffset);
        return alignedOffset;
    }

    getFrameSize(): number {
        return Math.abs(this.currentOffset);
    }

    getFrameLayout(): FrameLayout {
        const alignedSize = alignTo(this.getFrameSize(), this.maxAlign);
        return makeFrameLayout(new Map(this.slots), alignedSize, this.maxAlign);
    }
}

/**
 * Align offset down to alignment boundary (for downward-growing stack)
 */
function alignDown(offset: number, alignment: number): number {
    if (alignment <= 1) return offset;
    const remainder = offset % alignment;
    if (remainder === 0) return offset;
    return offset - remainder - alignment;
}

// ============================================================================
// Function Frame
// ============================================================================

function collectStackSlots(expr: CExpr, out: CStackSlot[]): void {
    switch (expr.kind) {
        case CExprKind.StackSlot:
            out.push(expr);
            return;
        case CExprKind.Unit:
        case CExprKind.Const:
        case CExprKind.Local:
        case CExprKind.Global:
            return;
        case CExprKind.Let:
            collectStackSlots(expr.init, out);
            collectStackSlots(expr.body, out);
            return;
        case CExprKind.Seq:
            collectStackSlots(expr.first, out);
            collectStackSlots(expr.second, out);
            return;
        case CExprKind.Set:
            collectStackSlots(expr.value, out);
            return;
        case CExprKind.PtrOffset:
            collectStackSlots(expr.ptr, out);
            return;
        case CExprKind.PtrIndex:
            collectStackSlots(expr.ptr, out);
            collectStackSlots(expr.index, out);
            return;
        case CExprKind.Load:
            collectStackSlots(expr.ptr, out);
            return;
        case CExprKind.Store:
            collectStackSlots(expr.ptr, out);
            collectStackSlots(expr.value, out);
            return;
        case CExprKind.Copy:
            collectStackSlots(expr.dst, out);
            collectStackSlots(expr.src, out);
            return;
        case CExprKind.Extract:
            collectStackSlots(expr.value, out);
            return;
        case CExprKind.Insert:
            collectStackSlots(expr.value, out);
            collectStackSlots(expr.field, out);
            return;
        case CExprKind.Call:
            collectStackSlots(expr.callee, out);
            for (const arg of expr.args) collectStackSlots(arg, out);
            return;
        case CExprKind.Builtin:
            for (const arg of expr.args) collectStackSlots(arg, out);
            return;
        case CExprKind.Return:
            if (expr.value) collectStackSlots(expr.value, out);
            return;
        case CExprKind.If:
            collectStackSlots(expr.cond, out);
            collectStackSlots(expr.then, out);
            collectStackSlots(expr.else, out);
            return;
        case CExprKind.While:
            collectStackSlots(expr.cond, out);
            collectStackSlots(expr.body, out);
            return;
    }
}

/**
 * Sort slots by alignment (descending) for better packing; slots with
 * equal alignment keep their order of appearance.
 */
function sortSlotsByAlignment(slots: CStackSlot[]): CStackSlot[] {
    return [...slots].sort((a, b) => b.align - a.align);
}

/**
 * Compute frame layout for a function. Every slot lives for the whole
 * call, so slots never share bytes.
 */
function computeFrame(fn: CoreFunction): FrameLayout {
    const allocator = new StackAllocator();
    const slots: CStackSlot[] = [];
    collectStackSlots(fn.body, slots);
    for (const slot of sortSlotsByAlignment(slots)) {
        allocator.allocSlot(slot);
    }
    return allocator.getFrameLayout();
}

export {
    makeFrameLayout,
    StackAllocator,
    alignDown,
    collectStackSlots,
    sortSlotsByAlignment,
    computeFrame,
};

export type { FrameLayout };
