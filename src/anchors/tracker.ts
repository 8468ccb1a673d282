import type { CellModel } from "@/notebook/core/types";
import { CELL_FOOTER_LINES, CELL_HEADER_LINES } from "@/notebook/core/keys";
import { totalCellLines } from "@/notebook/access/cells";

/**
 * left: stays before text inserted exactly at its line
 * right: moves down with text inserted at its line
 */
export type Gravity = "left" | "right";

export interface Anchor {
  line: number;
  gravity: Gravity;
  valid: boolean;
}

/** Inclusive line range in human-view coordinates. */
export interface LineRange {
  start: number;
  end: number;
}

export interface AnchorSource {
  cells(): readonly Pick<CellModel, "id" | "source">[];
}

/**
 * Cell start anchors in a sorted index plus free anchors (cursors, marks).
 * Anchors of removed cells are invalidated, never forgotten, so a lookup
 * with a stale id answers `undefined` instead of old coordinates.
 */
export class AnchorTracker {
  private readonly anchors = new Map<string, Anchor>();
  /** Valid cell ids ordered by start line */
  private order: string[] = [];
  private lines = 0;

  get lineCount(): number {
    return this.lines;
  }

  /** Cell ids in document order (valid anchors only). */
  cellIds(): string[] {
    return [...this.order];
  }

  placeAnchors(doc: AnchorSource): void {
    const cells = doc.cells();
    const live = new Set(cells.map((c) => c.id));
    for (const id of this.order) {
      if (!live.has(id)) this.invalidate(id);
    }

    let line = 0;
    const order: string[] = [];
    for (const cell of cells) {
      this.anchors.set(cell.id, { line, gravity: "left", valid: true });
      order.push(cell.id);
      line += totalCellLines(cell);
    }
    this.order = order;
    this.lines = line;
  }

  /** Free anchor, tracked across line edits like cell anchors. */
  track(key: string, line: number, gravity: Gravity = "right"): void {
    if (this.order.includes(key)) throw new Error(`Anchor key "${key}" is owned by a cell`);
    this.anchors.set(key, { line, gravity, valid: true });
  }

  untrack(key: string): void {
    if (!this.order.includes(key)) this.anchors.delete(key);
  }

  lineOf(key: string): number | undefined {
    const anchor = this.anchors.get(key);
    return anchor?.valid ? anchor.line : undefined;
  }

  isValid(key: string): boolean {
    return this.anchors.get(key)?.valid === true;
  }

  invalidate(key: string): void {
    const anchor = this.anchors.get(key);
    if (!anchor) return;
    anchor.valid = false;
    this.order = this.order.filter((id) => id !== key);
  }

  /** Nearest cell start at or before `line`. */
  cellAt(line: number): string | undefined {
    if (line < 0 || line >= this.lines) return undefined;
    let lo = 0;
    let hi = this.order.length - 1;
    let found = -1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      const start = this.startOf(this.order[mid]!);
      if (start <= line) {
        found = mid;
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }
    return found < 0 ? undefined : this.order[found];
  }

  rangeOf(cellId: string): LineRange | undefined {
    const anchor = this.anchors.get(cellId);
    if (!anchor?.valid) return undefined;
    const idx = this.order.indexOf(cellId);
    if (idx < 0) return undefined;
    const next = this.order[idx + 1];
    const end = next === undefined ? this.lines - 1 : this.startOf(next) - 1;
    return { start: anchor.line, end };
  }

  contentRangeOf(cellId: string): LineRange | undefined {
    const range = this.rangeOf(cellId);
    if (!range) return undefined;
    return { start: range.start + CELL_HEADER_LINES, end: range.end - CELL_FOOTER_LINES };
  }

  /**
   * Whole-line replacement of [start, oldEnd) by `newCount` lines.
   * Anchors inside the replaced region that fall past its new end are invalidated.
   */
  applyLineEdit(start: number, oldEnd: number, newCount: number): void {
    const removed = oldEnd - start;
    const delta = newCount - removed;
    const insertion = removed === 0;

    for (const [key, anchor] of this.anchors) {
      if (!anchor.valid || anchor.line < start) continue;
      if (insertion) {
        if (anchor.line > start || anchor.gravity === "right") anchor.line += delta;
      } else if (anchor.line >= oldEnd) {
        anchor.line += delta;
      } else if (anchor.line >= start + newCount) {
        this.invalidate(key);
      }
    }
    this.lines = Math.max(0, this.lines + delta);
  }

  private startOf(cellId: string): number {
    return this.anchors.get(cellId)?.line ?? -1;
  }
}
