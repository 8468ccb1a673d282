import * as Y from "yjs";
import { HUMAN_TEXT_KEY } from "@/notebook/core/keys";

const lineOffset = (lines: readonly string[], line: number): number => {
  let offset = 0;
  for (let i = 0; i < line; i += 1) offset += (lines[i]?.length ?? 0) + 1;
  return offset;
};

/** Smallest edit turning `prev` into `next`: common prefix and suffix are kept. */
export const diffText = (prev: string, next: string): { index: number; remove: number; insert: string } => {
  const max = Math.min(prev.length, next.length);
  let head = 0;
  while (head < max && prev.charCodeAt(head) === next.charCodeAt(head)) head += 1;
  let tail = 0;
  while (
    tail < max - head &&
    prev.charCodeAt(prev.length - 1 - tail) === next.charCodeAt(next.length - 1 - tail)
  ) {
    tail += 1;
  }
  return {
    index: head,
    remove: prev.length - head - tail,
    insert: next.slice(head, next.length - tail),
  };
};

/**
 * The authoritative, user-facing text: every cell rendered between its
 * markers, held in a Y.Text so undo/redo comes from Y.UndoManager.
 */
export class HumanView {
  readonly doc: Y.Doc;
  readonly text: Y.Text;

  constructor(doc?: Y.Doc) {
    this.doc = doc ?? new Y.Doc();
    this.text = this.doc.getText(HUMAN_TEXT_KEY);
  }

  getLines(): string[] {
    return this.text.toString().split("\n");
  }

  get lineCount(): number {
    return this.getLines().length;
  }

  /**
   * Replace lines [start, end) with `lines` inside one transaction.
   * Only the changed characters are touched so collaborators and the
   * undo stack see the smallest possible change.
   */
  replaceLines(start: number, end: number, lines: readonly string[], origin: unknown): void {
    const current = this.getLines();
    const n = current.length;
    if (start < 0 || end < start || end > n) {
      throw new Error(`Invalid line range [${start}, ${end}) for ${n} lines`);
    }
    if (start === end && lines.length === 0) return;

    this.doc.transact(() => {
      if (start === end) {
        if (start < n) {
          this.text.insert(lineOffset(current, start), `${lines.join("\n")}\n`);
        } else {
          this.text.insert(this.text.length, `\n${lines.join("\n")}`);
        }
        return;
      }

      if (lines.length === 0) {
        if (end < n) {
          const from = lineOffset(current, start);
          this.text.delete(from, lineOffset(current, end) - from);
        } else if (start > 0) {
          const from = lineOffset(current, start) - 1;
          this.text.delete(from, this.text.length - from);
        } else {
          this.text.delete(0, this.text.length);
        }
        return;
      }

      const base = lineOffset(current, start);
      const { index, remove, insert } = diffText(current.slice(start, end).join("\n"), lines.join("\n"));
      if (remove > 0) this.text.delete(base + index, remove);
      if (insert.length > 0) this.text.insert(base + index, insert);
    }, origin);
  }

  setAll(lines: readonly string[], origin: unknown): void {
    this.replaceLines(0, this.lineCount, lines.length > 0 ? lines : [""], origin);
  }
}
