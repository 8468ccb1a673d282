import { describe, it, expect } from "vitest";
import { applyTextEdits, shiftEdit, sortEditsBottomUp, trimTrailingBlankLines } from "@/protocol/edits";
import type { TextEdit } from "@/protocol/types";

const edit = (sl: number, sc: number, el: number, ec: number, newText: string): TextEdit => ({
  range: { start: { line: sl, character: sc }, end: { line: el, character: ec } },
  newText,
});

describe("text edits", () => {
  it("orders edits bottom-up", () => {
    const early = edit(5, 0, 6, 2, "X");
    const late = edit(20, 0, 21, 2, "Y\nZ");
    expect(sortEditsBottomUp([early, late])).toEqual([late, early]);
    expect(sortEditsBottomUp([edit(3, 1, 3, 1, "a"), edit(3, 7, 3, 7, "b")]).map((e) => e.newText)).toEqual(["b", "a"]);
  });

  it("applying out of order gives the same text as applying by hand from the bottom", () => {
    const lines = Array.from({ length: 25 }, (_, i) => `l${i}`);
    const result = applyTextEdits(lines, [edit(5, 0, 6, 2, "X"), edit(20, 0, 21, 2, "Y\nZ")]);

    const manual = [...lines];
    manual.splice(20, 2, "Y", "Z1");
    manual.splice(5, 2, "X");
    expect(result).toEqual(manual);
    expect(result).toHaveLength(24);
  });

  it("splices inside a line and appends past the end", () => {
    expect(applyTextEdits(["hello world"], [edit(0, 5, 0, 5, ",")])).toEqual(["hello, world"]);
    expect(applyTextEdits(["a"], [edit(1, 0, 1, 0, "b")])).toEqual(["a", "b"]);
    expect(applyTextEdits(["a"], [edit(4, 0, 4, 0, "b")])).toEqual(["a"]);
  });

  it("shifts edits between coordinate systems", () => {
    expect(shiftEdit(edit(8, 1, 9, 2, "q"), -8)).toEqual(edit(0, 1, 1, 2, "q"));
  });

  it("trims trailing blank lines down to the allowed count, never below one line", () => {
    expect(trimTrailingBlankLines(["a", "", "  ", ""], 1)).toEqual(["a", ""]);
    expect(trimTrailingBlankLines(["a", "", "  ", ""], 0)).toEqual(["a"]);
    expect(trimTrailingBlankLines(["", ""], 0)).toEqual([""]);
    expect(trimTrailingBlankLines(["a", "b"], 0)).toEqual(["a", "b"]);
  });
});
