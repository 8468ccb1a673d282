import type { Range, TextEdit } from "./types";

/** Later positions first, so applying one edit never moves the next one. */
export const compareBottomUp = (a: { range: Range }, b: { range: Range }): number =>
  b.range.start.line - a.range.start.line || b.range.start.character - a.range.start.character;

export const sortEditsBottomUp = <T extends { range: Range }>(edits: readonly T[]): T[] =>
  [...edits].sort(compareBottomUp);

export const shiftEdit = (edit: TextEdit, delta: number): TextEdit => ({
  newText: edit.newText,
  range: {
    start: { line: edit.range.start.line + delta, character: edit.range.start.character },
    end: { line: edit.range.end.line + delta, character: edit.range.end.character },
  },
});

/**
 * Apply text edits to a copy of `lines`. Edits are applied bottom-up;
 * edits starting outside the text are ignored.
 */
export const applyTextEdits = (lines: readonly string[], edits: readonly TextEdit[]): string[] => {
  const out = [...lines];
  for (const edit of sortEditsBottomUp(edits)) {
    const { start, end } = edit.range;
    if (start.line < 0 || start.line > out.length) continue;

    const prefix = out[start.line]?.slice(0, start.character) ?? "";
    const suffix = out[end.line]?.slice(end.character) ?? "";
    const replacement = edit.newText.split("\n");
    replacement[0] = prefix + (replacement[0] ?? "");
    replacement[replacement.length - 1] = (replacement[replacement.length - 1] ?? "") + suffix;

    const lastExisting = Math.min(end.line, out.length - 1);
    out.splice(start.line, Math.max(0, lastExisting - start.line + 1), ...replacement);
  }
  return out;
};

/** Drop whitespace-only trailing lines beyond `keep`; never below one line. */
export const trimTrailingBlankLines = (lines: readonly string[], keep: number): string[] => {
  const out = [...lines];
  let trailing = 0;
  for (let i = out.length - 1; i >= 0 && /^\s*$/.test(out[i] ?? ""); i -= 1) trailing += 1;
  let remove = Math.max(0, trailing - keep);
  while (remove > 0 && out.length > 1) {
    out.pop();
    remove -= 1;
  }
  return out;
};
