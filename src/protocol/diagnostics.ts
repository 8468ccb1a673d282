import type { EditOverlay } from "@/views/overlay";
import type { Diagnostic } from "./types";

export interface CellLookup {
  cellAt(line: number): string | undefined;
  isCodeCell(cellId: string): boolean;
}

/** Keep diagnostics whose first line sits in a code cell. */
export const filterCodeDiagnostics = (diagnostics: readonly Diagnostic[], cells: CellLookup): Diagnostic[] =>
  diagnostics.filter((d) => {
    const id = cells.cellAt(d.range.start.line);
    return id !== undefined && cells.isCodeCell(id);
  });

/** Diagnostics inside the overlay region, in overlay-local lines. */
export const toOverlayDiagnostics = (
  diagnostics: readonly Diagnostic[],
  overlay: Pick<EditOverlay, "regionStart" | "regionEnd">
): Diagnostic[] =>
  diagnostics
    .filter((d) => d.range.start.line >= overlay.regionStart && d.range.start.line <= overlay.regionEnd)
    .map((d) => ({
      ...d,
      range: {
        start: { line: d.range.start.line - overlay.regionStart, character: d.range.start.character },
        end: { line: d.range.end.line - overlay.regionStart, character: d.range.end.character },
      },
    }));
