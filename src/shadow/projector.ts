import type { CellKind, CellModel } from "@/notebook/core/types";
import { CELL_FOOTER_LINES, CELL_HEADER_LINES } from "@/notebook/core/keys";
import { splitSource } from "@/notebook/access/cells";

export interface ProjectionSource {
  cells(): readonly Pick<CellModel, "id" | "kind" | "source">[];
  getCell(id: string): Pick<CellModel, "kind"> | undefined;
}

const blank = (n: number): string[] => Array.from({ length: n }, () => "");

/** Content lines as the backend sees them: code verbatim, everything else blank. */
export const projectContent = (kind: CellKind, lines: readonly string[]): string[] =>
  kind === "code" ? [...lines] : blank(lines.length);

/**
 * Backend-facing view of the whole document. Same line count as the human
 * view; marker lines become blank placeholders.
 */
export const project = (doc: ProjectionSource): string[] => {
  const out: string[] = [];
  for (const cell of doc.cells()) {
    out.push(...blank(CELL_HEADER_LINES));
    out.push(...projectContent(cell.kind, splitSource(cell.source)));
    out.push(...blank(CELL_FOOTER_LINES));
  }
  return out;
};

/** Replacement for one cell's content range; undefined when the cell is gone. */
export const projectRegion = (
  doc: ProjectionSource,
  cellId: string,
  newSourceLines: readonly string[]
): string[] | undefined => {
  const cell = doc.getCell(cellId);
  if (!cell) return undefined;
  return projectContent(cell.kind, newSourceLines);
};
