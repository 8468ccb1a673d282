import {
  CELL_END_MARKER,
  CELL_START_PATTERN,
  CELL_START_PREFIX,
  CELL_START_SUFFIX,
} from "../core/keys";
import type { CellKind, CellModel } from "../core/types";
import { joinSource, splitSource, totalCellLines } from "./cells";

export const startMarker = (kind: CellKind): string =>
  `${CELL_START_PREFIX}${kind}${CELL_START_SUFFIX}`;

export const parseStartMarker = (line: string): CellKind | undefined => {
  const m = CELL_START_PATTERN.exec(line);
  if (!m) return undefined;
  const kind = m[1];
  return kind === "code" || kind === "markdown" || kind === "raw" ? kind : undefined;
};

export const isMarkerLine = (line: string): boolean =>
  line === CELL_END_MARKER || parseStartMarker(line) !== undefined;

/** Render cells into the human-view line form (header, content, footer per cell). */
export const cellsToLines = (cells: readonly Pick<CellModel, "kind" | "source">[]): string[] => {
  const lines: string[] = [];
  for (const cell of cells) {
    lines.push(startMarker(cell.kind));
    for (const line of splitSource(cell.source)) lines.push(line);
    lines.push(CELL_END_MARKER);
  }
  return lines;
};

export interface ParsedCell {
  kind: CellKind;
  source: string;
}

/**
 * Parse human-view lines back into cells.
 * Lines outside a marker pair are ignored; a header inside an open cell
 * closes it; an unterminated cell runs to the end of the document.
 */
export const linesToCells = (lines: readonly string[]): ParsedCell[] => {
  const cells: ParsedCell[] = [];
  let current: { kind: CellKind; content: string[] } | null = null;

  const close = () => {
    if (!current) return;
    cells.push({ kind: current.kind, source: joinSource(current.content) });
    current = null;
  };

  for (const line of lines) {
    const kind = parseStartMarker(line);
    if (kind) {
      close();
      current = { kind, content: [] };
      continue;
    }
    if (line === CELL_END_MARKER) {
      close();
      continue;
    }
    current?.content.push(line);
  }
  close();
  return cells;
};

/** Start line of every cell, in order, for a freshly rendered layout. */
export const cellStartLines = (cells: readonly Pick<CellModel, "source">[]): number[] => {
  const starts: number[] = [];
  let line = 0;
  for (const cell of cells) {
    starts.push(line);
    line += totalCellLines(cell);
  }
  return starts;
};

export const totalLines = (cells: readonly Pick<CellModel, "source">[]): number =>
  cells.reduce((acc, c) => acc + totalCellLines(c), 0);
