import type { CellKind, CellModel } from "../core/types";

/** Insert a cell at `index` (clamped; omit to append). Drops any earlier entry with the same id. */
export const insertCellAt = (cells: CellModel[], cell: CellModel, index?: number): number => {
  for (let i = cells.length - 1; i >= 0; i -= 1) {
    if (cells[i]?.id === cell.id) cells.splice(i, 1);
  }
  const len = cells.length;
  let target = index ?? len;
  if (!Number.isFinite(target)) target = len;
  if (target < 0) target = 0;
  if (target > len) target = len;
  cells.splice(target, 0, cell);
  return target;
};

/** Remove by id; returns the removed cell. */
export const removeCellById = (cells: CellModel[], id: string): CellModel | undefined => {
  const idx = cells.findIndex((c) => c.id === id);
  if (idx < 0) return undefined;
  const [removed] = cells.splice(idx, 1);
  return removed;
};

/** Swap a cell with its neighbour; undefined when it would leave the document. */
export const moveCellBy = (cells: CellModel[], id: string, direction: -1 | 1): number | undefined => {
  const from = cells.findIndex((c) => c.id === id);
  if (from < 0) return undefined;
  const to = from + direction;
  if (to < 0 || to >= cells.length) return undefined;
  const [cell] = cells.splice(from, 1);
  if (!cell) return undefined;
  cells.splice(to, 0, cell);
  return to;
};

/** Change kind in place. Outputs only survive on code cells. */
export const changeCellKind = (cell: CellModel, kind: CellKind): boolean => {
  if (cell.kind === kind) return false;
  cell.kind = kind;
  if (kind === "code") {
    cell.outputs = cell.outputs ?? [];
  } else {
    cell.outputs = [];
  }
  return true;
};
