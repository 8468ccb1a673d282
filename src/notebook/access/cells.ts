import { ulid } from "ulid";
import { CELL_FOOTER_LINES, CELL_HEADER_LINES } from "../core/keys";
import { type CellInit, type CellModel, isCellKind } from "../core/types";

export const splitSource = (source: string): string[] => source.split("\n");

export const joinSource = (lines: readonly string[]): string => lines.join("\n");

/** Content lines a cell occupies in the human view (never 0). */
export const contentLineCount = (cell: Pick<CellModel, "source">): number =>
  splitSource(cell.source).length;

/** Header + content + footer */
export const totalCellLines = (cell: Pick<CellModel, "source">): number =>
  CELL_HEADER_LINES + contentLineCount(cell) + CELL_FOOTER_LINES;

export const createCell = (init: CellInit, generateId: () => string = ulid): CellModel => {
  if (!isCellKind(init?.kind)) throw new Error(`Unknown cell kind: ${String(init?.kind)}`);
  const id = init.id ?? generateId();
  if (typeof id !== "string" || id.length === 0)
    throw new Error("Cell id must be a non-empty string");
  return {
    id,
    kind: init.kind,
    source: init.source ?? "",
    outputs: init.outputs ?? [],
    metadata: { ...(init.metadata ?? {}) },
  };
};

/** Copy with the same id; outputs/metadata are passed through by reference. */
export const cloneCell = (cell: CellModel): CellModel => ({ ...cell });
