import { ulid } from "ulid";
import type { CellModel } from "../core/types";
import { createCell } from "../access/cells";
import { type ParsedCell, linesToCells } from "../access/layout";

export interface ReconcileOptions {
  /** Second pass: reuse the id of the old cell at the same index when kinds agree */
  matchByPosition?: boolean;
  /** Minimum cell count after reconcile; missing cells are empty code cells */
  minCells?: number;
  generateId?: () => string;
  /** Recently removed cells; an exact content match revives their id */
  retired?: readonly CellModel[];
}

export interface ReconcileReport {
  changed: boolean;
  previousCount: number;
  finalCount: number;
  /** ids kept because kind+source matched exactly */
  matchedByContent: string[];
  /** ids kept by index/kind after content changed */
  matchedByPosition: string[];
  /** retired ids brought back by an exact content match */
  revived: string[];
  /** ids minted for cells with no counterpart */
  minted: string[];
  /** ids of old cells with no counterpart in the new content */
  dropped: string[];
}

export interface ReconcileResult {
  cells: CellModel[];
  report: ReconcileReport;
}

/**
 * Normalize reconcile options with defaults.
 */
export const resolveReconcileOptions = (
  opts?: ReconcileOptions
): Required<ReconcileOptions> => ({
  matchByPosition: opts?.matchByPosition ?? true,
  minCells: opts?.minCells ?? 1,
  generateId: opts?.generateId ?? (() => ulid()),
  retired: opts?.retired ?? [],
});

const contentKey = (c: Pick<CellModel, "kind" | "source">) => `${c.kind}:${c.source}`;

/**
 * Bucket old cells by kind+source so duplicates are consumed first-in, first-out.
 */
export const buildContentIndex = (cells: readonly CellModel[]): Map<string, CellModel[]> => {
  const index = new Map<string, CellModel[]>();
  for (const cell of cells) {
    const key = contentKey(cell);
    const bucket = index.get(key);
    if (bucket) bucket.push(cell);
    else index.set(key, [cell]);
  }
  return index;
};

const adopt = (parsed: ParsedCell, old: CellModel): CellModel => ({
  id: old.id,
  kind: parsed.kind,
  source: parsed.source,
  metadata: old.metadata,
  outputs: parsed.kind === old.kind ? old.outputs : [],
});

/**
 * Re-derive the cell list from parsed cells, keeping ids stable:
 * 1) exact kind+source match, 2) same index and kind, 3) mint.
 * Never hands the same old id to two new cells.
 */
export const reconcileParsedCells = (
  previous: readonly CellModel[],
  parsed: readonly ParsedCell[],
  opts?: ReconcileOptions
): ReconcileResult => {
  const options = resolveReconcileOptions(opts);
  const live = new Set(previous.map((c) => c.id));
  // live cells first so a retired twin never shadows them
  const byContent = buildContentIndex([
    ...previous,
    ...options.retired.filter((c) => !live.has(c.id)),
  ]);
  const used = new Set<string>();
  const next: Array<CellModel | undefined> = parsed.map(() => undefined);

  const matchedByContent: string[] = [];
  const matchedByPosition: string[] = [];
  const revived: string[] = [];
  const minted: string[] = [];

  // pass 1: exact content
  parsed.forEach((p, i) => {
    const bucket = byContent.get(contentKey(p));
    const old = bucket?.shift();
    if (!old) return;
    used.add(old.id);
    next[i] = adopt(p, old);
    if (live.has(old.id)) matchedByContent.push(old.id);
    else revived.push(old.id);
  });

  // pass 2: position + kind
  if (options.matchByPosition) {
    parsed.forEach((p, i) => {
      if (next[i]) return;
      const old = previous[i];
      if (!old || used.has(old.id) || old.kind !== p.kind) return;
      used.add(old.id);
      next[i] = adopt(p, old);
      matchedByPosition.push(old.id);
    });
  }

  // pass 3: mint
  const cells: CellModel[] = parsed.map((p, i) => {
    const kept = next[i];
    if (kept) return kept;
    const cell = createCell({ kind: p.kind, source: p.source }, options.generateId);
    minted.push(cell.id);
    return cell;
  });

  while (cells.length < options.minCells) {
    const cell = createCell({ kind: "code", source: "" }, options.generateId);
    minted.push(cell.id);
    cells.push(cell);
  }

  const dropped = previous.filter((c) => !used.has(c.id)).map((c) => c.id);

  const changed =
    cells.length !== previous.length ||
    cells.some((c, i) => {
      const old = previous[i];
      return !old || old.id !== c.id || old.kind !== c.kind || old.source !== c.source;
    });

  return {
    cells,
    report: {
      changed,
      previousCount: previous.length,
      finalCount: cells.length,
      matchedByContent,
      matchedByPosition,
      revived,
      minted,
      dropped,
    },
  };
};

export const reconcileLines = (
  previous: readonly CellModel[],
  lines: readonly string[],
  opts?: ReconcileOptions
): ReconcileResult => reconcileParsedCells(previous, linesToCells(lines), opts);
