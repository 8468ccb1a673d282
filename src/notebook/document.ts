import { ulid } from "ulid";
import { DEFAULT_LANGUAGE } from "./core/keys";
import type {
  CellInit,
  CellKind,
  CellModel,
  CellOutputs,
  NotebookMetadataModel,
  NotebookModel,
} from "./core/types";
import { isCellKind } from "./core/types";
import { cloneCell, createCell, joinSource } from "./access/cells";
import { changeCellKind, insertCellAt, moveCellBy, removeCellById } from "./ops/mutations";
import { type ReconcileReport, reconcileLines } from "./quality/reconcile";
import { type ValidationIssue, validateDocument } from "./quality/validation";

/** How many removed cells are remembered for id revival on undo */
export const RETIRED_CELL_LIMIT = 64;

export interface NotebookDocumentInit {
  cells?: CellInit[];
  metadata?: Partial<NotebookMetadataModel>;
  generateId?: () => string;
}

type SourceInput = string | readonly string[];

const toSource = (source: SourceInput): string =>
  typeof source === "string" ? source : joinSource(source);

/**
 * Ordered cell list plus notebook metadata. Owns every cell; ids are never
 * duplicated or dropped silently, and the list never becomes empty.
 */
export class NotebookDocument {
  private list: CellModel[] = [];
  private retired: CellModel[] = [];
  private meta: NotebookMetadataModel;
  private readonly generateId: () => string;

  constructor(init?: NotebookDocumentInit) {
    this.generateId = init?.generateId ?? (() => ulid());
    this.meta = { ...(init?.metadata ?? {}), language: init?.metadata?.language ?? DEFAULT_LANGUAGE };
    const seen = new Set<string>();
    for (const raw of init?.cells ?? []) {
      // serializers may hand us duplicate ids (copy-pasted cells); re-mint those
      const cell = createCell(raw.id && seen.has(raw.id) ? { ...raw, id: undefined } : raw, this.generateId);
      seen.add(cell.id);
      this.list.push(cell);
    }
    if (this.list.length === 0) this.list.push(createCell({ kind: "code" }, this.generateId));
  }

  get length(): number {
    return this.list.length;
  }

  get metadata(): Readonly<NotebookMetadataModel> {
    return this.meta;
  }

  get language(): string {
    return this.meta.language;
  }

  setLanguage(language: string): boolean {
    if (language.length === 0) throw new Error("Language must be a non-empty string");
    if (language === this.meta.language) return false;
    this.meta = { ...this.meta, language };
    return true;
  }

  /** Snapshot copy; mutating it does not touch the document. */
  cells(): CellModel[] {
    return this.list.map(cloneCell);
  }

  getCell(id: string): CellModel | undefined {
    const cell = this.find(id);
    return cell ? cloneCell(cell) : undefined;
  }

  at(index: number): CellModel | undefined {
    const cell = this.list[index];
    return cell ? cloneCell(cell) : undefined;
  }

  indexOf(id: string): number {
    return this.list.findIndex((c) => c.id === id);
  }

  has(id: string): boolean {
    return this.indexOf(id) >= 0;
  }

  insertCell(
    index: number,
    kind: CellKind,
    source: SourceInput = "",
    extras?: Pick<CellInit, "outputs" | "metadata">
  ): string {
    if (!Number.isInteger(index)) throw new Error(`Invalid cell index: ${String(index)}`);
    if (!isCellKind(kind)) throw new Error(`Unknown cell kind: ${String(kind)}`);
    const cell = createCell(
      { kind, source: toSource(source), outputs: extras?.outputs, metadata: extras?.metadata },
      this.generateId
    );
    insertCellAt(this.list, cell, index);
    return cell.id;
  }

  /** Refuses to remove the last remaining cell. */
  deleteCell(id: string): boolean {
    if (this.list.length <= 1 || !this.has(id)) return false;
    const removed = removeCellById(this.list, id);
    if (!removed) return false;
    this.retire([removed]);
    return true;
  }

  moveCell(id: string, direction: -1 | 1): number | undefined {
    return moveCellBy(this.list, id, direction);
  }

  setCellKind(id: string, kind: CellKind): boolean {
    if (!isCellKind(kind)) throw new Error(`Unknown cell kind: ${String(kind)}`);
    const cell = this.find(id);
    return cell ? changeCellKind(cell, kind) : false;
  }

  setCellSource(id: string, source: SourceInput): boolean {
    const cell = this.find(id);
    if (!cell) return false;
    const next = toSource(source);
    if (cell.source === next) return false;
    cell.source = next;
    return true;
  }

  setOutputs(id: string, outputs: CellOutputs): boolean {
    const cell = this.find(id);
    if (!cell) return false;
    cell.outputs = outputs;
    return true;
  }

  /** Re-derive the cell list from human-view lines, keeping ids where possible. */
  reconcile(lines: readonly string[]): ReconcileReport {
    const { cells, report } = reconcileLines(this.list, lines, {
      generateId: this.generateId,
      retired: this.retired,
    });
    const dropped = new Set(report.dropped);
    const revived = new Set(report.revived);
    const gone = this.list.filter((c) => dropped.has(c.id));
    this.retired = this.retired.filter((c) => !revived.has(c.id));
    this.retire(gone);
    this.list = cells;
    return report;
  }

  validate(): ValidationIssue[] {
    return validateDocument(this.list);
  }

  toModel(): NotebookModel {
    return { cells: this.cells(), metadata: { ...this.meta } };
  }

  private retire(cells: readonly CellModel[]): void {
    if (cells.length === 0) return;
    const ids = new Set(cells.map((c) => c.id));
    this.retired = [...cells, ...this.retired.filter((c) => !ids.has(c.id))].slice(0, RETIRED_CELL_LIMIT);
  }

  private find(id: string): CellModel | undefined {
    return this.list.find((c) => c.id === id);
  }
}
