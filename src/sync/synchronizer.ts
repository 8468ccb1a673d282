import type * as Y from "yjs";
import { cloneDeep, isEqual } from "es-toolkit/compat";
import {
  type NotebookConfig,
  type Logger,
  type ResolvedNotebookConfig,
  resolveNotebookConfig,
} from "@/notebook/core/config";
import {
  INSERT_SESSION_ORIGIN,
  LOAD_ORIGIN,
  MAINT_ORIGIN,
  USER_ACTION_ORIGIN,
} from "@/notebook/core/origins";
import type {
  CellInit,
  CellKind,
  CellModel,
  CellOutputs,
  ExecutionBackend,
  NotebookMetadataModel,
  NotebookSerializer,
} from "@/notebook/core/types";
import { cellsToLines, isMarkerLine } from "@/notebook/access/layout";
import { NotebookDocument } from "@/notebook/document";
import type { ReconcileReport } from "@/notebook/quality/reconcile";
import { AnchorTracker, type LineRange } from "@/anchors/tracker";
import { project, projectRegion } from "@/shadow/projector";
import { HumanView } from "@/views/humanView";
import { ShadowView } from "@/views/shadowView";
import { type EditOverlay, type OpenOverlay, OverlayBufferCache } from "@/views/overlay";
import { TaskQueue, type ViewChange, ViewChangeBatcher } from "@/views/taskQueue";
import { overlayUri, shadowUri, virtualUri } from "@/views/identity";
import { Emitter } from "./emitter";
import { UndoCoordinator } from "./undo";

export type ResyncReason = "undo" | "redo" | "edit" | "external" | "recovery";

export type SessionEvents = {
  "view-changed": [changes: ViewChange[]];
  "overlay-opened": [overlay: Readonly<EditOverlay>];
  "overlay-closed": [info: { cellId: string; epoch: number; flushed: boolean }];
  "identity-changed": [info: { previousUri: string; uri: string; languageId: string }];
  resynced: [info: { reason: ResyncReason; report: ReconcileReport }];
};

export interface NotebookSessionOptions {
  /** Identity of the human view */
  uri: string;
  cells?: CellInit[];
  metadata?: Partial<NotebookMetadataModel>;
  config?: NotebookConfig;
}

export interface ExecutionInput {
  cellId: string;
  source: string;
}

const describeError = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/**
 * One open notebook: document model, anchors, the human and shadow views and
 * at most one edit overlay, kept in lock-step. The human view is the source
 * of truth whenever the views disagree.
 */
export class NotebookSession {
  readonly uri: string;
  readonly config: ResolvedNotebookConfig;
  readonly document: NotebookDocument;
  readonly anchors = new AnchorTracker();
  readonly human: HumanView;
  readonly shadow: ShadowView;
  readonly undoHistory: UndoCoordinator;

  private readonly log: Logger;
  private readonly queue: TaskQueue;
  private readonly changes: ViewChangeBatcher;
  private readonly buffers = new OverlayBufferCache();
  private readonly events = new Emitter<SessionEvents>();
  private readonly disposers: Array<() => void> = [];
  private current: OpenOverlay | undefined;
  private epochCounter = 0;
  private clipboard: CellModel | undefined;
  private externalPending = false;

  constructor(opts: NotebookSessionOptions) {
    this.uri = opts.uri;
    this.config = resolveNotebookConfig(opts.config);
    this.log = this.config.logger;

    const language = opts.metadata?.language ?? this.config.language;
    this.document = new NotebookDocument({
      cells: opts.cells,
      metadata: { ...opts.metadata, language },
      generateId: this.config.generateId,
    });

    this.human = new HumanView();
    this.human.setAll(cellsToLines(this.document.cells()), LOAD_ORIGIN);
    this.anchors.placeAnchors(this.document);
    this.shadow = new ShadowView(shadowUri(this.uri, language), language, project(this.document));
    this.undoHistory = new UndoCoordinator(this.human.text, {
      captureTimeout: this.config.undo.captureTimeout,
    });

    this.queue = new TaskQueue(this.config.schedule, (err) =>
      this.log.error(`[sync] deferred task failed: ${describeError(err)}`)
    );
    this.changes = new ViewChangeBatcher(this.queue, (changes) => this.events.emit("view-changed", changes));

    // writes from collaborators or bound editors that bypass this session
    const onText = (_evt: Y.YTextEvent, tr: Y.Transaction) => {
      if (!this.isOwnOrigin(tr.origin)) this.scheduleExternalResync();
    };
    this.human.text.observe(onText);
    this.disposers.push(() => this.human.text.unobserve(onText));
  }

  static fromBytes(
    uri: string,
    bytes: Uint8Array,
    serializer: NotebookSerializer,
    config?: NotebookConfig
  ): NotebookSession {
    const { cells, metadata } = serializer.parse(bytes);
    return new NotebookSession({ uri, cells, metadata, config });
  }

  serialize(serializer: NotebookSerializer): Uint8Array {
    return serializer.serialize(this.document.toModel());
  }

  // ------------------------ Identity ------------------------

  get language(): string {
    return this.document.language;
  }

  get shadowUri(): string {
    return this.shadow.uri;
  }

  get virtualUri(): string {
    return virtualUri(this.uri);
  }

  /** Uri of the open overlay, if any. */
  get overlayUri(): string | undefined {
    return this.current ? overlayUri(this.uri, this.current.cellId, this.language) : undefined;
  }

  get overlay(): Readonly<EditOverlay> | undefined {
    return this.current;
  }

  /** Bumped on every overlay open and close. */
  get epoch(): number {
    return this.epochCounter;
  }

  on<K extends keyof SessionEvents>(type: K, listener: (...args: SessionEvents[K]) => void): () => void {
    return this.events.on(type, listener);
  }

  // ------------------------ Queries ------------------------

  cellAt(line: number): string | undefined {
    return this.anchors.cellAt(line);
  }

  rangeOf(cellId: string): LineRange | undefined {
    return this.anchors.rangeOf(cellId);
  }

  contentRangeOf(cellId: string): LineRange | undefined {
    return this.anchors.contentRangeOf(cellId);
  }

  /** First content line of the next cell. */
  nextCellLine(line: number): number | undefined {
    return this.adjacentContentStart(line, 1);
  }

  prevCellLine(line: number): number | undefined {
    return this.adjacentContentStart(line, -1);
  }

  // ------------------------ Overlay ------------------------

  openOverlay(cellId: string): Readonly<EditOverlay> | undefined {
    if (this.current?.cellId === cellId) return this.current;
    const range = this.anchors.contentRangeOf(cellId);
    if (!range) return undefined;
    if (this.current) this.closeOverlay();

    const content = this.human.getLines().slice(range.start, range.end + 1);
    this.epochCounter += 1;
    this.current = {
      cellId,
      regionStart: range.start,
      regionEnd: range.end,
      lines: this.buffers.acquire(cellId, content),
      epoch: this.epochCounter,
    };
    this.events.emit("overlay-opened", this.current);
    return this.current;
  }

  /** Flush the overlay into its cell and destroy it. */
  closeOverlay(): boolean {
    const ov = this.current;
    if (!ov) return false;
    this.undoHistory.endInsertSession();
    this.document.setCellSource(ov.cellId, ov.lines);
    this.current = undefined;
    this.epochCounter += 1;
    this.events.emit("overlay-closed", { cellId: ov.cellId, epoch: ov.epoch, flushed: true });
    return true;
  }

  /** Close the overlay and reopen it on the neighbouring cell. */
  editAdjacentCell(direction: -1 | 1): Readonly<EditOverlay> | undefined {
    const ov = this.current;
    if (!ov) return undefined;
    const ids = this.anchors.cellIds();
    const target = ids[ids.indexOf(ov.cellId) + direction];
    if (target === undefined) return undefined;
    this.closeOverlay();
    return this.openOverlay(target);
  }

  /** Replace overlay-local lines [start, end). */
  overlayReplace(start: number, end: number, lines: readonly string[]): boolean {
    const ov = this.current;
    if (!ov) return false;
    if (start < 0 || end < start || end > ov.lines.length) {
      throw new Error(`Invalid overlay range [${start}, ${end}) for ${ov.lines.length} lines`);
    }
    if (lines.some(isMarkerLine)) return this.splitFromOverlay(ov, start, end, lines);
    const next = [...ov.lines];
    next.splice(start, end - start, ...lines);
    const content = next.length > 0 ? next : [""];
    const origin = this.undoHistory.editOrigin;
    const apply = () => this.applyCellContent(ov.cellId, content, origin);
    return origin === INSERT_SESSION_ORIGIN ? apply() : this.undoHistory.discrete(apply);
  }

  overlaySetLines(lines: readonly string[]): boolean {
    const ov = this.current;
    if (!ov) return false;
    return this.overlayReplace(0, ov.lines.length, lines);
  }

  beginInsert(): void {
    this.undoHistory.beginInsertSession();
  }

  endInsert(): void {
    this.undoHistory.endInsertSession();
  }

  // ------------------------ Undo ------------------------

  undo(): boolean {
    if (!this.undoHistory.undo()) return false;
    this.resyncFromHuman("undo");
    return true;
  }

  redo(): boolean {
    if (!this.undoHistory.redo()) return false;
    this.resyncFromHuman("redo");
    return true;
  }

  // ------------------------ Human view edits ------------------------

  /**
   * Replace human-view lines [start, end). Edits that stay inside one cell's
   * content resync that cell only; anything touching markers resyncs fully.
   */
  editHumanView(start: number, end: number, lines: readonly string[]): boolean {
    const total = this.human.lineCount;
    if (start < 0 || end < start || end > total) {
      throw new Error(`Invalid line range [${start}, ${end}) for ${total} lines`);
    }

    const cellId = this.anchors.cellAt(start);
    const range = cellId === undefined ? undefined : this.anchors.contentRangeOf(cellId);
    const delta = lines.length - (end - start);
    const local =
      range !== undefined &&
      start >= range.start &&
      end <= range.end + 1 &&
      range.end + 1 - range.start + delta > 0 &&
      !lines.some(isMarkerLine);

    this.undoHistory.discrete(() => this.human.replaceLines(start, end, lines, USER_ACTION_ORIGIN));

    if (!local || cellId === undefined || range === undefined) {
      this.resyncFromHuman("edit");
      return true;
    }

    const content = this.human.getLines().slice(range.start, range.end + 1 + delta);
    const shadowLines = projectRegion(this.document, cellId, content);
    if (!shadowLines) {
      this.resyncFromHuman("edit");
      return true;
    }
    this.shadow.replaceLines(range.start, range.end + 1, shadowLines);
    this.document.setCellSource(cellId, content);
    if (delta !== 0) this.anchors.applyLineEdit(start, end, lines.length);
    this.refreshOverlay();
    this.notifyFrom(start, delta === 0 ? start + lines.length - 1 : undefined);
    this.checkConsistency();
    return true;
  }

  /**
   * Push computed content (formatter, rename) into one cell. Updates shadow,
   * human and, when open on this cell, the overlay. One undo step.
   */
  replaceCellSource(cellId: string, lines: readonly string[]): boolean {
    if (!this.document.has(cellId)) return false;
    const content = lines.length > 0 ? [...lines] : [""];
    return this.undoHistory.discrete(() => this.applyCellContent(cellId, content, USER_ACTION_ORIGIN));
  }

  /** Run several edits (e.g. one per cell) as a single undo step. */
  batch<T>(fn: () => T): T {
    return this.undoHistory.discrete(fn);
  }

  // ------------------------ Structural commands ------------------------

  insertCell(index: number, kind: CellKind, source: string | readonly string[] = ""): string {
    if (!Number.isInteger(index)) throw new Error(`Invalid cell index: ${String(index)}`);
    this.closeOverlay();
    return this.undoHistory.discrete(() => {
      const id = this.document.insertCell(index, kind, source);
      this.rerender();
      return id;
    });
  }

  deleteCell(cellId: string): boolean {
    if (!this.document.has(cellId) || this.document.length <= 1) return false;
    this.closeOverlay();
    return this.undoHistory.discrete(() => {
      const removed = this.document.deleteCell(cellId);
      if (removed) this.rerender();
      return removed;
    });
  }

  moveCell(cellId: string, direction: -1 | 1): number | undefined {
    const from = this.document.indexOf(cellId);
    const to = from + direction;
    if (from < 0 || to < 0 || to >= this.document.length) return undefined;
    this.closeOverlay();
    return this.undoHistory.discrete(() => {
      const moved = this.document.moveCell(cellId, direction);
      if (moved !== undefined) this.rerender();
      return moved;
    });
  }

  setCellKind(cellId: string, kind: CellKind): boolean {
    const cell = this.document.getCell(cellId);
    if (!cell || cell.kind === kind) return false;
    this.closeOverlay();
    return this.undoHistory.discrete(() => {
      const changed = this.document.setCellKind(cellId, kind);
      if (changed) this.rerender();
      return changed;
    });
  }

  copyCell(cellId: string): boolean {
    const cell = this.document.getCell(cellId);
    if (!cell) return false;
    this.clipboard = cell;
    return true;
  }

  cutCell(cellId: string): boolean {
    const cell = this.document.getCell(cellId);
    if (!cell || this.document.length <= 1) return false;
    this.clipboard = cell;
    return this.deleteCell(cellId);
  }

  /** Insert a copy of the last cut/copied cell under a fresh id. */
  pasteCell(index: number): string | undefined {
    const cell = this.clipboard;
    if (!cell) return undefined;
    if (!Number.isInteger(index)) throw new Error(`Invalid cell index: ${String(index)}`);
    this.closeOverlay();
    return this.undoHistory.discrete(() => {
      const id = this.document.insertCell(index, cell.kind, cell.source, {
        outputs: cloneDeep(cell.outputs),
        metadata: cloneDeep(cell.metadata),
      });
      this.rerender();
      return id;
    });
  }

  // ------------------------ Language / kernel ------------------------

  /** Change the declared language; the shadow view gets a new identity. */
  setLanguage(language: string): boolean {
    if (!this.document.setLanguage(language)) return false;
    const previousUri = this.shadow.uri;
    this.shadow.setIdentity(shadowUri(this.uri, language), language);
    this.shadow.setAll(project(this.document));
    this.notifyFrom(0);
    this.events.emit("identity-changed", { previousUri, uri: this.shadow.uri, languageId: language });
    return true;
  }

  executionInput(cellId: string): ExecutionInput | undefined {
    const cell = this.document.getCell(cellId);
    if (!cell || cell.kind !== "code") return undefined;
    return { cellId, source: cell.source };
  }

  setOutputs(cellId: string, outputs: CellOutputs): boolean {
    return this.document.setOutputs(cellId, outputs);
  }

  /** Hand a code cell to the kernel; results land in the cell's outputs. */
  execute(backend: ExecutionBackend, cellId: string): boolean {
    const input = this.executionInput(cellId);
    if (!input) return false;
    backend.execute(input, (id, outputs) => {
      if (!this.setOutputs(id, outputs)) this.log.debug(`[sync] dropped outputs for missing cell ${id}`);
    });
    return true;
  }

  // ------------------------ Consistency ------------------------

  /**
   * Compare line counts; on mismatch the human view wins and everything
   * else is rebuilt from it. Returns false when a recovery was needed.
   */
  checkConsistency(): boolean {
    const human = this.human.lineCount;
    const shadow = this.shadow.lineCount;
    const anchored = this.anchors.lineCount;
    if (human === shadow && human === anchored) return true;
    this.log.warn(
      `[sync] line count mismatch (human ${human}, shadow ${shadow}, anchors ${anchored}); regenerating shadow view`
    );
    this.resyncFromHuman("recovery");
    return false;
  }

  /** Drain deferred work (view-change batches, external resyncs) now. */
  flush(): void {
    this.queue.flush();
  }

  /** Run work in the next processing cycle. */
  defer(task: () => void): void {
    this.queue.enqueue(task);
  }

  destroy(): void {
    this.closeOverlay();
    for (const dispose of this.disposers.splice(0)) dispose();
    this.undoHistory.destroy();
    this.events.clear();
    this.human.doc.destroy();
  }

  // ------------------------ Internals ------------------------

  private applyCellContent(cellId: string, lines: readonly string[], origin: symbol): boolean {
    const range = this.anchors.contentRangeOf(cellId);
    const shadowLines = projectRegion(this.document, cellId, lines);
    if (!range || !shadowLines) return false;

    const oldEnd = range.end + 1;
    const resized = lines.length !== oldEnd - range.start;
    this.shadow.replaceLines(range.start, oldEnd, shadowLines);
    this.human.replaceLines(range.start, oldEnd, lines, origin);
    this.document.setCellSource(cellId, lines);

    const ov = this.current;
    if (ov?.cellId === cellId) ov.lines.splice(0, ov.lines.length, ...lines);
    if (resized) this.anchors.applyLineEdit(range.start, oldEnd, lines.length);
    this.syncOverlayGeometry();

    this.notifyFrom(range.start, resized ? undefined : range.start + lines.length - 1);
    if (ov?.cellId === cellId) this.changes.notify("overlay", 0, lines.length - 1);
    this.checkConsistency();
    return true;
  }

  /**
   * Marker lines typed into the overlay restructure the notebook: write them
   * to the human view, close the overlay unflushed and re-derive the cells.
   */
  private splitFromOverlay(ov: OpenOverlay, start: number, end: number, lines: readonly string[]): boolean {
    const range = this.anchors.contentRangeOf(ov.cellId);
    if (!range) return false;
    this.undoHistory.discrete(() =>
      this.human.replaceLines(range.start + start, range.start + end, lines, USER_ACTION_ORIGIN)
    );
    this.dropOverlay(`[sync] marker line typed into overlay of ${ov.cellId}; closed to restructure`);
    this.resyncFromHuman("edit");
    return true;
  }

  /** Re-render the human view from the document after a structural change. */
  private rerender(): void {
    this.human.setAll(cellsToLines(this.document.cells()), USER_ACTION_ORIGIN);
    this.anchors.placeAnchors(this.document);
    this.shadow.setAll(project(this.document));
    this.notifyFrom(0);
    this.checkConsistency();
  }

  private resyncFromHuman(reason: ResyncReason): ReconcileReport {
    const lines = this.human.getLines();
    const report = this.document.reconcile(lines);
    const canonical = cellsToLines(this.document.cells());
    if (!isEqual(canonical, lines)) {
      this.log.debug(`[reconcile] normalizing human view after ${reason}`);
      this.human.setAll(canonical, MAINT_ORIGIN);
    }
    this.anchors.placeAnchors(this.document);
    this.shadow.setAll(project(this.document));
    this.refreshOverlay();
    if (report.changed) {
      this.log.debug(
        `[reconcile] ${reason}: ${report.matchedByContent.length} by content, ` +
          `${report.matchedByPosition.length} by position, ${report.revived.length} revived, ` +
          `${report.minted.length} minted, ` +
          `${report.dropped.length} dropped`
      );
    }
    this.notifyFrom(0);
    this.events.emit("resynced", { reason, report });
    return report;
  }

  /** Re-read the overlay from the human view; closes it unflushed if its cell is gone. */
  private refreshOverlay(): void {
    const ov = this.current;
    if (!ov) return;
    const range = this.anchors.contentRangeOf(ov.cellId);
    if (!range) {
      this.dropOverlay();
      return;
    }
    const content = this.human.getLines().slice(range.start, range.end + 1);
    ov.lines.splice(0, ov.lines.length, ...content);
    ov.regionStart = range.start;
    ov.regionEnd = range.end;
    this.changes.notify("overlay", 0, content.length - 1);
  }

  private syncOverlayGeometry(): void {
    const ov = this.current;
    if (!ov) return;
    const range = this.anchors.contentRangeOf(ov.cellId);
    if (!range) {
      this.dropOverlay();
      return;
    }
    ov.regionStart = range.start;
    ov.regionEnd = range.end;
  }

  private dropOverlay(reason?: string): void {
    const ov = this.current;
    if (!ov) return;
    this.undoHistory.endInsertSession();
    this.current = undefined;
    this.epochCounter += 1;
    this.log.debug(reason ?? `[sync] overlay cell ${ov.cellId} no longer exists; closed without flushing`);
    this.events.emit("overlay-closed", { cellId: ov.cellId, epoch: ov.epoch, flushed: false });
  }

  private adjacentContentStart(line: number, direction: -1 | 1): number | undefined {
    const id = this.anchors.cellAt(line);
    if (id === undefined) return undefined;
    const ids = this.anchors.cellIds();
    const target = ids[ids.indexOf(id) + direction];
    return target === undefined ? undefined : this.anchors.contentRangeOf(target)?.start;
  }

  /** Queue redraw of human and shadow lines [start, end]; `end` defaults to document end. */
  private notifyFrom(start: number, end?: number): void {
    const last = end ?? this.human.lineCount - 1;
    this.changes.notify("human", start, last);
    this.changes.notify("shadow", start, last);
  }

  private isOwnOrigin(origin: unknown): boolean {
    return (
      origin === USER_ACTION_ORIGIN ||
      origin === INSERT_SESSION_ORIGIN ||
      origin === LOAD_ORIGIN ||
      origin === MAINT_ORIGIN ||
      origin === this.undoHistory.manager
    );
  }

  private scheduleExternalResync(): void {
    if (this.externalPending) return;
    this.externalPending = true;
    this.queue.enqueue(() => {
      this.externalPending = false;
      this.resyncFromHuman("external");
    });
  }
}
