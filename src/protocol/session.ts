import { isEqual } from "es-toolkit/compat";
import type { Logger } from "@/notebook/core/config";
import type { NotebookSession } from "@/sync/synchronizer";
import { overlayUri, parseVirtualUri } from "@/views/identity";
import { filterCodeDiagnostics, toOverlayDiagnostics } from "./diagnostics";
import { applyTextEdits, shiftEdit, trimTrailingBlankLines } from "./edits";
import { InflightRegistry } from "./inflight";
import { interceptorFor } from "./interceptors";
import type { RewriteContext } from "./rewrite";
import {
  type AnalysisBackend,
  type Diagnostic,
  type FormattingOptions,
  type Position,
  type Range,
  type TextEdit,
  type WindowHost,
  type WorkspaceEdit,
  isDiagnostic,
  isPosition,
  isPublishDiagnosticsParams,
  isRange,
  isRecord,
  isShowDocumentParams,
  isTextDocumentEdit,
  isTextEdit,
  isWorkspaceEdit,
} from "./types";

export const DEFAULT_FORMATTING_OPTIONS: FormattingOptions = { tabSize: 4, insertSpaces: true };

export interface RenameReport {
  /** Edits written into cells */
  applied: number;
  /** Edits crossing a cell boundary, outside code cells, or for other documents */
  skipped: number;
  cells: string[];
}

export interface ProtocolSessionOptions {
  backend?: AnalysisBackend;
  host?: WindowHost;
  formattingOptions?: FormattingOptions;
}

/** A formatter reply, with the cell source it was computed against. */
type FormattedCell = { cellId: string; source: string; lines: string[] };

type DiagnosticsListener = (uri: string, diagnostics: Diagnostic[]) => void;

const describeError = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/**
 * Per-document protocol state: the backend connection, in-flight requests and
 * the diagnostics last published for the shadow view.
 */
export class ProtocolSession {
  readonly notebook: NotebookSession;
  private backend: AnalysisBackend | undefined;
  private host: WindowHost | undefined;
  private readonly log: Logger;
  private readonly inflight = new InflightRegistry();
  private readonly formattingOptions: FormattingOptions;
  private readonly diagnosticsListeners = new Set<DiagnosticsListener>();
  private readonly previews = new Set<string>();
  private readonly disposers: Array<() => void> = [];
  private backendDisposers: Array<() => void> = [];
  private raw: Diagnostic[] = [];
  private changePending = false;

  constructor(notebook: NotebookSession, opts?: ProtocolSessionOptions) {
    this.notebook = notebook;
    this.log = notebook.config.logger;
    this.host = opts?.host;
    this.formattingOptions = opts?.formattingOptions ?? DEFAULT_FORMATTING_OPTIONS;

    this.disposers.push(
      notebook.shadow.onDidChange(() => this.scheduleChange()),
      notebook.on("identity-changed", ({ previousUri }) => this.reopen(previousUri)),
      notebook.on("resynced", () => this.publishDiagnostics()),
      notebook.on("overlay-opened", () => this.publishDiagnostics()),
      notebook.on("overlay-closed", ({ cellId }) => {
        this.emitDiagnostics(overlayUri(notebook.uri, cellId, notebook.language), []);
      })
    );

    if (opts?.backend) this.attach(opts.backend);
  }

  get attached(): boolean {
    return this.backend !== undefined;
  }

  get pendingRequests(): number {
    return this.inflight.size;
  }

  owns(uri: string): boolean {
    const nb = this.notebook;
    return (
      uri === nb.uri || uri === nb.shadowUri || uri === nb.overlayUri || parseVirtualUri(uri) === nb.uri
    );
  }

  setHost(host: WindowHost | undefined): void {
    this.host = host;
  }

  // ------------------------ Backend lifecycle ------------------------

  attach(backend: AnalysisBackend): void {
    if (this.backend) this.detach();
    this.backend = backend;
    this.backendDisposers.push(backend.onNotification((method, params) => this.handleNotification(method, params)));
    this.sendOpen(this.notebook.shadowUri);
    this.log.debug(`[proxy] attached ${this.notebook.shadowUri}`);
  }

  detach(): void {
    const backend = this.backend;
    if (!backend) return;
    for (const dispose of this.backendDisposers.splice(0)) dispose();
    backend.sendNotification("textDocument/didClose", { textDocument: { uri: this.notebook.shadowUri } });
    this.backend = undefined;
    this.changePending = false;
    this.inflight.clear();
    this.raw = [];
    this.publishDiagnostics();
    this.log.debug(`[proxy] detached ${this.notebook.shadowUri}`);
  }

  dispose(): void {
    this.detach();
    for (const dispose of this.disposers.splice(0)) dispose();
    this.diagnosticsListeners.clear();
  }

  /** Send the pending full-text change now (called before every request). */
  flushChanges(): void {
    if (!this.changePending) return;
    this.changePending = false;
    const backend = this.backend;
    if (!backend) return;
    const shadow = this.notebook.shadow;
    backend.sendNotification("textDocument/didChange", {
      textDocument: { uri: shadow.uri, version: shadow.version },
      contentChanges: [{ text: shadow.getText() }],
    });
  }

  // ------------------------ Requests ------------------------

  /**
   * Forward a request issued against any of this document's views.
   * Resolves `undefined` when there is no backend, the request failed, or
   * its reply went stale.
   */
  async request(originUri: string, method: string, params: unknown): Promise<unknown> {
    const interceptor = interceptorFor(method);
    if (interceptor.kind === "edit") return this.runEditFlow(interceptor.flow, originUri, params);

    const backend = this.backend;
    if (!backend) {
      this.log.debug(`[proxy] no backend attached; ${method} skipped`);
      return undefined;
    }

    const fromOverlay = this.isOverlayUri(originUri);
    const ctx = this.rewriteContext(fromOverlay);
    const outgoing = interceptor.rewriteRequest(params, ctx);
    this.flushChanges();

    const ticket = this.inflight.begin(method, `${method}@${originUri}`, {
      epoch: fromOverlay ? this.notebook.epoch : undefined,
      supersedes: interceptor.supersedes,
    });

    let result: unknown;
    try {
      result = await backend.sendRequest(method, outgoing);
    } catch (err) {
      this.inflight.settle(ticket, this.notebook.epoch);
      this.log.warn(`[proxy] ${method} failed: ${describeError(err)}`);
      return undefined;
    }

    if (!this.inflight.settle(ticket, this.notebook.epoch)) {
      this.log.debug(`[proxy] discarded stale reply to ${method} #${ticket.id}`);
      return undefined;
    }
    if (result == null) return result;
    if (typeof result !== "object") {
      this.log.debug(`[proxy] unexpected ${method} result shape; passing through`);
      return result;
    }
    return interceptor.rewriteResponse(result, ctx);
  }

  // ------------------------ Formatting ------------------------

  /** Format one code cell through range formatting. True when the cell changed. */
  async formatCell(cellId: string): Promise<boolean> {
    const formatted = await this.requestFormat(cellId);
    return formatted ? this.applyFormatted([formatted]) > 0 : false;
  }

  /** Format every code cell, bottom of the document first. Returns the number changed. */
  async formatAll(): Promise<number> {
    if (!this.notebook.config.format.enabled || !this.backend) return 0;
    return this.formatCells(this.notebook.anchors.cellIds().reverse());
  }

  /** Format the code cells overlapping `range` (document lines), bottom first. */
  async formatRange(range: Range): Promise<number> {
    const ids = this.notebook.anchors.cellIds().filter((id) => {
      const r = this.notebook.rangeOf(id);
      return r !== undefined && r.start <= range.end.line && r.end >= range.start.line;
    });
    return this.formatCells(ids.reverse());
  }

  /** Collect every reply first, then apply them as one undo step. */
  private async formatCells(ids: readonly string[]): Promise<number> {
    const results: FormattedCell[] = [];
    for (const id of ids) {
      const formatted = await this.requestFormat(id);
      if (formatted) results.push(formatted);
    }
    return this.applyFormatted(results);
  }

  private async requestFormat(cellId: string): Promise<FormattedCell | undefined> {
    if (!this.notebook.config.format.enabled) return undefined;
    const backend = this.backend;
    if (!backend) {
      this.log.debug("[proxy] no backend attached; format skipped");
      return undefined;
    }
    const cell = this.notebook.document.getCell(cellId);
    const range = this.notebook.contentRangeOf(cellId);
    if (!cell || cell.kind !== "code" || !range) return undefined;

    this.flushChanges();
    const lines = this.notebook.human.getLines().slice(range.start, range.end + 1);
    const method = "textDocument/rangeFormatting";
    const ticket = this.inflight.begin(method, `format:${cellId}`);
    let result: unknown;
    try {
      result = await backend.sendRequest(method, {
        textDocument: { uri: this.notebook.shadowUri },
        range: {
          start: { line: range.start, character: 0 },
          end: { line: range.end + 1, character: 0 },
        },
        options: this.formattingOptions,
      });
    } catch (err) {
      this.inflight.settle(ticket, this.notebook.epoch);
      this.log.warn(`[proxy] format failed: ${describeError(err)}`);
      return undefined;
    }
    if (!this.inflight.settle(ticket, this.notebook.epoch)) return undefined;
    if (result == null) return undefined;
    if (!Array.isArray(result) || !result.every(isTextEdit)) {
      this.log.debug("[proxy] unexpected formatting result shape; ignored");
      return undefined;
    }
    if (result.length === 0) return undefined;

    // edits are relative to the lines the formatter saw
    const edits = result.map((e) => shiftEdit(e, -range.start)).filter((e) => e.range.start.line >= 0);
    const formatted = trimTrailingBlankLines(
      applyTextEdits(lines, edits),
      this.notebook.config.format.trailingBlankLines
    );
    if (isEqual(formatted, lines)) return undefined;
    return { cellId, source: cell.source, lines: formatted };
  }

  private applyFormatted(results: readonly FormattedCell[]): number {
    if (results.length === 0) return 0;
    let changed = 0;
    this.notebook.batch(() => {
      for (const { cellId, source, lines } of results) {
        if (this.notebook.document.getCell(cellId)?.source !== source) {
          this.log.debug(`[proxy] cell ${cellId} changed while formatting; reply discarded`);
          continue;
        }
        if (this.notebook.replaceCellSource(cellId, lines)) changed += 1;
      }
    });
    if (changed > 0) this.publishDiagnostics();
    return changed;
  }

  // ------------------------ Rename ------------------------

  async rename(originUri: string, position: Position, newName: string): Promise<RenameReport | undefined> {
    const backend = this.backend;
    if (!backend) {
      this.log.debug("[proxy] no backend attached; rename skipped");
      return undefined;
    }
    const fromOverlay = this.isOverlayUri(originUri);
    const offset = fromOverlay ? (this.notebook.overlay?.regionStart ?? 0) : 0;
    this.flushChanges();

    const method = "textDocument/rename";
    const ticket = this.inflight.begin(method, `${method}@${originUri}`, {
      epoch: fromOverlay ? this.notebook.epoch : undefined,
    });
    let result: unknown;
    try {
      result = await backend.sendRequest(method, {
        textDocument: { uri: this.notebook.shadowUri },
        position: { line: position.line + offset, character: position.character },
        newName,
      });
    } catch (err) {
      this.inflight.settle(ticket, this.notebook.epoch);
      this.log.warn(`[proxy] rename failed: ${describeError(err)}`);
      return undefined;
    }
    if (!this.inflight.settle(ticket, this.notebook.epoch)) return undefined;
    if (!isWorkspaceEdit(result)) {
      if (result != null) this.log.debug("[proxy] unexpected rename result shape; ignored");
      return undefined;
    }
    return this.applyWorkspaceEdit(result);
  }

  /**
   * Apply the shadow-view part of a workspace edit cell by cell. Cells are
   * processed bottom-up; an edit spanning more than one cell is skipped.
   */
  applyWorkspaceEdit(edit: WorkspaceEdit): RenameReport {
    const shadowUri = this.notebook.shadowUri;
    const ours: TextEdit[] = [];
    let skipped = 0;

    for (const [uri, edits] of Object.entries(edit.changes ?? {})) {
      if (uri === shadowUri) ours.push(...edits);
      else skipped += edits.length;
    }
    for (const change of edit.documentChanges ?? []) {
      if (!isTextDocumentEdit(change)) continue;
      if (change.textDocument.uri === shadowUri) ours.push(...change.edits);
      else skipped += change.edits.length;
    }

    const groups = new Map<string, { start: number; edits: TextEdit[] }>();
    for (const e of ours) {
      const cellId = this.notebook.cellAt(e.range.start.line);
      const range = cellId === undefined ? undefined : this.notebook.contentRangeOf(cellId);
      const code = cellId !== undefined && this.notebook.document.getCell(cellId)?.kind === "code";
      if (
        cellId === undefined ||
        !range ||
        !code ||
        e.range.start.line < range.start ||
        e.range.end.line > range.end
      ) {
        skipped += 1;
        continue;
      }
      const group = groups.get(cellId) ?? { start: range.start, edits: [] };
      group.edits.push(shiftEdit(e, -range.start));
      groups.set(cellId, group);
    }

    let applied = 0;
    const cells: string[] = [];
    const ordered = [...groups.entries()].sort((a, b) => b[1].start - a[1].start);
    this.notebook.batch(() => {
      for (const [cellId, group] of ordered) {
        const range = this.notebook.contentRangeOf(cellId);
        if (!range) {
          skipped += group.edits.length;
          continue;
        }
        const lines = this.notebook.human.getLines().slice(range.start, range.end + 1);
        this.notebook.replaceCellSource(cellId, applyTextEdits(lines, group.edits));
        applied += group.edits.length;
        cells.push(cellId);
      }
    });

    if (skipped > 0) this.log.info(`[proxy] skipped ${skipped} edit(s) outside a single code cell`);
    if (applied > 0) {
      this.log.info(`[proxy] renamed ${applied} occurrence${applied === 1 ? "" : "s"}`);
      this.publishDiagnostics();
    }
    return { applied, skipped, cells };
  }

  // ------------------------ Window redirection ------------------------

  /** Redirect a jump aimed at any of this document's views to the human view. */
  showDocument(location: { uri: string; range?: Range }): boolean {
    if (!this.owns(location.uri)) return false;
    const selection = location.range && this.toDocumentRange(location.uri, location.range);
    const host = this.host;
    if (host) host.showDocument(this.notebook.uri, selection);
    else this.log.debug("[proxy] no window host; showDocument dropped");
    this.notebook.closeOverlay();
    this.releasePreviews();
    return host !== undefined;
  }

  setCursor(uri: string, position: Position): boolean {
    if (!this.owns(uri)) return false;
    const line = this.isOverlayUri(uri) ? position.line + (this.notebook.overlay?.regionStart ?? 0) : position.line;
    const host = this.host;
    if (host) host.setCursor(this.notebook.uri, { line, character: position.character });
    else this.log.debug("[proxy] no window host; setCursor dropped");
    this.notebook.closeOverlay();
    return host !== undefined;
  }

  // ------------------------ Previews ------------------------

  /** Read-only snapshot of the human view for a preview uri of this document. */
  openVirtualDocument(uri: string): string[] | undefined {
    if (parseVirtualUri(uri) !== this.notebook.uri) return undefined;
    this.previews.add(uri);
    return this.notebook.human.getLines();
  }

  /** Forget open previews once focus is back on the human view. */
  releasePreviews(): number {
    const released = this.previews.size;
    this.previews.clear();
    return released;
  }

  get openPreviews(): number {
    return this.previews.size;
  }

  // ------------------------ Diagnostics ------------------------

  onDiagnostics(listener: DiagnosticsListener): () => void {
    this.diagnosticsListeners.add(listener);
    return () => {
      this.diagnosticsListeners.delete(listener);
    };
  }

  /** Backend diagnostics restricted to code cells, in human-view lines. */
  diagnostics(): Diagnostic[] {
    return filterCodeDiagnostics(this.raw, {
      cellAt: (line) => this.notebook.cellAt(line),
      isCodeCell: (id) => this.notebook.document.getCell(id)?.kind === "code",
    });
  }

  publishDiagnostics(): void {
    const human = this.diagnostics();
    this.emitDiagnostics(this.notebook.uri, human);
    const overlay = this.notebook.overlay;
    const uri = this.notebook.overlayUri;
    if (overlay && uri) this.emitDiagnostics(uri, toOverlayDiagnostics(human, overlay));
  }

  // ------------------------ Internals ------------------------

  private async runEditFlow(
    flow: "rename" | "format" | "formatRange",
    originUri: string,
    params: unknown
  ): Promise<unknown> {
    const p: Record<string, unknown> = isRecord(params) ? params : {};
    const { position, newName, range } = p;
    switch (flow) {
      case "rename": {
        if (!isPosition(position) || typeof newName !== "string") return undefined;
        await this.rename(originUri, position, newName);
        // edits are already applied; the caller has nothing left to do
        return null;
      }
      case "format":
        await this.formatAll();
        return [];
      case "formatRange": {
        if (!isRange(range)) return [];
        await this.formatRange(this.toDocumentRange(originUri, range));
        return [];
      }
    }
  }

  private handleNotification(method: string, params: unknown): void {
    if (method === "textDocument/publishDiagnostics") {
      if (!isPublishDiagnosticsParams(params) || params.uri !== this.notebook.shadowUri) return;
      const valid = params.diagnostics.filter(isDiagnostic);
      if (valid.length !== params.diagnostics.length) {
        this.log.debug(`[proxy] ignored ${params.diagnostics.length - valid.length} malformed diagnostic(s)`);
      }
      this.raw = valid;
      this.publishDiagnostics();
      return;
    }
    if (method === "window/showDocument" && isShowDocumentParams(params)) {
      this.showDocument({ uri: params.uri, range: params.selection });
    }
  }

  private emitDiagnostics(uri: string, diagnostics: Diagnostic[]): void {
    for (const listener of this.diagnosticsListeners) listener(uri, diagnostics);
  }

  private scheduleChange(): void {
    if (!this.backend || this.changePending) return;
    this.changePending = true;
    this.notebook.defer(() => this.flushChanges());
  }

  private reopen(previousUri: string): void {
    const backend = this.backend;
    if (!backend) return;
    this.changePending = false;
    this.inflight.clear();
    this.raw = [];
    backend.sendNotification("textDocument/didClose", { textDocument: { uri: previousUri } });
    this.sendOpen(this.notebook.shadowUri);
    this.publishDiagnostics();
    this.log.debug(`[proxy] re-attached ${previousUri} -> ${this.notebook.shadowUri}`);
  }

  private sendOpen(uri: string): void {
    const shadow = this.notebook.shadow;
    this.backend?.sendNotification("textDocument/didOpen", {
      textDocument: { uri, languageId: shadow.languageId, version: shadow.version, text: shadow.getText() },
    });
    this.changePending = false;
  }

  private isOverlayUri(uri: string): boolean {
    return this.notebook.overlayUri !== undefined && uri === this.notebook.overlayUri;
  }

  private rewriteContext(fromOverlay: boolean): RewriteContext {
    return {
      humanUri: this.notebook.uri,
      shadowUri: this.notebook.shadowUri,
      virtualUri: this.notebook.virtualUri,
      lineOffset: fromOverlay ? (this.notebook.overlay?.regionStart ?? 0) : 0,
    };
  }

  private toDocumentRange(uri: string, range: Range): Range {
    const offset = this.isOverlayUri(uri) ? (this.notebook.overlay?.regionStart ?? 0) : 0;
    return {
      start: { line: range.start.line + offset, character: range.start.character },
      end: { line: range.end.line + offset, character: range.end.character },
    };
  }
}
