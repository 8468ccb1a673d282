// Wire shapes of the line/column analysis protocol, limited to what the proxy reads.

export interface Position {
  line: number;
  character: number;
}

export interface Range {
  start: Position;
  end: Position;
}

export interface Location {
  uri: string;
  range: Range;
}

export interface LocationLink {
  originSelectionRange?: Range;
  targetUri: string;
  targetRange: Range;
  targetSelectionRange: Range;
}

export interface TextEdit {
  range: Range;
  newText: string;
}

export interface TextDocumentEdit {
  textDocument: { uri: string; version?: number | null };
  edits: TextEdit[];
}

/** create/rename/delete file entries of `documentChanges` */
export interface ResourceOperation {
  kind: string;
  [key: string]: unknown;
}

export interface WorkspaceEdit {
  changes?: Record<string, TextEdit[]>;
  documentChanges?: Array<TextDocumentEdit | ResourceOperation>;
}

export type DiagnosticSeverity = 1 | 2 | 3 | 4;

export interface Diagnostic {
  range: Range;
  message: string;
  severity?: DiagnosticSeverity;
  code?: string | number;
  source?: string;
  [key: string]: unknown;
}

export interface PublishDiagnosticsParams {
  uri: string;
  version?: number;
  diagnostics: Diagnostic[];
}

export interface FormattingOptions {
  tabSize: number;
  insertSpaces: boolean;
}

export interface ShowDocumentParams {
  uri: string;
  takeFocus?: boolean;
  selection?: Range;
}

/** Connection to the external analysis server. */
export interface AnalysisBackend {
  sendRequest(method: string, params: unknown): Promise<unknown>;
  sendNotification(method: string, params: unknown): void;
  /** Server-to-client notifications; returns an unsubscribe function. */
  onNotification(listener: (method: string, params: unknown) => void): () => void;
}

/** Editor windows the user actually sees. */
export interface WindowHost {
  showDocument(uri: string, selection?: Range): void;
  setCursor(uri: string, position: Position): void;
}

// ------------------------ Guards ------------------------

export const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null && !Array.isArray(v);

export const isPosition = (v: unknown): v is Position =>
  isRecord(v) && typeof v.line === "number" && typeof v.character === "number";

export const isRange = (v: unknown): v is Range => isRecord(v) && isPosition(v.start) && isPosition(v.end);

export const isTextEdit = (v: unknown): v is TextEdit =>
  isRecord(v) && isRange(v.range) && typeof v.newText === "string";

export const isDiagnostic = (v: unknown): v is Diagnostic =>
  isRecord(v) && isRange(v.range) && typeof v.message === "string";

export const isTextDocumentEdit = (v: unknown): v is TextDocumentEdit => {
  if (!isRecord(v)) return false;
  const { textDocument, edits } = v;
  return (
    isRecord(textDocument) &&
    typeof textDocument.uri === "string" &&
    Array.isArray(edits) &&
    edits.every(isTextEdit)
  );
};

const isResourceOperation = (v: unknown): v is ResourceOperation => isRecord(v) && typeof v.kind === "string";

export const isWorkspaceEdit = (v: unknown): v is WorkspaceEdit => {
  if (!isRecord(v)) return false;
  const { changes, documentChanges } = v;
  if (changes === undefined && documentChanges === undefined) return false;
  if (changes !== undefined) {
    if (!isRecord(changes)) return false;
    if (!Object.values(changes).every((edits) => Array.isArray(edits) && edits.every(isTextEdit))) return false;
  }
  if (documentChanges !== undefined) {
    if (!Array.isArray(documentChanges)) return false;
    if (!documentChanges.every((c) => isTextDocumentEdit(c) || isResourceOperation(c))) return false;
  }
  return true;
};

export const isPublishDiagnosticsParams = (v: unknown): v is { uri: string; diagnostics: unknown[] } =>
  isRecord(v) && typeof v.uri === "string" && Array.isArray(v.diagnostics);

export const isShowDocumentParams = (v: unknown): v is ShowDocumentParams =>
  isRecord(v) && typeof v.uri === "string" && (v.selection === undefined || isRange(v.selection));
