export type CellKind = "code" | "markdown" | "raw";

export const CELL_KINDS: readonly CellKind[] = ["code", "markdown", "raw"];

export const isCellKind = (v: unknown): v is CellKind =>
  v === "code" || v === "markdown" || v === "raw";

/** Opaque per-cell payloads owned by the serializer/kernel layers. */
export type CellOutputs = unknown;
export type CellMetadata = Record<string, unknown>;

export interface CellModel {
  /** Stable across moves, kind changes, undo and reconcile. */
  readonly id: string;
  kind: CellKind;
  /** Lines joined by "\n"; an empty cell still has one (empty) content line. */
  source: string;
  outputs: CellOutputs;
  metadata: CellMetadata;
}

export interface NotebookMetadataModel {
  /** Declared analysis language, drives the shadow view's extension. */
  language: string;
  [key: string]: unknown;
}

export interface NotebookModel {
  cells: CellModel[];
  metadata: NotebookMetadataModel;
}

/** Cell shape as produced by a serializer, before ids are guaranteed. */
export type CellInit = Partial<Omit<CellModel, "kind">> & { kind: CellKind };

// ------------------------ External collaborators ------------------------

/** On-disk notebook format <-> cells. Lives outside this package. */
export interface NotebookSerializer {
  parse(bytes: Uint8Array): { cells: CellInit[]; metadata: Partial<NotebookMetadataModel> };
  serialize(model: NotebookModel): Uint8Array;
}

/** Displays outputs for a cell; independent of the synchronization core. */
export interface OutputRenderer {
  render(cellId: string, outputs: CellOutputs): void;
}

/** Kernel bridge. Results come back through `setOutputs` on the session. */
export interface ExecutionBackend {
  execute(
    input: { cellId: string; source: string },
    onResult: (cellId: string, outputs: CellOutputs) => void
  ): void;
}
