/** Transient per-cell editing surface. Regions are inclusive human-view lines. */
export interface EditOverlay {
  readonly cellId: string;
  regionStart: number;
  regionEnd: number;
  /** Cached buffer for this cell; reused across open/close cycles. */
  readonly lines: readonly string[];
  readonly epoch: number;
}

/** The synchronizer's own handle; only it writes the buffer. */
export interface OpenOverlay extends Omit<EditOverlay, "lines"> {
  readonly lines: string[];
}

/**
 * Overlay line buffers keyed by cell id. Reopening a cell hands back the same
 * array so editor-side state keyed on it (history, cursor) survives.
 */
export class OverlayBufferCache {
  private readonly buffers = new Map<string, string[]>();

  acquire(cellId: string, content: readonly string[]): string[] {
    const buffer = this.buffers.get(cellId) ?? [];
    buffer.splice(0, buffer.length, ...content);
    this.buffers.set(cellId, buffer);
    return buffer;
  }

  has(cellId: string): boolean {
    return this.buffers.has(cellId);
  }

  get size(): number {
    return this.buffers.size;
  }
}

export const overlayRegionLength = (overlay: Pick<EditOverlay, "regionStart" | "regionEnd">): number =>
  overlay.regionEnd - overlay.regionStart + 1;
