import * as Y from "yjs";
import { INSERT_SESSION_ORIGIN, USER_ACTION_ORIGIN } from "@/notebook/core/origins";

export type UndoStatus = {
  canUndo: boolean;
  canRedo: boolean;
  undoDepth: number;
  redoDepth: number;
  inInsertSession: boolean;
};

type Dispose = () => void;

/**
 * 仅追踪用户动作与插入会话；LOAD/MAINT 维护写入不进入撤销栈
 */
export const createHumanUndoManager = (text: Y.Text, opts?: { captureTimeout?: number }) =>
  new Y.UndoManager(text, {
    captureTimeout: opts?.captureTimeout ?? 0,
    trackedOrigins: new Set<unknown>([USER_ACTION_ORIGIN, INSERT_SESSION_ORIGIN]),
  });

/**
 * Single history for the human view. Granularity is driven entirely by
 * capture boundaries:
 * - an insertion session lifts `captureTimeout` to Infinity so every mutation
 *   merges into the stack item opened at its start;
 * - discrete commands are fenced by `stopCapturing()` unless they fall inside
 *   the configured `captureTimeout` window of the previous command.
 */
export class UndoCoordinator {
  readonly manager: Y.UndoManager;
  private readonly baseTimeout: number;
  private session = false;
  private depth = 0;
  private readonly listeners = new Set<(status: UndoStatus) => void>();
  private readonly disposers: Dispose[] = [];

  constructor(text: Y.Text, opts?: { captureTimeout?: number }) {
    this.baseTimeout = opts?.captureTimeout ?? 0;
    this.manager = createHumanUndoManager(text, { captureTimeout: this.baseTimeout });

    const notify = () => this.emit();
    this.manager.on("stack-item-added", notify);
    this.manager.on("stack-item-popped", notify);
    this.manager.on("stack-cleared", notify);
    this.disposers.push(
      () => this.manager.off("stack-item-added", notify),
      () => this.manager.off("stack-item-popped", notify),
      () => this.manager.off("stack-cleared", notify)
    );
  }

  get inInsertSession(): boolean {
    return this.session;
  }

  /** Origin for overlay mutations right now. */
  get editOrigin(): symbol {
    return this.session ? INSERT_SESSION_ORIGIN : USER_ACTION_ORIGIN;
  }

  beginInsertSession(): void {
    if (this.session) return;
    this.manager.stopCapturing();
    this.manager.captureTimeout = Number.POSITIVE_INFINITY;
    this.session = true;
    this.emit();
  }

  endInsertSession(): void {
    if (!this.session) return;
    this.manager.stopCapturing();
    this.manager.captureTimeout = this.baseTimeout;
    this.session = false;
    this.emit();
  }

  /**
   * Run `fn` as one undo step, however many transactions it makes. Nested
   * calls join the outer step. With a non-zero `captureTimeout`, a command
   * issued within that window of the previous one merges into its step.
   * An open insertion session stays open but its next mutation starts a new step.
   */
  discrete<T>(fn: () => T): T {
    if (this.depth > 0) return fn();
    const prev = this.manager.captureTimeout;
    const merge =
      !this.session && this.baseTimeout > 0 && Date.now() - this.manager.lastChange < this.baseTimeout;
    if (!merge) this.manager.stopCapturing();
    this.manager.captureTimeout = Number.POSITIVE_INFINITY;
    this.depth += 1;
    try {
      return fn();
    } finally {
      this.depth -= 1;
      this.manager.captureTimeout = prev;
      if (this.session || this.baseTimeout === 0) this.manager.stopCapturing();
    }
  }

  undo(): boolean {
    this.manager.stopCapturing();
    return this.manager.undo() !== null;
  }

  redo(): boolean {
    this.manager.stopCapturing();
    return this.manager.redo() !== null;
  }

  clear(): void {
    this.manager.clear();
  }

  status(): UndoStatus {
    return {
      canUndo: this.manager.undoStack.length > 0,
      canRedo: this.manager.redoStack.length > 0,
      undoDepth: this.manager.undoStack.length,
      redoDepth: this.manager.redoStack.length,
      inInsertSession: this.session,
    };
  }

  subscribe(listener: (status: UndoStatus) => void): Dispose {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  destroy(): void {
    for (const dispose of this.disposers.splice(0)) dispose();
    this.listeners.clear();
    this.manager.destroy();
  }

  private emit(): void {
    const status = this.status();
    for (const listener of this.listeners) listener(status);
  }
}
