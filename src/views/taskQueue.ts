export type ViewKind = "human" | "shadow" | "overlay";

/** Lines [start, end] of `view` need redrawing. */
export interface ViewChange {
  view: ViewKind;
  start: number;
  end: number;
}

type Task = () => void;

/**
 * Deferred work drained once per processing cycle. Tasks enqueued while
 * draining run in the next cycle.
 */
export class TaskQueue {
  private tasks: Task[] = [];
  private scheduled = false;

  constructor(
    private readonly schedule: (task: () => void) => void,
    private readonly onError: (err: unknown) => void = (err) => {
      throw err;
    }
  ) {}

  get pending(): number {
    return this.tasks.length;
  }

  enqueue(task: Task): void {
    this.tasks.push(task);
    if (this.scheduled) return;
    this.scheduled = true;
    this.schedule(() => this.drain());
  }

  /** Run everything queued now instead of waiting for the scheduler. */
  flush(): void {
    while (this.tasks.length > 0) this.drain();
  }

  private drain(): void {
    this.scheduled = false;
    const batch = this.tasks;
    this.tasks = [];
    for (const task of batch) {
      try {
        task();
      } catch (err) {
        this.onError(err);
      }
    }
  }
}

/**
 * Coalesces view-change notifications per view and hands one batch per
 * cycle to the listener.
 */
export class ViewChangeBatcher {
  private readonly pending = new Map<ViewKind, ViewChange>();

  constructor(
    private readonly queue: TaskQueue,
    private readonly emit: (changes: ViewChange[]) => void
  ) {}

  notify(view: ViewKind, start: number, end: number): void {
    const first = this.pending.size === 0;
    const prev = this.pending.get(view);
    this.pending.set(
      view,
      prev
        ? { view, start: Math.min(prev.start, start), end: Math.max(prev.end, end) }
        : { view, start, end }
    );
    if (first) this.queue.enqueue(() => this.deliver());
  }

  private deliver(): void {
    if (this.pending.size === 0) return;
    const changes = [...this.pending.values()];
    this.pending.clear();
    this.emit(changes);
  }
}
