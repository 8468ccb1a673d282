import { vi } from "vitest";
import type { Logger, NotebookConfig } from "@/notebook/core/config";
import { silentLogger } from "@/notebook/core/config";
import type { CellInit } from "@/notebook/core/types";
import { NotebookSession } from "@/sync/synchronizer";
import type { AnalysisBackend } from "@/protocol/types";

export const HUMAN_URI = "file:///work/demo.ipynb";

/** Deterministic ids: id-1, id-2, ... */
export const idCounter = (prefix = "id") => {
  let n = 0;
  return () => {
    n += 1;
    return `${prefix}-${n}`;
  };
};

/**
 * 0  # <<cell:code>>
 * 1  x = 1
 * 2  y = 2
 * 3  # <</cell>>
 * 4  # <<cell:markdown>>
 * 5  # Notes
 * 6  # <</cell>>
 * 7  # <<cell:code>>
 * 8  print(x)
 * 9  # <</cell>>
 */
export const sampleCells = (): CellInit[] => [
  { id: "c1", kind: "code", source: "x = 1\ny = 2" },
  { id: "m1", kind: "markdown", source: "# Notes" },
  { id: "c2", kind: "code", source: "print(x)" },
];

export const captureLogger = () => {
  const logger = {
    debug: vi.fn<(msg: string) => void>(),
    info: vi.fn<(msg: string) => void>(),
    warn: vi.fn<(msg: string) => void>(),
    error: vi.fn<(msg: string) => void>(),
  } satisfies Logger;
  return logger;
};

/** Session whose deferred work only runs on `flush()`. */
export const createSession = (opts?: { cells?: CellInit[]; config?: NotebookConfig; uri?: string }) =>
  new NotebookSession({
    uri: opts?.uri ?? HUMAN_URI,
    cells: opts?.cells ?? sampleCells(),
    config: {
      logger: silentLogger,
      schedule: () => {},
      generateId: idCounter(),
      ...opts?.config,
    },
  });

export type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
};

export const deferred = <T>(): Deferred<T> => {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
};

type Call = { method: string; params: unknown };

/**
 * In-process analysis server: records traffic, answers from a handler or
 * leaves replies pending until the test settles them.
 */
export class FakeBackend implements AnalysisBackend {
  readonly requests: Call[] = [];
  readonly notifications: Call[] = [];
  readonly pending: Array<Call & Deferred<unknown>> = [];
  private listeners = new Set<(method: string, params: unknown) => void>();

  constructor(private readonly handler?: (method: string, params: unknown) => unknown) {}

  sendRequest(method: string, params: unknown): Promise<unknown> {
    this.requests.push({ method, params });
    if (this.handler) return Promise.resolve(this.handler(method, params));
    const d = deferred<unknown>();
    this.pending.push({ method, params, ...d });
    return d.promise;
  }

  sendNotification(method: string, params: unknown): void {
    this.notifications.push({ method, params });
  }

  onNotification(listener: (method: string, params: unknown) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Server-to-client push. */
  notify(method: string, params: unknown): void {
    for (const listener of this.listeners) listener(method, params);
  }

  methods(): string[] {
    return this.notifications.map((n) => n.method);
  }
}
