import { ulid } from "ulid";
import { DEFAULT_LANGUAGE } from "./keys";

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

export const consoleLogger: Logger = {
  debug: (msg) => console.debug(msg),
  info: (msg) => console.info(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
};

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export interface FormatConfig {
  /** Route document/range formatting through per-cell formatting */
  enabled?: boolean;
  /** Max trailing blank lines kept after a formatter runs */
  trailingBlankLines?: number;
}

export interface UndoConfig {
  /** Window (ms) in which a discrete command merges into the previous undo step; 0 keeps every command separate */
  captureTimeout?: number;
}

export interface NotebookConfig {
  language?: string;
  format?: FormatConfig;
  undo?: UndoConfig;
  logger?: Logger;
  /** Deferred work scheduler (one drain per processing cycle) */
  schedule?: (task: () => void) => void;
  generateId?: () => string;
}

export interface ResolvedNotebookConfig {
  language: string;
  format: Required<FormatConfig>;
  undo: Required<UndoConfig>;
  logger: Logger;
  schedule: (task: () => void) => void;
  generateId: () => string;
}

/**
 * Normalize config with defaults.
 */
export const resolveNotebookConfig = (config?: NotebookConfig): ResolvedNotebookConfig => ({
  language: config?.language ?? DEFAULT_LANGUAGE,
  format: {
    enabled: config?.format?.enabled ?? true,
    trailingBlankLines: Math.max(0, config?.format?.trailingBlankLines ?? 0),
  },
  undo: {
    captureTimeout: config?.undo?.captureTimeout ?? 0,
  },
  logger: config?.logger ?? consoleLogger,
  schedule: config?.schedule ?? ((task) => queueMicrotask(task)),
  generateId: config?.generateId ?? (() => ulid()),
});
