import { cloneDeep } from "es-toolkit/compat";
import { isRecord } from "./types";

/**
 * direct: results that make the editor jump; they point at the live human view.
 * indirect: results listed for picking; they point at a read-only preview uri.
 */
export type RewriteStrategy = "direct" | "indirect";

export interface RewriteContext {
  humanUri: string;
  shadowUri: string;
  virtualUri: string;
  /** Added to every request line (overlay-local -> document line). */
  lineOffset: number;
}

export const targetUriFor = (strategy: RewriteStrategy, ctx: RewriteContext): string =>
  strategy === "direct" ? ctx.humanUri : ctx.virtualUri;

const URI_KEYS = ["uri", "targetUri"] as const;

const rewriteNode = (node: unknown, from: string, to: string): void => {
  if (Array.isArray(node)) {
    for (const item of node) rewriteNode(item, from, to);
    return;
  }
  if (!isRecord(node)) return;

  for (const key of URI_KEYS) {
    if (node[key] === from) node[key] = to;
  }

  // WorkspaceEdit.changes is keyed by uri
  const changes = node.changes;
  if (isRecord(changes) && from in changes) {
    changes[to] = changes[from];
    delete changes[from];
  }

  for (const value of Object.values(node)) rewriteNode(value, from, to);
};

/**
 * Deep-copy `result` and replace every reference to `from` with `to`.
 * Shapes it does not recognise are copied through untouched.
 */
export const rewriteResultUris = (result: unknown, from: string, to: string): unknown => {
  if (result === null || typeof result !== "object") return result;
  const copy: unknown = cloneDeep(result);
  rewriteNode(copy, from, to);
  return copy;
};

const shiftLine = (pos: unknown, offset: number): void => {
  if (isRecord(pos) && typeof pos.line === "number") pos.line += offset;
};

/**
 * Point a request at the shadow view. Line numbers are shared by both views,
 * so only overlay requests move (by the overlay's region start).
 */
export const rewriteRequestParams = (params: unknown, ctx: RewriteContext): unknown => {
  if (!isRecord(params)) return params;
  const copy = cloneDeep(params);
  const textDocument = copy.textDocument;
  if (isRecord(textDocument)) textDocument.uri = ctx.shadowUri;
  if (ctx.lineOffset !== 0) {
    shiftLine(copy.position, ctx.lineOffset);
    const range = copy.range;
    if (isRecord(range)) {
      shiftLine(range.start, ctx.lineOffset);
      shiftLine(range.end, ctx.lineOffset);
    }
  }
  return copy;
};
