import {
  type RewriteContext,
  type RewriteStrategy,
  rewriteRequestParams,
  rewriteResultUris,
  targetUriFor,
} from "./rewrite";

/**
 * navigate: single jump target (definition and friends)
 * list: results shown in a picker (references, symbols)
 * interactive: completion/hover style; only the newest reply matters
 * edit: rename/format, applied by the proxy itself
 * passthrough: anything else; uris still rewritten
 */
export type InterceptorKind = "navigate" | "list" | "interactive" | "edit" | "passthrough";

export type EditFlow = "rename" | "format" | "formatRange";

interface InterceptorBase {
  strategy: RewriteStrategy;
  /** A newer request of the same class makes older replies stale. */
  supersedes: boolean;
  rewriteRequest(params: unknown, ctx: RewriteContext): unknown;
  rewriteResponse(result: unknown, ctx: RewriteContext): unknown;
}

export type MethodInterceptor =
  | (InterceptorBase & { kind: "navigate" | "list" | "interactive" | "passthrough" })
  | (InterceptorBase & { kind: "edit"; flow: EditFlow });

const rewriteResponseWith =
  (strategy: RewriteStrategy) =>
  (result: unknown, ctx: RewriteContext): unknown =>
    rewriteResultUris(result, ctx.shadowUri, targetUriFor(strategy, ctx));

const make = (
  kind: "navigate" | "list" | "interactive" | "passthrough",
  strategy: RewriteStrategy,
  supersedes: boolean
): MethodInterceptor => ({
  kind,
  strategy,
  supersedes,
  rewriteRequest: rewriteRequestParams,
  rewriteResponse: rewriteResponseWith(strategy),
});

const edit = (flow: EditFlow): MethodInterceptor => ({
  kind: "edit",
  flow,
  strategy: "direct",
  supersedes: true,
  rewriteRequest: rewriteRequestParams,
  rewriteResponse: rewriteResponseWith("direct"),
});

const navigate = make("navigate", "direct", true);
const list = make("list", "indirect", true);
const interactive = make("interactive", "indirect", true);

export const PASSTHROUGH: MethodInterceptor = make("passthrough", "indirect", false);

export const METHOD_INTERCEPTORS: Readonly<Record<string, MethodInterceptor>> = {
  "textDocument/definition": navigate,
  "textDocument/declaration": navigate,
  "textDocument/implementation": navigate,
  "textDocument/typeDefinition": navigate,

  "textDocument/references": list,
  "textDocument/documentSymbol": list,
  "textDocument/documentHighlight": list,
  "callHierarchy/incomingCalls": list,
  "callHierarchy/outgoingCalls": list,

  "textDocument/completion": interactive,
  "completionItem/resolve": interactive,
  "textDocument/hover": interactive,
  "textDocument/signatureHelp": interactive,

  "textDocument/rename": edit("rename"),
  "textDocument/formatting": edit("format"),
  "textDocument/rangeFormatting": edit("formatRange"),
};

export const interceptorFor = (method: string): MethodInterceptor => METHOD_INTERCEPTORS[method] ?? PASSTHROUGH;
