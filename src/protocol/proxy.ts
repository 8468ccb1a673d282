import { type Logger, consoleLogger } from "@/notebook/core/config";
import type { NotebookSession } from "@/sync/synchronizer";
import { SessionRegistry } from "./registry";
import { ProtocolSession, type ProtocolSessionOptions, type RenameReport } from "./session";
import type { Position, Range } from "./types";

/**
 * Process-wide entry point. Every call is routed by the uri it was issued
 * against; the owning document session holds all mutable state.
 */
export class ProtocolProxy {
  readonly registry: SessionRegistry<ProtocolSession>;
  private readonly log: Logger;

  constructor(opts?: { registry?: SessionRegistry<ProtocolSession>; logger?: Logger }) {
    this.registry = opts?.registry ?? new SessionRegistry<ProtocolSession>();
    this.log = opts?.logger ?? consoleLogger;
  }

  /** Start proxying a document; the returned session is also reachable by any of its uris. */
  attach(notebook: NotebookSession, opts?: ProtocolSessionOptions): ProtocolSession {
    const existing = this.registry.resolve(notebook.uri);
    if (existing) this.detach(notebook.uri);
    const session = new ProtocolSession(notebook, opts);
    this.registry.register(session);
    return session;
  }

  detach(uri: string): boolean {
    const session = this.registry.resolve(uri);
    if (!session) return false;
    session.dispose();
    return this.registry.unregister(session);
  }

  sessionFor(uri: string): ProtocolSession | undefined {
    return this.registry.resolve(uri);
  }

  async request(originUri: string, method: string, params: unknown): Promise<unknown> {
    const session = this.registry.resolve(originUri);
    if (!session) {
      this.log.debug(`[proxy] ${originUri} is not a notebook view; ${method} skipped`);
      return undefined;
    }
    return session.request(originUri, method, params);
  }

  async rename(originUri: string, position: Position, newName: string): Promise<RenameReport | undefined> {
    return this.registry.resolve(originUri)?.rename(originUri, position, newName);
  }

  async formatCell(uri: string, cellId: string): Promise<boolean> {
    return (await this.registry.resolve(uri)?.formatCell(cellId)) ?? false;
  }

  async formatAll(uri: string): Promise<number> {
    return (await this.registry.resolve(uri)?.formatAll()) ?? 0;
  }

  showDocument(location: { uri: string; range?: Range }): boolean {
    return this.registry.resolve(location.uri)?.showDocument(location) ?? false;
  }

  setCursor(uri: string, position: Position): boolean {
    return this.registry.resolve(uri)?.setCursor(uri, position) ?? false;
  }

  openVirtualDocument(uri: string): string[] | undefined {
    return this.registry.resolve(uri)?.openVirtualDocument(uri);
  }

  releasePreviews(humanUri: string): number {
    return this.registry.resolve(humanUri)?.releasePreviews() ?? 0;
  }
}

/** Shared by every document in the process. */
export const sharedProxy = new ProtocolProxy();
