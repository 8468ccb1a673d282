export interface ViewOwner {
  /** True when `uri` names one of this document's views. */
  owns(uri: string): boolean;
}

/**
 * Process-wide map from any view identity to the document session owning it.
 * Holds no per-call state: every lookup asks the sessions directly, so
 * identities that change (overlay open, language switch) need no bookkeeping.
 */
export class SessionRegistry<S extends ViewOwner = ViewOwner> {
  private readonly sessions = new Set<S>();

  register(session: S): () => void {
    this.sessions.add(session);
    return () => {
      this.sessions.delete(session);
    };
  }

  unregister(session: S): boolean {
    return this.sessions.delete(session);
  }

  resolve(uri: string): S | undefined {
    for (const session of this.sessions) {
      if (session.owns(uri)) return session;
    }
    return undefined;
  }

  get size(): number {
    return this.sessions.size;
  }
}
