export interface ShadowChange {
  uri: string;
  version: number;
}

/**
 * Backend-facing text. Plain lines with a monotonically increasing version,
 * re-published to the analysis backend as full-text changes.
 */
export class ShadowView {
  private lines: string[];
  private ver = 0;
  private id: string;
  private lang: string;
  private readonly listeners = new Set<(change: ShadowChange) => void>();

  constructor(uri: string, languageId: string, lines: readonly string[]) {
    this.id = uri;
    this.lang = languageId;
    this.lines = [...lines];
  }

  get uri(): string {
    return this.id;
  }

  get languageId(): string {
    return this.lang;
  }

  get version(): number {
    return this.ver;
  }

  get lineCount(): number {
    return this.lines.length;
  }

  getLines(): string[] {
    return [...this.lines];
  }

  getText(): string {
    return this.lines.join("\n");
  }

  replaceLines(start: number, end: number, lines: readonly string[]): void {
    if (start < 0 || end < start || end > this.lines.length) {
      throw new Error(`Invalid line range [${start}, ${end}) for ${this.lines.length} lines`);
    }
    this.lines.splice(start, end - start, ...lines);
    this.bump();
  }

  setAll(lines: readonly string[]): void {
    this.lines = [...lines];
    this.bump();
  }

  /** Identity changes when the notebook language changes. */
  setIdentity(uri: string, languageId: string): void {
    this.id = uri;
    this.lang = languageId;
  }

  onDidChange(listener: (change: ShadowChange) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private bump(): void {
    this.ver += 1;
    const change = { uri: this.id, version: this.ver };
    for (const listener of this.listeners) listener(change);
  }
}
