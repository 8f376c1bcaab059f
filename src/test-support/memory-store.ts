import type { StateDocument, StateStore } from '../modules/state-store.js';

/**
 * In-process StateStore for tests. Documents are kept as JSON text so a
 * read returns a fresh copy, like the real stores.
 */
export class MemoryStateStore implements StateStore {
  readonly kind = 'memory';
  readonly documents = new Map<StateDocument, string>();
  readonly writes: StateDocument[] = [];
  failWrites = false;
  failReads = new Set<StateDocument>();

  async read(name: StateDocument): Promise<unknown> {
    if (this.failReads.has(name)) {
      throw new SyntaxError(`Unexpected token in ${name}`);
    }
    const raw = this.documents.get(name);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  async write(name: StateDocument, value: unknown): Promise<void> {
    if (this.failWrites) {
      throw new Error('disk full');
    }
    this.writes.push(name);
    this.documents.set(name, JSON.stringify(value));
  }

  async close(): Promise<void> {}

  seed(name: StateDocument, value: unknown): void {
    this.documents.set(name, JSON.stringify(value));
  }

  get(name: StateDocument): unknown {
    const raw = this.documents.get(name);
    return raw === undefined ? undefined : JSON.parse(raw);
  }
}
