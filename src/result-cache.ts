// Interview Voice Analyzer - Content-hash result cache
// Read-through memo for expensive external calls (transcription and LLM
// commentary). Keys are a namespace plus the SHA-256 of the input bytes, so
// the same recording analyzed twice costs one API call. Concurrent callers
// for a pending key share its promise; only successful results are stored.

import { createHash } from "crypto";

export function contentKey(namespace: string, bytes: Buffer | Uint8Array): string {
  const digest = createHash("sha256").update(bytes).digest("hex");
  return `${namespace}:${digest}`;
}

export class ContentHashCache<T> {
  private readonly settled = new Map<string, T>();
  private readonly pending = new Map<string, Promise<T>>();
  private readonly maxEntries: number;

  constructor(maxEntries = 64) {
    this.maxEntries = Math.max(1, Math.floor(maxEntries));
  }

  get size(): number {
    return this.settled.size;
  }

  has(key: string): boolean {
    return this.settled.has(key);
  }

  getOrCompute(key: string, compute: () => Promise<T>): Promise<T> {
    if (this.settled.has(key)) {
      const value = this.settled.get(key);
      if (value !== undefined) return Promise.resolve(value);
    }
    const inFlight = this.pending.get(key);
    if (inFlight) return inFlight;

    const promise = compute().then(
      (value) => {
        this.pending.delete(key);
        this.store(key, value);
        return value;
      },
      (err: unknown) => {
        this.pending.delete(key);
        throw err;
      },
    );
    this.pending.set(key, promise);
    return promise;
  }

  clear(): void {
    this.settled.clear();
  }

  private store(key: string, value: T): void {
    this.settled.delete(key);
    this.settled.set(key, value);
    while (this.settled.size > this.maxEntries) {
      const oldest = this.settled.keys().next();
      if (oldest.done) break;
      this.settled.delete(oldest.value);
    }
  }
}
