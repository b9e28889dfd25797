/**
 * Least-recently-used cache for non-streaming replies
 */
export class ResponseCache {
  private entries: Map<string, string> = new Map();
  private hits = 0;
  private misses = 0;

  constructor(private readonly maxEntries: number = 100) {}

  static key(prompt: string, temperature: number, sessionId: string): string {
    return JSON.stringify([prompt, temperature, sessionId]);
  }

  get(key: string): string | undefined {
    const value = this.entries.get(key);
    if (value === undefined) {
      this.misses++;
      return undefined;
    }
    // Re-insert to mark as most recently used
    this.entries.delete(key);
    this.entries.set(key, value);
    this.hits++;
    return value;
  }

  set(key: string, value: string): void {
    this.entries.delete(key);
    this.entries.set(key, value);

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  getStats() {
    return {
      size: this.entries.size,
      maxEntries: this.maxEntries,
      hits: this.hits,
      misses: this.misses,
    };
  }
}
