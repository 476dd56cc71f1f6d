// In-memory RemoteRefLister for tests and offline runs

import type { RemoteRef, RemoteRefLister } from './git-ref-lister.js';

/**
 * Serves refs registered per URL and records every lookup.
 * Unregistered URLs and URLs marked as failing reject like an unreachable remote.
 * `delayMs` keeps lookups pending so concurrency can be observed.
 */
export class InMemoryRefLister implements RemoteRefLister {
  private readonly remotes: Map<string, RemoteRef[]> = new Map();
  private readonly failures: Map<string, string> = new Map();
  private readonly calls: string[] = [];
  private active = 0;
  private peak = 0;

  constructor(private readonly delayMs: number = 0) {}

  setRefs(url: string, refs: RemoteRef[]): this {
    this.remotes.set(url, refs);
    return this;
  }

  fail(url: string, message: string): this {
    this.failures.set(url, message);
    return this;
  }

  getCalls(): string[] {
    return [...this.calls];
  }

  /**
   * Highest number of lookups that were pending at the same time
   */
  getPeakConcurrency(): number {
    return this.peak;
  }

  async listRefs(url: string): Promise<RemoteRef[]> {
    this.calls.push(url);
    this.active++;
    this.peak = Math.max(this.peak, this.active);

    try {
      if (this.delayMs > 0) {
        await new Promise(resolve => setTimeout(resolve, this.delayMs));
      }

      const failure = this.failures.get(url);
      if (failure !== undefined) {
        throw new Error(failure);
      }

      const refs = this.remotes.get(url);
      if (!refs) {
        throw new Error(`Repository not found: ${url}`);
      }
      return [...refs];
    } finally {
      this.active--;
    }
  }
}
