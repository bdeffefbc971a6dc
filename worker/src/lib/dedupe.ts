import { normalizeUrl } from "./crawl.js";

/**
 * Per-job record of URLs already taken. The check and the mark are one
 * synchronous step, so two callers in the same job can never both win.
 */
export class Deduplicator {
  private readonly visited = new Map<string, Set<string>>();

  markIfNew(jobId: string, url: string): boolean {
    const key = normalizeUrl(url);
    let seen = this.visited.get(jobId);
    if (!seen) {
      seen = new Set();
      this.visited.set(jobId, seen);
    }
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  }

  has(jobId: string, url: string): boolean {
    return this.visited.get(jobId)?.has(normalizeUrl(url)) ?? false;
  }

  size(jobId: string): number {
    return this.visited.get(jobId)?.size ?? 0;
  }

  forget(jobId: string): void {
    this.visited.delete(jobId);
  }
}
