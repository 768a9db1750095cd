/**
 * FIFO URL frontier: pending queue plus the permanent visited set
 */
import type { UrlValidator } from './url-normalizer.js';

/** Serializable frontier snapshot, as stored in the checkpoint file. */
export interface FrontierState {
  visited: string[];
  queue: string[];
}

/**
 * Owns the pending queue and the visited set. Every URL passes the
 * validator before it is queued, so the queue only ever holds canonical,
 * in-scope URLs. Invariants: visited and queue are disjoint, and the queue
 * holds no duplicates.
 */
export class UrlFrontier {
  private queue: string[] = [];
  private queued = new Set<string>();
  private visited = new Set<string>();

  constructor(private readonly validate: UrlValidator) {}

  /**
   * Rebuild a frontier from a checkpoint. Queue entries are re-validated,
   * so anything the current rules reject (or that is already visited) is dropped.
   */
  static restore(state: FrontierState, validate: UrlValidator): UrlFrontier {
    const frontier = new UrlFrontier(validate);
    for (const url of state.visited) {
      frontier.visited.add(url);
    }
    frontier.enqueueAll(state.queue);
    return frontier;
  }

  /**
   * Validate and append a URL. No-op (returns false) when the URL is rejected,
   * already visited, or already queued.
   */
  enqueue(rawUrl: string, baseUrl?: string): boolean {
    const url = this.validate(rawUrl, baseUrl);
    if (!url) return false;
    if (this.visited.has(url) || this.queued.has(url)) return false;

    this.queued.add(url);
    this.queue.push(url);
    return true;
  }

  /** Enqueue several URLs in order; returns how many were added. */
  enqueueAll(urls: Iterable<string>, baseUrl?: string): number {
    let added = 0;
    for (const url of urls) {
      if (this.enqueue(url, baseUrl)) added++;
    }
    return added;
  }

  /**
   * Enqueue the priority paths, joined onto the site root with its trailing
   * slash removed. Idempotent with respect to visited and queued URLs.
   */
  seed(rootUrl: string, paths: readonly string[]): number {
    const base = rootUrl.replace(/\/+$/, '');
    return this.enqueueAll(paths.map((path) => `${base}${path}`));
  }

  /** Remove and return the head of the queue, or null when empty. */
  dequeue(): string | null {
    const url = this.queue.shift();
    if (url === undefined) return null;
    this.queued.delete(url);
    return url;
  }

  /** Record a URL as visited for the rest of the run, whatever its fetch outcome. */
  markVisited(url: string): void {
    this.visited.add(url);
    if (this.queued.delete(url)) {
      this.queue = this.queue.filter((entry) => entry !== url);
    }
  }

  isVisited(url: string): boolean {
    return this.visited.has(url);
  }

  hasMore(): boolean {
    return this.queue.length > 0;
  }

  get queueLength(): number {
    return this.queue.length;
  }

  get visitedCount(): number {
    return this.visited.size;
  }

  /** Copy of the current state, safe to serialize. */
  snapshot(): FrontierState {
    return { visited: [...this.visited], queue: [...this.queue] };
  }
}
