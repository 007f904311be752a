import { createHash } from 'crypto';

export const DEFAULT_TITLE_CACHE_SIZE = 10_000;
export const MAX_TITLE_LENGTH = 80;

export interface TitleCacheStats {
  entries: number;
  capacity: number;
  hits: number;
  misses: number;
  collapsed: number;
  evictions: number;
}

/**
 * Clean a model-produced title: one line, no surrounding quotes or dashes,
 * at most 80 characters
 */
export function normalizeTitle(raw: string): string {
  const title = raw
    .replace(/\r?\n/g, ' ')
    .trim()
    .replace(/^["'`“”‘’\-–—\s]+/, '')
    .replace(/["'`“”‘’\-–—\s]+$/, '');

  const chars = Array.from(title);
  return chars.length > MAX_TITLE_LENGTH ? chars.slice(0, MAX_TITLE_LENGTH).join('').trimEnd() : title;
}

export function normalizeForKey(message: string): string {
  return message.trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * Cache key for a title: the first user message, the model and the prompt
 * version all change the result
 */
export function makeTitleKey(firstMessage: string, model: string, promptVersion: string): string {
  return createHash('sha256')
    .update(`title|${model}|${promptVersion}|${normalizeForKey(firstMessage)}`)
    .digest('hex');
}

/**
 * LRU of normalized titles with duplicate-request collapsing.
 * Concurrent callers for one key share a single computation; its failure
 * reaches all of them and is never cached. Empty titles are returned but
 * not stored.
 */
export class TitleCache {
  private readonly entries = new Map<string, string>();
  private readonly inFlight = new Map<string, Promise<string>>();
  private hits = 0;
  private misses = 0;
  private collapsed = 0;
  private evictions = 0;

  constructor(private readonly capacity: number = DEFAULT_TITLE_CACHE_SIZE) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`title cache capacity must be a positive integer, got ${capacity}`);
    }
  }

  getOrCompute(key: string, compute: () => Promise<string>): Promise<string> {
    const cached = this.get(key);
    if (cached !== undefined) {
      this.hits++;
      return Promise.resolve(cached);
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      this.collapsed++;
      return pending;
    }

    this.misses++;
    const promise = this.computeAndStore(key, compute).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, promise);
    return promise;
  }

  get(key: string): string | undefined {
    const value = this.entries.get(key);
    if (value === undefined) {
      return undefined;
    }
    // Move to most recently used
    this.entries.delete(key);
    this.entries.set(key, value);
    return value;
  }

  set(key: string, value: string): void {
    this.entries.delete(key);
    this.entries.set(key, value);

    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
      this.evictions++;
    }
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  stats(): TitleCacheStats {
    return {
      entries: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      collapsed: this.collapsed,
      evictions: this.evictions,
    };
  }

  private async computeAndStore(key: string, compute: () => Promise<string>): Promise<string> {
    const raw = await compute();
    const title = normalizeTitle(raw);
    if (title === '') {
      return raw;
    }
    this.set(key, title);
    return title;
  }
}
