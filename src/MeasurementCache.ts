import type { FontStyle, TextMeasurer } from './types';

const DEFAULT_CACHE_SIZE = 5000;

/**
 * Memoizing wrapper for an expensive measurer.
 *
 * Layout measures the same word several times in one pass (bulk measurement,
 * then once per hyphenation candidate). Entries are evicted least recently
 * used first once maxEntries is reached.
 */
export class CachedTextMeasurer implements TextMeasurer {
    private readonly inner: TextMeasurer;
    private readonly cache = new Map<string, number>();
    private maxEntries: number;
    private hits = 0;
    private misses = 0;

    constructor(inner: TextMeasurer, maxEntries: number = DEFAULT_CACHE_SIZE) {
        this.inner = inner;
        this.maxEntries = Math.max(1, maxEntries);
    }

    measure(fontId: number, text: string, style: FontStyle): number {
        const key = `${fontId}\u0000${style}\u0000${text}`;
        const cached = this.cache.get(key);
        if (cached !== undefined) {
            // Refresh recency
            this.cache.delete(key);
            this.cache.set(key, cached);
            this.hits++;
            return cached;
        }

        this.misses++;
        const width = this.inner.measure(fontId, text, style);
        this.cache.set(key, width);
        this.evict();
        return width;
    }

    setCacheSize(maxEntries: number): void {
        this.maxEntries = Math.max(1, maxEntries);
        this.evict();
    }

    clear(): void {
        this.cache.clear();
        this.hits = 0;
        this.misses = 0;
    }

    getStats(): { size: number; hits: number; misses: number } {
        return { size: this.cache.size, hits: this.hits, misses: this.misses };
    }

    private evict(): void {
        while (this.cache.size > this.maxEntries) {
            const oldest = this.cache.keys().next();
            if (oldest.done) break;
            this.cache.delete(oldest.value);
        }
    }
}
