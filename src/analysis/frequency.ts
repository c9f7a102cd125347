/**
 * One ranked row of a frequency table.
 */
export interface FrequencyEntry {
    token: string;
    count: number;
}

/**
 * Immutable token → count table.
 *
 * Total order: count descending, then first-encounter order ascending.
 * Fully deterministic — identical input produces identical ordering.
 */
export class FrequencyTable {
    private readonly ranked: readonly FrequencyEntry[];
    private readonly counts: ReadonlyMap<string, number>;
    readonly total: number;

    private constructor(ranked: FrequencyEntry[]) {
        this.ranked = Object.freeze(ranked.map((e) => Object.freeze({ ...e })));
        this.counts = new Map(ranked.map((e) => [e.token, e.count]));
        this.total = ranked.reduce((sum, e) => sum + e.count, 0);
    }

    /**
     * Build a table from (token, count) pairs given in encounter order.
     * Duplicate tokens are summed; non-positive counts are dropped.
     */
    static fromEntries(entries: Iterable<readonly [string, number]>): FrequencyTable {
        const counts = new Map<string, number>();
        for (const [token, count] of entries) {
            if (!(count > 0)) continue;
            counts.set(token, (counts.get(token) ?? 0) + count);
        }
        return FrequencyTable.rank(counts);
    }

    static empty(): FrequencyTable {
        return new FrequencyTable([]);
    }

    /**
     * Rank a map whose iteration order is the encounter order.
     */
    static rank(counts: ReadonlyMap<string, number>): FrequencyTable {
        const indexed = Array.from(counts, ([token, count], order) => ({ token, count, order }));
        indexed.sort((a, b) => b.count - a.count || a.order - b.order);
        return new FrequencyTable(indexed.map(({ token, count }) => ({ token, count })));
    }

    get size(): number {
        return this.ranked.length;
    }

    get(token: string): number {
        return this.counts.get(token) ?? 0;
    }

    has(token: string): boolean {
        return this.counts.has(token);
    }

    /**
     * All entries in rank order.
     */
    entries(): readonly FrequencyEntry[] {
        return this.ranked;
    }

    /**
     * First `n` entries in rank order. `n` larger than the table returns everything.
     */
    topN(n: number): FrequencyEntry[] {
        if (n <= 0) return [];
        return this.ranked.slice(0, n);
    }

    /**
     * Plain `{ token: count }` object whose key order matches the rank order.
     */
    toJSON(): Record<string, number> {
        const doc: Record<string, number> = {};
        for (const { token, count } of this.ranked) {
            doc[token] = count;
        }
        return doc;
    }
}

/**
 * Accumulates token counts across a corpus, remembering the order in which
 * each token was first seen so ties rank deterministically.
 */
export class FrequencyAggregator {
    private readonly counts = new Map<string, number>();
    private occurrences = 0;

    add(token: string): void {
        this.counts.set(token, (this.counts.get(token) ?? 0) + 1);
        this.occurrences++;
    }

    addAll(tokens: Iterable<string>): void {
        for (const token of tokens) {
            this.add(token);
        }
    }

    /**
     * Fold a partial aggregate into this one. Tokens this aggregator already
     * knows keep their position; new ones are appended in the other's order.
     */
    merge(other: FrequencyAggregator): void {
        for (const [token, count] of other.counts) {
            this.counts.set(token, (this.counts.get(token) ?? 0) + count);
        }
        this.occurrences += other.occurrences;
    }

    get totalOccurrences(): number {
        return this.occurrences;
    }

    get uniqueTokens(): number {
        return this.counts.size;
    }

    build(): FrequencyTable {
        return FrequencyTable.rank(this.counts);
    }
}
