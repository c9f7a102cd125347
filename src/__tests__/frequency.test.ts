import { describe, it, expect } from 'vitest';
import { FrequencyAggregator, FrequencyTable } from '../analysis/frequency.js';

function aggregate(tokens: string[]): FrequencyTable {
    const aggregator = new FrequencyAggregator();
    aggregator.addAll(tokens);
    return aggregator.build();
}

describe('FrequencyAggregator', () => {
    it('should count tokens', () => {
        const table = aggregate(['haus', 'katze', 'haus']);
        expect(table.entries()).toEqual([
            { token: 'haus', count: 2 },
            { token: 'katze', count: 1 },
        ]);
        expect(table.get('haus')).toBe(2);
        expect(table.get('hund')).toBe(0);
        expect(table.has('katze')).toBe(true);
    });

    it('should keep sum of counts equal to occurrences and size equal to distinct tokens', () => {
        const tokens = ['zug', 'bahn', 'zug', 'auto', 'bahn', 'zug', 'rad'];
        const aggregator = new FrequencyAggregator();
        aggregator.addAll(tokens);
        const table = aggregator.build();

        expect(table.total).toBe(tokens.length);
        expect(aggregator.totalOccurrences).toBe(tokens.length);
        expect(table.size).toBe(new Set(tokens).size);
        expect(aggregator.uniqueTokens).toBe(4);
    });

    it('should break ties by first appearance', () => {
        const table = aggregate(['berg', 'apfel', 'see', 'apfel', 'berg']);
        expect(table.entries().map((e) => e.token)).toEqual(['berg', 'apfel', 'see']);
        expect(Object.keys(table.toJSON())).toEqual(['berg', 'apfel', 'see']);
    });

    it('should be deterministic', () => {
        const tokens = ['a1', 'b1', 'c1', 'b1', 'a1', 'd1'];
        expect(aggregate(tokens).entries()).toEqual(aggregate(tokens).entries());
    });

    it('should merge partial aggregates', () => {
        const left = new FrequencyAggregator();
        left.addAll(['xa', 'ya']);
        const right = new FrequencyAggregator();
        right.addAll(['za', 'ya', 'ya']);

        left.merge(right);
        const table = left.build();

        expect(table.entries()).toEqual([
            { token: 'ya', count: 3 },
            { token: 'xa', count: 1 },
            { token: 'za', count: 1 },
        ]);
        expect(left.totalOccurrences).toBe(5);
    });

    it('should build an empty table from no tokens', () => {
        const table = aggregate([]);
        expect(table.size).toBe(0);
        expect(table.total).toBe(0);
        expect(table.topN(5)).toEqual([]);
        expect(table.toJSON()).toEqual({});
    });
});

describe('FrequencyTable', () => {
    const table = aggregate(['haus', 'katze', 'haus', 'hund', 'hund', 'hund']);

    it('should return the first n entries', () => {
        expect(table.topN(1)).toEqual([{ token: 'hund', count: 3 }]);
        expect(table.topN(2).map((e) => e.token)).toEqual(['hund', 'haus']);
    });

    it('should return the whole table when n exceeds its size', () => {
        expect(table.topN(100)).toHaveLength(3);
    });

    it('should return nothing for n <= 0', () => {
        expect(table.topN(0)).toEqual([]);
        expect(table.topN(-1)).toEqual([]);
    });

    it('should be immutable', () => {
        expect(Object.isFrozen(table.entries())).toBe(true);
        expect(Object.isFrozen(table.entries()[0])).toBe(true);
    });

    it('should serialize to an ordered token → count object', () => {
        expect(JSON.stringify(table.toJSON())).toBe('{"hund":3,"haus":2,"katze":1}');
    });

    describe('fromEntries', () => {
        it('should sum duplicates and drop non-positive counts', () => {
            const rebuilt = FrequencyTable.fromEntries([['ab', 1], ['bc', 3], ['ab', 2], ['cd', 0]]);
            expect(rebuilt.entries()).toEqual([
                { token: 'ab', count: 3 },
                { token: 'bc', count: 3 },
            ]);
        });

        it('should re-rank entries given out of order', () => {
            const rebuilt = FrequencyTable.fromEntries([['eins', 1], ['zwei', 2]]);
            expect(rebuilt.topN(1)).toEqual([{ token: 'zwei', count: 2 }]);
        });
    });
});
