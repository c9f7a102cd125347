import { FrequencyAggregator, type FrequencyTable } from '../analysis/frequency.js';
import { extractTokens } from '../nlp/tokenizer.js';
import { corpusFronts, type CorpusStats } from '../sources/corpus.js';
import { readTextFile } from '../sources/utils.js';
import { getLogger } from '../utils/logger.js';

export interface CorpusAnalysis {
    table: FrequencyTable;
    stats: CorpusStats;
}

/**
 * Single pass over a deck export: every front field is normalized,
 * tokenized and filtered on the spot, and surviving tokens are counted.
 */
export function analyzeCorpus(content: string, stopwords: ReadonlySet<string>): CorpusAnalysis {
    const stats: CorpusStats = { entries: 0, malformed: 0 };
    const aggregator = new FrequencyAggregator();

    for (const front of corpusFronts(content, stats)) {
        aggregator.addAll(extractTokens(front, stopwords));
    }

    return { table: aggregator.build(), stats };
}

/**
 * Read and analyze a deck export. A read failure aborts before any
 * counting happens.
 */
export function analyzeCorpusFile(path: string, stopwords: ReadonlySet<string>): CorpusAnalysis {
    const logger = getLogger();
    const content = readTextFile(path);

    const startTime = Date.now();
    const result = analyzeCorpus(content, stopwords);

    if (result.stats.malformed > 0) {
        logger.warn({ malformed: result.stats.malformed }, 'Skipped lines with fewer than two fields');
    }

    logger.info(
        {
            path,
            entries: result.stats.entries,
            occurrences: result.table.total,
            unique: result.table.size,
            elapsedMs: Date.now() - startTime,
        },
        'Corpus analyzed'
    );

    return result;
}
