import { isSkippableLine, splitLines } from './utils.js';

export interface CorpusStats {
    /** Lines that reached the pipeline. */
    entries: number;
    /** Non-comment lines dropped for having fewer than two fields. */
    malformed: number;
}

/**
 * Walk a tab-separated deck export and yield the front field (field 0) of
 * every usable entry, in file order.
 *
 * Header directives (`#separator:tab`, `#html:true`, ...) and blank lines are
 * skipped. A line with fewer than two fields after trimming is malformed and
 * skipped silently; `stats` records how many.
 */
export function* corpusFronts(content: string, stats?: CorpusStats): Generator<string> {
    for (const line of splitLines(content)) {
        if (isSkippableLine(line)) continue;

        const fields = line.trim().split('\t');
        if (fields.length < 2) {
            if (stats) stats.malformed++;
            continue;
        }

        if (stats) stats.entries++;
        yield fields[0] ?? '';
    }
}

