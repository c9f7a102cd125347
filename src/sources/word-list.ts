import type { VocabularyItem } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { readTextFile, splitLines } from './utils.js';

/**
 * Parse a word list: one word per line, `#` comments, blank lines ignored.
 * Words are case-folded and de-duplicated, keeping first occurrences.
 *
 * A line may carry a translation after a tab (`Haus\thouse`); the first
 * translation seen for a word wins.
 */
export function parseWordList(content: string): VocabularyItem[] {
    const items = new Map<string, VocabularyItem>();

    for (const rawLine of splitLines(content)) {
        const line = rawLine.trim();
        if (!line || line.startsWith('#')) continue;

        const [wordPart = '', ...rest] = line.split('\t');
        const word = wordPart.trim().toLowerCase();
        if (!word) continue;

        const translation = rest.join('\t').trim();
        const existing = items.get(word);

        if (!existing) {
            items.set(word, translation ? { word, translation } : { word });
        } else if (!existing.translation && translation) {
            existing.translation = translation;
        }
    }

    return Array.from(items.values());
}

/**
 * Load one or more word-list files and merge them in argument order,
 * de-duplicating across files.
 */
export function loadWordLists(paths: readonly string[]): VocabularyItem[] {
    const logger = getLogger();
    const merged = new Map<string, VocabularyItem>();

    for (const path of paths) {
        const items = parseWordList(readTextFile(path));
        logger.debug({ path, words: items.length }, 'Loaded word list');

        for (const item of items) {
            const existing = merged.get(item.word);
            if (!existing) {
                merged.set(item.word, { ...item });
            } else if (!existing.translation && item.translation) {
                existing.translation = item.translation;
            }
        }
    }

    logger.info({ files: paths.length, words: merged.size }, 'Word lists loaded');
    return Array.from(merged.values());
}

const EXAMPLE_WORDS = ['Haus', 'Katze', 'Hund', 'Wasser', 'Brot', 'Schule', 'Arbeit', 'Familie', 'Freund', 'Stadt'];

/**
 * Content of the starter word list written by `deckminer example`.
 */
export function exampleWordList(): string {
    return [
        '# German word list',
        '# One word per line, optionally followed by a tab and a translation',
        '# Lines starting with # are comments',
        '',
        ...EXAMPLE_WORDS,
        '',
    ].join('\n');
}
