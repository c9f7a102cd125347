import { readFileSync } from 'node:fs';
import GERMAN_STOPWORD_LIST from './stopwords-de.json' with { type: 'json' };
import type { StopWordLanguage } from '../types/index.js';
import { InputFileError, describeFsError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Hand-curated German closed-class words: articles, pronouns and
 * possessives, determiners, prepositions, conjunctions, auxiliary and modal
 * verb forms, and high-frequency adverbs. No statistical cutoff.
 */
export const GERMAN_STOPWORDS: ReadonlySet<string> = new Set(GERMAN_STOPWORD_LIST);

const BUNDLED: Record<StopWordLanguage, ReadonlySet<string>> = {
    de: GERMAN_STOPWORDS,
};

export interface StopWordOptions {
    language?: StopWordLanguage;
    /** Replaces the bundled list entirely. */
    file?: string;
    extra?: readonly string[];
}

/**
 * Parse a stop-word file: either a JSON array of strings, or plain text
 * with one word per line and `#` comments.
 */
export function parseStopWordList(content: string): string[] {
    const trimmed = content.trim();

    if (trimmed.startsWith('[')) {
        const parsed: unknown = JSON.parse(trimmed);
        if (!Array.isArray(parsed) || !parsed.every((w): w is string => typeof w === 'string')) {
            throw new Error('Stop-word JSON must be an array of strings');
        }
        return parsed.map((w) => w.trim().toLowerCase()).filter((w) => w.length > 0);
    }

    return trimmed
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0 && !line.startsWith('#'))
        .map((line) => line.toLowerCase());
}

/**
 * Build the stop-word set for one run. Called once at startup; the result
 * is read-only and shared by every stage.
 */
export function loadStopWords(options: StopWordOptions = {}): ReadonlySet<string> {
    const { language = 'de', file, extra = [] } = options;

    let base: Iterable<string> = BUNDLED[language];

    if (file) {
        let content: string;
        try {
            content = readFileSync(file, 'utf-8');
        } catch (error) {
            throw new InputFileError(file, describeFsError(error), { cause: error });
        }

        try {
            base = parseStopWordList(content);
        } catch (error) {
            throw new InputFileError(file, 'Invalid stop-word list', { cause: error });
        }
    }

    const stopwords = new Set(base);
    for (const word of extra) {
        stopwords.add(word.toLowerCase());
    }

    getLogger().debug({ language, file, size: stopwords.size }, 'Stop words loaded');
    return stopwords;
}
