/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Flashcard layouts the synthesizer can produce.
 */
export type CardType = 'plain' | 'word' | 'phrase' | 'question';

/**
 * Sentence-template families used for practice phrases.
 */
export type PhraseCategory = 'declarative' | 'interrogative' | 'contextual';

/**
 * Languages with a bundled stop-word list.
 */
export type StopWordLanguage = 'de';

export const CARD_TYPES: readonly CardType[] = ['plain', 'word', 'phrase', 'question'];
export const PHRASE_CATEGORIES: readonly PhraseCategory[] = ['declarative', 'interrogative', 'contextual'];
export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Full deckminer configuration merged from CLI flags, env vars, and config file.
 */
export interface DeckMinerConfig {
    // Output
    outputDir: string;

    // Reporting
    topN: number;
    vizTopN: number;
    barWidth: number;

    // Stop words
    language: StopWordLanguage;
    stopwordsFile?: string;
    extraStopwords: string[];

    // Cards
    cardType: CardType;
    includePhrases: boolean;
    phraseCategory: PhraseCategory;
    phrasesPerWord: number;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: DeckMinerConfig = {
    outputDir: '.',
    topN: 50,
    vizTopN: 30,
    barWidth: 50,
    language: 'de',
    extraStopwords: [],
    cardType: 'plain',
    includePhrases: false,
    phraseCategory: 'declarative',
    phrasesPerWord: 2,
    logLevel: 'info',
    jsonLogs: false,
};
