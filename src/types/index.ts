/**
 * Barrel export for all shared types.
 */
export type { CardRecord, VocabularyItem } from './card.js';
export { DEFAULT_CONFIG, CARD_TYPES, PHRASE_CATEGORIES, LOG_LEVELS } from './config.js';
export type {
    DeckMinerConfig,
    LogLevel,
    CardType,
    PhraseCategory,
    StopWordLanguage,
} from './config.js';
