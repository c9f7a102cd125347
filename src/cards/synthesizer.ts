import type { FrequencyTable } from '../analysis/frequency.js';
import {
    CARD_TYPES,
    PHRASE_CATEGORIES,
    type CardRecord,
    type CardType,
    type PhraseCategory,
    type VocabularyItem,
} from '../types/index.js';
import { SequenceAudioNamer, soundTag, type AudioNamer } from './audio.js';
import { generatePhrases, PHRASE_TEMPLATES } from './phrases.js';

/**
 * Map a user-supplied selector to a card type. `simple` is the historical
 * name of `plain`; anything unrecognised also becomes `plain`.
 */
export function parseCardType(value: string | undefined): CardType {
    const normalized = value?.trim().toLowerCase();
    if (normalized === 'simple') return 'plain';
    return CARD_TYPES.find((t) => t === normalized) ?? 'plain';
}

export function parsePhraseCategory(value: string | undefined): PhraseCategory {
    const normalized = value?.trim().toLowerCase();
    return PHRASE_CATEGORIES.find((c) => c === normalized) ?? 'declarative';
}

/**
 * Build one card. A missing translation never fails: the back falls back to
 * a placeholder naming the word (empty for `plain`).
 */
export function createCard(
    text: string,
    cardType: CardType,
    audioFile: string,
    translation?: string
): CardRecord {
    const sound = soundTag(audioFile);

    switch (cardType) {
        case 'word':
            return {
                front: `${text} ${sound}`,
                back: translation || `Translation for: ${text}`,
            };
        case 'phrase':
            return {
                front: `<strong>${text}</strong> ${sound}`,
                back: translation ? `<div>${translation}</div>` : `Practice phrase with: ${text}`,
            };
        case 'question':
            return {
                front: `<strong>Was bedeutet '${text}'?</strong> ${sound}`,
                back: translation || `Meaning of: ${text}`,
            };
        case 'plain':
        default:
            return {
                front: `${text} ${sound}`,
                back: translation ?? '',
            };
    }
}

export interface SynthesisOptions {
    /** Card type selector; unknown values fall back to `plain`. */
    cardType?: string;
    includePhrases?: boolean;
    phraseCategory?: PhraseCategory;
    /** Capped at the number of templates in the category. */
    phrasesPerWord?: number;
    audioNamer?: AudioNamer;
}

export const DEFAULT_PHRASES_PER_WORD = 2;

/**
 * Turn words into cards: one card per word in the chosen layout, each
 * optionally followed by practice-phrase cards (always `phrase` layout).
 */
export function synthesizeCards(
    items: readonly VocabularyItem[],
    options: SynthesisOptions = {}
): CardRecord[] {
    const cardType = parseCardType(options.cardType);
    const category = options.phraseCategory ?? 'declarative';
    const namer = options.audioNamer ?? new SequenceAudioNamer();
    const phraseLimit = Math.min(
        Math.max(0, options.phrasesPerWord ?? DEFAULT_PHRASES_PER_WORD),
        PHRASE_TEMPLATES[category].length
    );

    const cards: CardRecord[] = [];

    for (const { word, translation } of items) {
        cards.push(createCard(word, cardType, namer.next(word, 'word'), translation));

        if (!options.includePhrases) continue;

        for (const phrase of generatePhrases(word, category, phraseLimit)) {
            cards.push(createCard(phrase, 'phrase', namer.next(word, 'phrase')));
        }
    }

    return cards;
}

/**
 * The `n` highest-ranked words of a frequency table.
 */
export function wordsFromTable(table: FrequencyTable, n: number): VocabularyItem[] {
    return table.topN(n).map(({ token }) => ({ word: token }));
}
