import type { FrequencyTable } from '../analysis/frequency.js';
import { SequenceAudioNamer } from '../cards/audio.js';
import { synthesizeCards, wordsFromTable } from '../cards/synthesizer.js';
import { writeDeck } from '../exporters/deck.js';
import { loadFrequencyJson } from '../sources/frequency-json.js';
import { loadWordLists } from '../sources/word-list.js';
import type { CardRecord, DeckMinerConfig, VocabularyItem } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * Where the deck's words come from.
 */
export type WordSource =
    | { kind: 'table'; table: FrequencyTable }
    | { kind: 'frequency-json'; path: string }
    | { kind: 'word-lists'; paths: readonly string[] };

export type DeckOptions = Pick<
    DeckMinerConfig,
    'topN' | 'cardType' | 'includePhrases' | 'phraseCategory' | 'phrasesPerWord'
> & {
    /** First audio sequence number. */
    audioSeed: number;
};

function resolveWords(source: WordSource, topN: number): VocabularyItem[] {
    switch (source.kind) {
        case 'table':
            return wordsFromTable(source.table, topN);
        case 'frequency-json':
            return wordsFromTable(loadFrequencyJson(source.path), topN);
        case 'word-lists':
            return loadWordLists(source.paths);
    }
}

/**
 * Load words, synthesize cards and write the deck file.
 * Frequency sources are cut to the top `topN` words; word lists are used whole.
 */
export function buildDeck(source: WordSource, outputPath: string, options: DeckOptions): CardRecord[] {
    const words = resolveWords(source, options.topN);

    const cards = synthesizeCards(words, {
        cardType: options.cardType,
        includePhrases: options.includePhrases,
        phraseCategory: options.phraseCategory,
        phrasesPerWord: options.phrasesPerWord,
        audioNamer: new SequenceAudioNamer(options.audioSeed),
    });

    writeDeck(cards, outputPath);
    getLogger().info(
        { source: source.kind, words: words.length, cards: cards.length, cardType: options.cardType },
        'Deck generated'
    );

    return cards;
}
