/**
 * One front/back pair destined for a deck file.
 * Never mutated after the synthesizer creates it.
 */
export interface CardRecord {
    readonly front: string;
    readonly back: string;
}

/**
 * A word handed to the synthesizer, with an optional known translation.
 */
export interface VocabularyItem {
    word: string;
    translation?: string;
}
