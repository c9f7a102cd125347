const SOUND_TAG = /\[sound:[^\]]*\]/g;
const BRACKETED = /\[[^\]]*\]/g;
const HTML_TAG = /<[^>]*>/g;
const HTML_ENTITY = /&(?:[a-z]+|#\d+|#x[0-9a-f]+);/gi;
const NON_LETTER = /[^\p{L}\p{M}\s]/gu;
const WHITESPACE = /\s+/g;

/**
 * Clean one raw deck field down to letters and single spaces.
 *
 * Order matters: `[sound:...]` references go first so the generic bracket
 * pass (phonetic transcriptions like `[ˈhaʊ̯s]`) never sees them. Digits and
 * punctuation become spaces, so `Haus,Hof` yields two words.
 */
export function normalizeField(raw: string): string {
    if (!raw) return '';

    return raw
        .normalize('NFC')
        .replace(SOUND_TAG, ' ')
        .replace(BRACKETED, ' ')
        .replace(HTML_TAG, ' ')
        .replace(HTML_ENTITY, ' ')
        .replace(NON_LETTER, ' ')
        .replace(WHITESPACE, ' ')
        .trim();
}
