import type { PhraseCategory } from '../types/index.js';

/**
 * Practice-sentence templates, keyed by category. `{word}` marks the slot.
 * Adding a category or language means adding rows here, nothing else.
 */
export const PHRASE_TEMPLATES: Readonly<Record<PhraseCategory, readonly string[]>> = {
    declarative: [
        'Das ist {word}.',
        'Ich habe {word}.',
        'Wo ist {word}?',
        'Das {word} ist hier.',
    ],
    interrogative: [
        'Was ist {word}?',
        'Wie sagt man {word} auf Englisch?',
        'Wo kann ich {word} finden?',
        'Wann brauche ich {word}?',
    ],
    contextual: [
        'Ich suche {word}.',
        'Kannst du mir {word} geben?',
        'Das {word} gefällt mir.',
        'Ich möchte {word} lernen.',
    ],
};

export function renderTemplate(template: string, word: string): string {
    return template.split('{word}').join(word);
}

/**
 * Up to `limit` practice sentences for `word`, in template order.
 */
export function generatePhrases(word: string, category: PhraseCategory, limit: number): string[] {
    return PHRASE_TEMPLATES[category]
        .slice(0, Math.max(0, limit))
        .map((template) => renderTemplate(template, word));
}
