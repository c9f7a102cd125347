import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { CardRecord } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

export const DECK_HEADER = ['#separator:tab', '#html:true'] as const;

/**
 * Render cards in Anki's plain-text import format: two header directives,
 * then `front<TAB>back` per card, every line newline-terminated.
 *
 * Fronts or backs containing a tab or newline cannot round-trip; they are
 * written unchanged and reported.
 */
export function serializeDeck(cards: readonly CardRecord[]): string {
    const unsafe = cards.filter((c) => /[\t\r\n]/.test(c.front) || /[\t\r\n]/.test(c.back)).length;
    if (unsafe > 0) {
        getLogger().warn({ cards: unsafe }, 'Some cards contain tabs or line breaks and will not import cleanly');
    }

    const lines = [...DECK_HEADER, ...cards.map((c) => `${c.front}\t${c.back}`)];
    return lines.map((line) => `${line}\n`).join('');
}

/**
 * Read a deck file's cards back, splitting each data line on its first tab.
 * Only the leading `#` directive block is header; later lines starting with
 * `#` are cards.
 */
export function parseDeck(content: string): CardRecord[] {
    const cards: CardRecord[] = [];
    let inHeader = true;
    for (const line of content.split('\n')) {
        if (inHeader && line.startsWith('#')) continue;
        inHeader = false;
        if (!line) continue;

        const tab = line.indexOf('\t');
        cards.push(
            tab === -1
                ? { front: line, back: '' }
                : { front: line.slice(0, tab), back: line.slice(tab + 1) }
        );
    }
    return cards;
}

/**
 * Write a deck file, creating the parent directory if needed.
 */
export function writeDeck(cards: readonly CardRecord[], outputPath: string): void {
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, serializeDeck(cards), 'utf-8');
    getLogger().info({ outputPath, cards: cards.length }, 'Deck written');
}
