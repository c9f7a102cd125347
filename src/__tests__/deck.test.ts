import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { SequenceAudioNamer } from '../cards/audio.js';
import { synthesizeCards } from '../cards/synthesizer.js';
import { DECK_HEADER, parseDeck, serializeDeck, writeDeck } from '../exporters/deck.js';

describe('serializeDeck', () => {
    it('should start with the two header directives', () => {
        expect(DECK_HEADER).toEqual(['#separator:tab', '#html:true']);
        expect(serializeDeck([])).toBe('#separator:tab\n#html:true\n');
    });

    it('should write one newline-terminated line per card in order', () => {
        const content = serializeDeck([
            { front: 'haus [sound:haus_1.mp3]', back: 'house' },
            { front: 'katze [sound:katze_2.mp3]', back: '' },
        ]);
        expect(content).toBe(
            '#separator:tab\n' +
            '#html:true\n' +
            'haus [sound:haus_1.mp3]\thouse\n' +
            'katze [sound:katze_2.mp3]\t\n'
        );
    });
});

describe('parseDeck', () => {
    it('should round-trip synthesized cards', () => {
        const cards = synthesizeCards(
            [{ word: 'haus', translation: 'house' }, { word: 'katze' }, { word: 'straße' }],
            { cardType: 'phrase', includePhrases: true, audioNamer: new SequenceAudioNamer(10) }
        );
        expect(parseDeck(serializeDeck(cards))).toEqual(cards);
    });

    it('should round-trip every card type', () => {
        for (const cardType of ['plain', 'word', 'phrase', 'question']) {
            const cards = synthesizeCards([{ word: 'brot' }], { cardType });
            expect(parseDeck(serializeDeck(cards))).toEqual(cards);
        }
    });

    it('should keep cards whose front starts with a hash', () => {
        const cards = synthesizeCards([{ word: '#haus' }], { cardType: 'word' });
        expect(cards).toEqual([{ front: '#haus [sound:haus_1.mp3]', back: 'Translation for: #haus' }]);
        expect(parseDeck(serializeDeck(cards))).toEqual(cards);
    });

    it('should treat only the leading directive block as header', () => {
        const content = '#separator:tab\n#html:true\nhaus\thouse\n#notes:x\tkeep\n';
        expect(parseDeck(content)).toEqual([
            { front: 'haus', back: 'house' },
            { front: '#notes:x', back: 'keep' },
        ]);
    });

    it('should split on the first tab only', () => {
        expect(parseDeck('x\ty\tz\n')).toEqual([{ front: 'x', back: 'y\tz' }]);
    });

    it('should not round-trip a front containing a tab', () => {
        const parsed = parseDeck(serializeDeck([{ front: 'a\tb', back: 'c' }]));
        expect(parsed).toEqual([{ front: 'a', back: 'b\tc' }]);
    });
});

describe('writeDeck', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'deckminer-deck-'));
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should create missing directories and write the serialized deck', () => {
        const outPath = path.join(tmpDir, 'nested', 'deck.txt');
        const cards = [{ front: 'hund [sound:hund_1.mp3]', back: 'dog' }];

        writeDeck(cards, outPath);

        expect(fs.readFileSync(outPath, 'utf-8')).toBe('#separator:tab\n#html:true\nhund [sound:hund_1.mp3]\tdog\n');
    });
});
