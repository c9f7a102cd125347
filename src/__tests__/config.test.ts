import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { loadEnvVars, resolveConfig, sanitizeConfig } from '../utils/config.js';
import { CARD_TYPES, DEFAULT_CONFIG, PHRASE_CATEGORIES } from '../types/index.js';

describe('Types', () => {
    it('should have 4 card types', () => {
        expect(CARD_TYPES).toEqual(['plain', 'word', 'phrase', 'question']);
    });

    it('should have 3 phrase categories', () => {
        expect(PHRASE_CATEGORIES).toEqual(['declarative', 'interrogative', 'contextual']);
    });

    describe('DEFAULT_CONFIG', () => {
        it('should use the German stop words', () => {
            expect(DEFAULT_CONFIG.language).toBe('de');
        });

        it('should take the top 50 words for decks', () => {
            expect(DEFAULT_CONFIG.topN).toBe(50);
        });

        it('should cap practice phrases at 2 per word', () => {
            expect(DEFAULT_CONFIG.phrasesPerWord).toBe(2);
            expect(DEFAULT_CONFIG.includePhrases).toBe(false);
        });

        it('should default to plain cards', () => {
            expect(DEFAULT_CONFIG.cardType).toBe('plain');
        });
    });
});

describe('sanitizeConfig', () => {
    it('should keep valid keys and drop the rest', () => {
        expect(sanitizeConfig({ topN: 10, cardType: 'question', bogus: 1, barWidth: -3, includePhrases: 'yes' }))
            .toEqual({ topN: 10, cardType: 'question' });
    });

    it('should lowercase extra stop words', () => {
        expect(sanitizeConfig({ extraStopwords: ['Foo', 'bar'] })).toEqual({ extraStopwords: ['foo', 'bar'] });
    });

    it('should ignore non-object configs', () => {
        expect(sanitizeConfig('nope')).toEqual({});
        expect(sanitizeConfig([1, 2])).toEqual({});
    });
});

describe('loadEnvVars', () => {
    it('should read log level and output directory', () => {
        expect(loadEnvVars({ DECKMINER_LOG_LEVEL: 'debug', DECKMINER_OUTPUT_DIR: 'out' }))
            .toEqual({ logLevel: 'debug', outputDir: 'out' });
    });

    it('should ignore an unknown log level', () => {
        expect(loadEnvVars({ DECKMINER_LOG_LEVEL: 'loud' })).toEqual({});
    });
});

describe('resolveConfig', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'deckminer-config-'));
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should fall back to defaults without a config file', async () => {
        const config = await resolveConfig({}, { searchFrom: tmpDir, env: {} });
        expect(config).toEqual(DEFAULT_CONFIG);
    });

    it('should apply CLI > env > file > defaults precedence', async () => {
        fs.writeFileSync(
            path.join(tmpDir, 'deckminer.config.json'),
            JSON.stringify({ topN: 20, cardType: 'word', outputDir: 'file-out', extraStopwords: ['foo'] })
        );

        const config = await resolveConfig(
            { topN: 5, cardType: undefined, extraStopwords: ['bar'] },
            { searchFrom: tmpDir, env: { DECKMINER_OUTPUT_DIR: 'env-out' } }
        );

        expect(config.topN).toBe(5);
        expect(config.cardType).toBe('word');
        expect(config.outputDir).toBe('env-out');
        expect(config.extraStopwords).toEqual(['foo', 'bar']);
        expect(config.barWidth).toBe(DEFAULT_CONFIG.barWidth);
    });
});
