#!/usr/bin/env node
import { existsSync, writeFileSync } from 'node:fs';
import { Command, InvalidArgumentError } from 'commander';
import { analyzeCorpusFile } from '../builder/analysis-builder.js';
import { buildDeck, type DeckOptions, type WordSource } from '../builder/deck-builder.js';
import { parseCardType, parsePhraseCategory } from '../cards/synthesizer.js';
import { renderBarLines, renderSummary, writeReports } from '../exporters/report.js';
import { loadStopWords } from '../nlp/stopwords.js';
import { exampleWordList } from '../sources/word-list.js';
import { LOG_LEVELS, type DeckMinerConfig, type LogLevel } from '../types/index.js';
import { resolveConfig } from '../utils/config.js';
import { InputFileError } from '../utils/errors.js';
import { getLogger, initLogger } from '../utils/logger.js';

const VERSION = '1.0.0';

// ─── Option parsing ──────────────────────────────────────

function positiveInt(value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n) || n < 1) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return n;
}

function nonNegativeInt(value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n) || n < 0) {
        throw new InvalidArgumentError('Expected a non-negative integer.');
    }
    return n;
}

function logLevel(value: string): LogLevel {
    const level = LOG_LEVELS.find((l) => l === value);
    if (!level) {
        throw new InvalidArgumentError(`Expected one of: ${LOG_LEVELS.join(', ')}.`);
    }
    return level;
}

interface CardFlags {
    topN?: number;
    cardType?: string;
    includePhrases?: boolean;
    phraseCategory?: string;
    phrasesPerWord?: number;
    audioSeed?: number;
}

interface CommonFlags {
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

interface AnalyzeFlags extends CardFlags, CommonFlags {
    outputDir?: string;
    vizTopN?: number;
    barWidth?: number;
    stopwords?: string;
    extraStopwords?: string[];
    viz: boolean;
    deck?: string;
}

interface GenerateFlags extends CardFlags, CommonFlags {
    frequencyJson?: string;
    wordList?: string[];
    output: string;
}

function cardConfig(flags: CardFlags): Partial<DeckMinerConfig> {
    return {
        topN: flags.topN,
        cardType: flags.cardType === undefined ? undefined : parseCardType(flags.cardType),
        includePhrases: flags.includePhrases,
        phraseCategory: flags.phraseCategory === undefined ? undefined : parsePhraseCategory(flags.phraseCategory),
        phrasesPerWord: flags.phrasesPerWord,
    };
}

function deckOptions(config: DeckMinerConfig, flags: CardFlags): DeckOptions {
    return {
        topN: config.topN,
        cardType: config.cardType,
        includePhrases: config.includePhrases,
        phraseCategory: config.phraseCategory,
        phrasesPerWord: config.phrasesPerWord,
        // Millisecond seed keeps media names distinct across runs.
        audioSeed: flags.audioSeed ?? Date.now(),
    };
}

function addCardOptions(command: Command): Command {
    return command
        .option('-n, --top-n <n>', 'Number of top frequent words to turn into cards', positiveInt)
        .option('--card-type <type>', 'Card layout: plain | word | phrase | question')
        .option('--include-phrases', 'Add practice-phrase cards for each word')
        .option('--phrase-category <category>', 'Phrase templates: declarative | interrogative | contextual')
        .option('--phrases-per-word <n>', 'Practice phrases per word (max 4)', nonNegativeInt)
        .option('--audio-seed <n>', 'First number of the audio file sequence', nonNegativeInt);
}

function addCommonOptions(command: Command): Command {
    return command
        .option('--log-level <level>', 'Log level: debug | info | warn | error', logLevel)
        .option('--json-logs', 'Output JSON logs');
}

/**
 * Report a failed command and exit. Input file problems get a one-line
 * diagnostic; anything else is logged with its stack.
 */
function fail(action: string, error: unknown): never {
    const logger = getLogger();
    if (error instanceof InputFileError) {
        logger.error({ path: error.path }, error.message);
    } else {
        logger.error({ err: error }, `${action} failed`);
    }
    process.exit(1);
}

// ─── Program ─────────────────────────────────────────────

const program: Command = new Command();

program
    .name('deckminer')
    .description('Rank the vocabulary of a flashcard export and build new decks from the most frequent words.')
    .version(VERSION);

// ─── ANALYZE command ─────────────────────────────────────

addCommonOptions(
    addCardOptions(
        program
            .command('analyze')
            .description('Count word frequencies in a tab-separated deck export')
            .argument('<input>', 'Deck export (tab-separated, field 0 is analyzed)')
            .option('-o, --output-dir <dir>', 'Directory for the report files')
            .option('--viz-top-n <n>', 'Words shown in the summary and bar chart', positiveInt)
            .option('--bar-width <n>', 'Bar chart width in characters', positiveInt)
            .option('--stopwords <file>', 'Replace the built-in stop words (JSON array or one per line)')
            .option('--extra-stopwords <words...>', 'Additional stop words')
            .option('--no-viz', 'Skip the bar chart file')
            .option('--deck <path>', 'Also write a deck built from the top words')
    )
).action(async (input: string, opts: AnalyzeFlags) => {
    const config = await resolveConfig({
        ...cardConfig(opts),
        outputDir: opts.outputDir,
        vizTopN: opts.vizTopN,
        barWidth: opts.barWidth,
        stopwordsFile: opts.stopwords,
        extraStopwords: opts.extraStopwords?.map((w) => w.toLowerCase()),
        logLevel: opts.logLevel,
        jsonLogs: opts.jsonLogs,
    });
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

    const logger = getLogger();
    logger.info({ input, outputDir: config.outputDir }, 'Starting analysis');

    try {
        const stopwords = loadStopWords({
            language: config.language,
            file: config.stopwordsFile,
            extra: config.extraStopwords,
        });

        const { table } = analyzeCorpusFile(input, stopwords);

        console.log(renderSummary(table, config.vizTopN));

        const paths = writeReports(table, config.outputDir, {
            vizTopN: config.vizTopN,
            barWidth: config.barWidth,
            viz: opts.viz,
        });

        if (opts.viz && table.size > 0) {
            console.log('\n' + renderBarLines(table.topN(config.vizTopN), config.barWidth).join('\n'));
        }

        console.log('\nReports:');
        for (const path of Object.values(paths)) {
            console.log(`  ${path}`);
        }

        if (opts.deck) {
            const cards = buildDeck({ kind: 'table', table }, opts.deck, deckOptions(config, opts));
            console.log(`\nDeck with ${cards.length} cards saved to: ${opts.deck}`);
        }
    } catch (error) {
        fail('Analysis', error);
    }
});

// ─── GENERATE command ────────────────────────────────────

addCommonOptions(
    addCardOptions(
        program
            .command('generate')
            .description('Generate a deck from a frequency report or word lists')
            .option('--frequency-json <file>', 'Frequency document written by `analyze`')
            .option('--word-list <files...>', 'Word list files (one word per line)')
            .option('-o, --output <path>', 'Output deck file', 'generated_deck.txt')
    )
).action(async (opts: GenerateFlags) => {
    const config = await resolveConfig({
        ...cardConfig(opts),
        logLevel: opts.logLevel,
        jsonLogs: opts.jsonLogs,
    });
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

    let source: WordSource;
    if (opts.frequencyJson && !opts.wordList) {
        source = { kind: 'frequency-json', path: opts.frequencyJson };
    } else if (opts.wordList && !opts.frequencyJson) {
        source = { kind: 'word-lists', paths: opts.wordList };
    } else {
        program.error('generate: pass exactly one of --frequency-json or --word-list');
    }

    try {
        const cards = buildDeck(source, opts.output, deckOptions(config, opts));

        console.log(`Generated ${cards.length} cards`);
        console.log(`Deck saved to: ${opts.output}`);
        console.log('\nNext steps:');
        console.log('1. Import the generated file into your flashcard app');
        console.log('2. Add audio files for the [sound:...] references');
        console.log('3. Fill in translations where the back is a placeholder');
    } catch (error) {
        fail('Deck generation', error);
    }
});

// ─── EXAMPLE command ─────────────────────────────────────

program
    .command('example')
    .description('Write an example word list')
    .argument('[file]', 'Output path', 'example_word_list.txt')
    .option('-f, --force', 'Overwrite an existing file')
    .action((file: string, opts: { force?: boolean }) => {
        if (existsSync(file) && !opts.force) {
            program.error(`${file} already exists (use --force to overwrite)`);
        }
        writeFileSync(file, exampleWordList(), 'utf-8');
        console.log(`Example word list created: ${file}`);
    });

await program.parseAsync();
