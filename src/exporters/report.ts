import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { FrequencyEntry, FrequencyTable } from '../analysis/frequency.js';
import { getLogger } from '../utils/logger.js';

// ─── Types ───────────────────────────────────────────────

export interface FrequencyStats {
    totalOccurrences: number;
    uniqueTokens: number;
    /** Occurrences per unique token; 0 for an empty table. */
    averageFrequency: number;
    /** Tokens seen exactly once. */
    hapaxCount: number;
    /** Share of unique tokens that are hapaxes, 0–100; 0 for an empty table. */
    hapaxPercentage: number;
    mostFrequent: FrequencyEntry | null;
}

export interface ReportOptions {
    /** How many entries the bar chart shows. */
    vizTopN?: number;
    barWidth?: number;
    /** Write the bar-chart file as well. */
    viz?: boolean;
}

export interface ReportPaths {
    text: string;
    json: string;
    csv: string;
    viz?: string;
}

export const REPORT_BASENAME = 'word_frequency';
export const DEFAULT_BAR_WIDTH = 50;

const RULE = '='.repeat(40);
const THIN_RULE = '-'.repeat(40);
const WIDE_RULE = '='.repeat(60);

// ─── Statistics ──────────────────────────────────────────

export function summarizeFrequencies(table: FrequencyTable): FrequencyStats {
    const uniqueTokens = table.size;
    const totalOccurrences = table.total;
    const hapaxCount = table.entries().filter((e) => e.count === 1).length;

    return {
        totalOccurrences,
        uniqueTokens,
        averageFrequency: uniqueTokens === 0 ? 0 : totalOccurrences / uniqueTokens,
        hapaxCount,
        hapaxPercentage: uniqueTokens === 0 ? 0 : (hapaxCount / uniqueTokens) * 100,
        mostFrequent: table.topN(1)[0] ?? null,
    };
}

function formatInt(n: number): string {
    return n.toLocaleString('en-US');
}

// ─── Renderers ───────────────────────────────────────────

/**
 * Full ranked listing with totals, average and hapax share.
 */
export function renderTextReport(table: FrequencyTable): string {
    const stats = summarizeFrequencies(table);

    const lines = [
        'Word Frequency Analysis',
        RULE,
        '',
        `Total unique words: ${stats.uniqueTokens}`,
        `Total word occurrences: ${stats.totalOccurrences}`,
        `Average frequency: ${stats.averageFrequency.toFixed(2)}`,
        `Words appearing only once: ${stats.hapaxCount} (${stats.hapaxPercentage.toFixed(1)}%)`,
        '',
        'Word Frequency (Most to Least Used):',
        THIN_RULE,
        ...table.entries().map((e, i) =>
            `${String(i + 1).padStart(4)}. ${e.token.padEnd(20)} : ${String(e.count).padStart(4)}`
        ),
    ];

    return lines.map((line) => `${line}\n`).join('');
}

/**
 * `{ token: count }` in rank order, readable back by `loadFrequencyJson`.
 */
export function renderFrequencyJson(table: FrequencyTable): string {
    return JSON.stringify(table.toJSON(), null, 2) + '\n';
}

function csvField(value: string): string {
    return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function renderFrequencyCsv(table: FrequencyTable): string {
    let csv = 'Word,Frequency\n';
    for (const { token, count } of table.entries()) {
        csv += `${csvField(token)},${count}\n`;
    }
    return csv;
}

/**
 * One `word |████░░░░| count` line per entry. Bars scale to the largest
 * count in `entries`, so the first row of a ranked slice is always full.
 */
export function renderBarLines(entries: readonly FrequencyEntry[], width = DEFAULT_BAR_WIDTH): string[] {
    const maxCount = Math.max(0, ...entries.map((e) => e.count));
    if (maxCount === 0) return [];

    return entries.map(({ token, count }) => {
        const filled = Math.min(width, Math.round((count / maxCount) * width));
        const bar = '█'.repeat(filled) + '░'.repeat(width - filled);
        return `${token.padEnd(15)} |${bar}| ${String(count).padStart(4)}`;
    });
}

export function renderBarChart(entries: readonly FrequencyEntry[], width = DEFAULT_BAR_WIDTH): string {
    const lines = [
        'Word Frequency Visualization',
        WIDE_RULE,
        '',
        'Text-based bar chart (bar length represents frequency):',
        '',
        ...renderBarLines(entries, width),
    ];
    return lines.map((line) => `${line}\n`).join('');
}

/**
 * Console summary: headline numbers plus the top `n` words.
 */
export function renderSummary(table: FrequencyTable, n: number): string {
    const stats = summarizeFrequencies(table);
    const top = table.topN(n);

    const lines = [
        WIDE_RULE,
        'WORD FREQUENCY ANALYSIS SUMMARY',
        WIDE_RULE,
        `Total word occurrences: ${formatInt(stats.totalOccurrences)}`,
        `Unique words: ${formatInt(stats.uniqueTokens)}`,
        `Average frequency: ${stats.averageFrequency.toFixed(2)}`,
        stats.mostFrequent
            ? `Most frequent word: '${stats.mostFrequent.token}' (${stats.mostFrequent.count} times)`
            : 'Most frequent word: none',
        `Words appearing only once: ${formatInt(stats.hapaxCount)} (${stats.hapaxPercentage.toFixed(1)}%)`,
    ];

    if (top.length > 0) {
        lines.push(
            '',
            `Top ${top.length} Most Frequent Words:`,
            THIN_RULE,
            ...top.map((e, i) => `${String(i + 1).padStart(2)}. ${e.token.padEnd(15)} : ${String(e.count).padStart(4)}`)
        );
    }

    return lines.join('\n');
}

// ─── File output ─────────────────────────────────────────

/**
 * Write the text, JSON and CSV reports (plus the bar chart unless disabled)
 * into `outputDir`.
 */
export function writeReports(
    table: FrequencyTable,
    outputDir: string,
    options: ReportOptions = {}
): ReportPaths {
    const { vizTopN = 30, barWidth = DEFAULT_BAR_WIDTH, viz = true } = options;

    mkdirSync(outputDir, { recursive: true });

    const paths: ReportPaths = {
        text: join(outputDir, `${REPORT_BASENAME}.txt`),
        json: join(outputDir, `${REPORT_BASENAME}.json`),
        csv: join(outputDir, `${REPORT_BASENAME}.csv`),
    };

    writeFileSync(paths.text, renderTextReport(table), 'utf-8');
    writeFileSync(paths.json, renderFrequencyJson(table), 'utf-8');
    writeFileSync(paths.csv, renderFrequencyCsv(table), 'utf-8');

    if (viz) {
        paths.viz = join(outputDir, `${REPORT_BASENAME}_viz.txt`);
        writeFileSync(paths.viz, renderBarChart(table.topN(vizTopN), barWidth), 'utf-8');
    }

    getLogger().info({ outputDir, words: table.size, viz }, 'Reports written');
    return paths;
}
