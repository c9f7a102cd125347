import { FrequencyTable } from '../analysis/frequency.js';
import { InputFileError } from '../utils/errors.js';
import { readTextFile } from './utils.js';

const TOKEN_PATTERN = /^[\p{L}\p{M}]+$/u;

/**
 * Parse the structured `{ token: count }` report back into a table.
 * Key order in the document is taken as encounter order for tie-breaks.
 * Keys must be letter-only tokens, as `analyze` writes them.
 */
export function parseFrequencyDocument(content: string): FrequencyTable {
    const parsed: unknown = JSON.parse(content);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new Error('Frequency document must be a JSON object of word counts');
    }

    const pairs: [string, number][] = [];
    const entries: [string, unknown][] = Object.entries(parsed);
    for (const [token, count] of entries) {
        if (!TOKEN_PATTERN.test(token)) {
            throw new Error(`Invalid token "${token}"`);
        }
        if (typeof count !== 'number' || !Number.isInteger(count) || count < 1) {
            throw new Error(`Invalid count for "${token}"`);
        }
        pairs.push([token.toLowerCase(), count]);
    }

    return FrequencyTable.fromEntries(pairs);
}

/**
 * Load a frequency document written by `analyze`.
 */
export function loadFrequencyJson(path: string): FrequencyTable {
    const content = readTextFile(path);
    try {
        return parseFrequencyDocument(content);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new InputFileError(path, `Invalid frequency document (${reason})`, { cause: error });
    }
}
