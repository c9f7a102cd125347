import { readFileSync } from 'node:fs';
import { InputFileError, describeFsError } from '../utils/errors.js';

/**
 * Shared helpers for the file readers.
 */

/**
 * Read a UTF-8 input file, stripping a leading BOM.
 * Any fs failure becomes an `InputFileError`; nothing is retried.
 */
export function readTextFile(path: string): string {
    let content: string;
    try {
        content = readFileSync(path, 'utf-8');
    } catch (error) {
        throw new InputFileError(path, describeFsError(error), { cause: error });
    }
    return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
}

/**
 * Split file content into lines, accepting both LF and CRLF endings.
 */
export function splitLines(content: string): string[] {
    return content.split(/\r?\n/);
}

/**
 * True for lines that carry no data: blanks and `#` comments/directives.
 */
export function isSkippableLine(line: string): boolean {
    return line.startsWith('#') || line.trim().length === 0;
}
