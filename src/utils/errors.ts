/**
 * Raised when an input file (corpus, word list, frequency document, stop-word
 * list) is missing, unreadable or cannot be parsed. Aborts the run.
 */
export class InputFileError extends Error {
    readonly path: string;

    constructor(path: string, message: string, options?: { cause?: unknown }) {
        super(`${message}: ${path}`, options);
        this.name = 'InputFileError';
        this.path = path;
    }
}

/**
 * Short human-readable reason for a failed fs call.
 */
export function describeFsError(error: unknown): string {
    if (error instanceof Error && 'code' in error) {
        switch (error.code) {
            case 'ENOENT':
                return 'File not found';
            case 'EACCES':
            case 'EPERM':
                return 'Permission denied';
            case 'EISDIR':
                return 'Expected a file but found a directory';
        }
    }
    return 'Could not read file';
}
