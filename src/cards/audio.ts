export type AudioKind = 'word' | 'phrase';

/**
 * Hands out audio file names for `[sound:...]` placeholders.
 * Names must be unique within a run.
 */
export interface AudioNamer {
    next(word: string, kind: AudioKind): string;
}

/**
 * Reduce a word to something safe inside `[sound:...]` and on a filesystem.
 */
export function audioStem(word: string): string {
    const stem = word
        .toLowerCase()
        .replace(/[^\p{L}\p{N}]+/gu, '_')
        .replace(/^_+|_+$/g, '');
    return stem || 'audio';
}

/**
 * Names files `<stem>_<n>.mp3` / `phrase_<stem>_<n>.mp3` with a counter that
 * starts at `seed` and goes up by one per name. Same seed, same names.
 */
export class SequenceAudioNamer implements AudioNamer {
    private counter: number;

    constructor(seed = 1) {
        this.counter = seed;
    }

    next(word: string, kind: AudioKind): string {
        const n = this.counter++;
        const stem = audioStem(word);
        return kind === 'phrase' ? `phrase_${stem}_${n}.mp3` : `${stem}_${n}.mp3`;
    }
}

export function soundTag(fileName: string): string {
    return `[sound:${fileName}]`;
}
