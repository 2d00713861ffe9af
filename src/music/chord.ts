import { ResultLast, yieldLast, reject } from '../combinators';
import { mod } from '../utils';
import { Notation, Note, matchNote, spellNote, isNotation } from './notation';

export type Chord = {
    notation: Notation,
    root: Note,
    suffix: string,
    bass?: Note,
};

export const maxTransposition = 127;

export function parseChord(text: string, notation: Notation): ResultLast<Chord> {
    const token = text.trim();
    if (token.length === 0 || /\s/.test(token)) {
        return reject(chordSyntaxError(notation, text));
    }

    const root = matchNote(token, notation);
    if (root === undefined) {
        return reject(chordSyntaxError(notation, text));
    }

    const rest = token.substring(root.length);
    const slash = rest.lastIndexOf('/');
    if (slash >= 0) {
        const bass = parseBass(rest.substring(slash + 1), notation);
        if (bass !== undefined) {
            return yieldLast({
                notation,
                root: root.note,
                suffix: rest.substring(0, slash),
                bass,
            });
        }
    }

    return yieldLast({
        notation,
        root: root.note,
        suffix: rest,
    });
}

function parseBass(text: string, notation: Notation): Note | undefined {
    const match = matchNote(text, notation);
    return match !== undefined && match.length === text.length
        ? match.note
        : undefined;
}

function chordSyntaxError(notation: Notation, found: string) {
    return {
        diag: 'syntax-error' as const,
        expected: `chord in ${notation} notation`,
        found,
    };
}

export function chordToString(chord: Chord): string {
    const root = spellNote(chord.root, chord.notation);
    const bass = chord.bass !== undefined
        ? `/${spellNote(chord.bass, chord.notation)}`
        : '';
    return `${root}${chord.suffix}${bass}`;
}

export function transpose(chord: Chord, semitones: number): ResultLast<Chord> {
    if (!Number.isInteger(semitones) || Math.abs(semitones) > maxTransposition) {
        return reject({ diag: 'invalid-transposition', semitones });
    }
    const delta = mod(semitones, 12);
    if (delta === 0) {
        return yieldLast(chord);
    }

    return yieldLast({
        ...chord,
        root: transposeNote(chord.root, delta),
        bass: chord.bass && transposeNote(chord.bass, delta),
    });
}

function transposeNote(note: Note, delta: number): Note {
    return {
        ...note,
        pitch: mod(note.pitch + delta, 12),
    };
}

export function convertNotation(chord: Chord, target: string): ResultLast<Chord> {
    if (!isNotation(target)) {
        return reject({ diag: 'unsupported-notation', name: target });
    }
    return chord.notation === target
        ? yieldLast(chord)
        : yieldLast({ ...chord, notation: target });
}
