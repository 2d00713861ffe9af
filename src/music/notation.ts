import { ResultLast, yieldLast, reject } from '../combinators';
import { equalsToOneOf, mod } from '../utils';

export const notations = ['english', 'german', 'nashville', 'roman'] as const;
export type Notation = typeof notations[number];

export type Accidental = 'sharp' | 'flat';

/**
 * A note of any notation system: a pitch class plus what is needed
 * to re-spell it the way it was written.
 */
export type Note = {
    pitch: number,
    accidental?: Accidental,
    lowercase?: boolean,
};

type SpellingTables = {
    sharp: string[],
    flat: string[],
    canonical: string[],
};

const spellings: { [n in Notation]: SpellingTables } = {
    english: {
        sharp: ['C', 'C#', 'D', 'D#', 'E', 'F', 'F#', 'G', 'G#', 'A', 'A#', 'B'],
        flat: ['C', 'Db', 'D', 'Eb', 'E', 'F', 'Gb', 'G', 'Ab', 'A', 'Bb', 'B'],
        canonical: ['C', 'C#', 'D', 'Eb', 'E', 'F', 'F#', 'G', 'Ab', 'A', 'Bb', 'B'],
    },
    german: {
        sharp: ['C', 'Cis', 'D', 'Dis', 'E', 'F', 'Fis', 'G', 'Gis', 'A', 'Ais', 'H'],
        flat: ['C', 'Des', 'D', 'Es', 'E', 'F', 'Ges', 'G', 'As', 'A', 'B', 'H'],
        canonical: ['C', 'Cis', 'D', 'Es', 'E', 'F', 'Fis', 'G', 'As', 'A', 'B', 'H'],
    },
    nashville: {
        sharp: ['1', '#1', '2', '#2', '3', '4', '#4', '5', '#5', '6', '#6', '7'],
        flat: ['1', 'b2', '2', 'b3', '3', '4', 'b5', '5', 'b6', '6', 'b7', '7'],
        canonical: ['1', 'b2', '2', 'b3', '3', '4', '#4', '5', 'b6', '6', 'b7', '7'],
    },
    roman: {
        sharp: ['I', '#I', 'II', '#II', 'III', 'IV', '#IV', 'V', '#V', 'VI', '#VI', 'VII'],
        flat: ['I', 'bII', 'II', 'bIII', 'III', 'IV', 'bV', 'V', 'bVI', 'VI', 'bVII', 'VII'],
        canonical: ['I', 'bII', 'II', 'bIII', 'III', 'IV', '#IV', 'V', 'bVI', 'VI', 'bVII', 'VII'],
    },
};

const englishLetters: { [letter: string]: number } = {
    C: 0, D: 2, E: 4, F: 5, G: 7, A: 9, B: 11,
};
const germanLetters: { [letter: string]: number } = {
    C: 0, D: 2, E: 4, F: 5, G: 7, A: 9, B: 10, H: 11,
};
const degrees: { [degree: string]: number } = {
    1: 0, 2: 2, 3: 4, 4: 5, 5: 7, 6: 9, 7: 11,
};
// Longest numerals first, so that 'IV' is not read as 'I' + 'V'
const numerals: Array<[string, number]> = [
    ['VII', 11], ['III', 4], ['VI', 9], ['IV', 5], ['II', 2], ['V', 7], ['I', 0],
];

export function isNotation(name: string): name is Notation {
    return equalsToOneOf(name, notations);
}

export function parseNotation(name: string): ResultLast<Notation> {
    const lower = name.trim().toLowerCase();
    return isNotation(lower)
        ? yieldLast(lower)
        : reject({ diag: 'unsupported-notation', name });
}

export function spellNote(note: Note, notation: Notation): string {
    const tables = spellings[notation];
    const table = note.accidental === 'sharp' ? tables.sharp
        : note.accidental === 'flat' ? tables.flat
            : tables.canonical;
    const spelled = table[note.pitch];
    return notation === 'roman' && note.lowercase
        ? spelled.toLowerCase()
        : spelled;
}

export type NoteMatch = {
    note: Note,
    length: number,
};

/**
 * Reads a note from the start of `text`. The rest of the text is left
 * for the caller (a chord suffix or nothing at all).
 */
export function matchNote(text: string, notation: Notation): NoteMatch | undefined {
    switch (notation) {
        case 'english':
            return matchEnglish(text);
        case 'german':
            return matchGerman(text);
        case 'nashville':
            return matchNashville(text);
        case 'roman':
            return matchRoman(text);
    }
}

function matchEnglish(text: string): NoteMatch | undefined {
    const match = text.match(/^([A-G])(#+|b+)?/);
    if (!match) {
        return undefined;
    }
    const [whole, letter, accidentals] = match;
    return {
        note: withAccidentals(englishLetters[letter], accidentals),
        length: whole.length,
    };
}

function matchGerman(text: string): NoteMatch | undefined {
    const letter = text[0];
    const base = letter !== undefined ? germanLetters[letter] : undefined;
    if (base === undefined) {
        return undefined;
    }

    let pos = 1;
    let shift = 0;
    let accidental: Accidental | undefined = letter === 'B' ? 'flat' : undefined;
    while (pos < text.length) {
        const rest = text.substring(pos);
        if (rest.startsWith('is')) {
            shift++;
            accidental = 'sharp';
            pos += 2;
        } else if (rest.startsWith('es')) {
            shift--;
            accidental = 'flat';
            pos += 2;
        } else if (pos === 1 && (letter === 'A' || letter === 'E') && rest.startsWith('s') && !rest.startsWith('sus')) {
            shift--;
            accidental = 'flat';
            pos += 1;
        } else {
            break;
        }
    }

    return {
        note: { pitch: normalizePitch(base + shift), accidental },
        length: pos,
    };
}

function matchNashville(text: string): NoteMatch | undefined {
    const match = text.match(/^(#+|b+)?([1-7])/);
    if (!match) {
        return undefined;
    }
    const [whole, accidentals, degree] = match;
    return {
        note: withAccidentals(degrees[degree], accidentals),
        length: whole.length,
    };
}

function matchRoman(text: string): NoteMatch | undefined {
    const prefix = text.match(/^(#+|b+)?/);
    const accidentals = prefix ? prefix[0] : '';
    const rest = text.substring(accidentals.length);
    for (const [numeral, pitch] of numerals) {
        for (const spelled of [numeral, numeral.toLowerCase()]) {
            if (rest.startsWith(spelled)) {
                const note = withAccidentals(pitch, accidentals);
                return {
                    note: spelled === numeral ? note : { ...note, lowercase: true },
                    length: accidentals.length + spelled.length,
                };
            }
        }
    }
    return undefined;
}

function withAccidentals(base: number, accidentals: string | undefined): Note {
    if (accidentals === undefined || accidentals.length === 0) {
        return { pitch: base };
    }
    const sharp = accidentals[0] === '#';
    const shift = sharp ? accidentals.length : -accidentals.length;
    return {
        pitch: normalizePitch(base + shift),
        accidental: sharp ? 'sharp' : 'flat',
    };
}

export function normalizePitch(pitch: number): number {
    return mod(pitch, 12);
}
