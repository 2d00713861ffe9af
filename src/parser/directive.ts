import { ResultLast, yieldLast, reject } from '../combinators';
import { Notation, parseNotation } from '../music/notation';
import { maxTransposition } from '../music/chord';
import { mod, assertNever } from '../utils';

export type DirectiveRow = 'primary' | 'secondary';

export type OffsetDirective = {
    directive: 'offset',
    row: DirectiveRow,
    semitones: number,
};
export type NotationDirective = {
    directive: 'notation',
    row: DirectiveRow,
    notation: Notation,
};
export type Directive = OffsetDirective | NotationDirective;

export type DirectiveState = {
    primaryOffset: number,
    primaryNotation: Notation,
    secondaryEnabled: boolean,
    secondaryOffset: number,
    secondaryNotation: Notation,
};

export function initialDirectiveState(notation: Notation): DirectiveState {
    return {
        primaryOffset: 0,
        primaryNotation: notation,
        secondaryEnabled: false,
        secondaryOffset: 0,
        secondaryNotation: notation,
    };
}

export function isDirectiveLine(text: string): boolean {
    const trimmed = text.trim();
    return trimmed.startsWith('!') && !trimmed.startsWith('![');
}

export function parseDirective(text: string): ResultLast<Directive> {
    const trimmed = text.trim();
    const match = trimmed.match(/^(!+)(.*)$/);
    if (!match || trimmed.startsWith('![')) {
        return reject(directiveSyntaxError(trimmed));
    }

    const [, marks, body] = match;
    if (marks.length > 2) {
        return reject(directiveSyntaxError(trimmed));
    }
    const row: DirectiveRow = marks.length === 2 ? 'secondary' : 'primary';

    if (/^([+-]\d+|0)$/.test(body)) {
        const semitones = parseInt(body, 10);
        if (Math.abs(semitones) > maxTransposition) {
            return reject({ diag: 'invalid-transposition', semitones });
        }
        return yieldLast({ directive: 'offset', row, semitones });
    } else if (/^[A-Za-z]+$/.test(body)) {
        const notation = parseNotation(body);
        return notation.success
            ? yieldLast({ directive: 'notation', row, notation: notation.value })
            : notation;
    } else {
        return reject(directiveSyntaxError(trimmed));
    }
}

function directiveSyntaxError(found: string) {
    return {
        diag: 'syntax-error' as const,
        expected: 'directive: !+N, !-N, !0, !notation or the same with !!',
        found,
    };
}

export function applyDirective(state: DirectiveState, directive: Directive): DirectiveState {
    switch (directive.directive) {
        case 'offset': {
            const offset = mod(directive.semitones, 12);
            return directive.row === 'primary'
                ? { ...state, primaryOffset: offset }
                : { ...state, secondaryEnabled: true, secondaryOffset: offset };
        }
        case 'notation':
            return directive.row === 'primary'
                ? { ...state, primaryNotation: directive.notation }
                : { ...state, secondaryEnabled: true, secondaryNotation: directive.notation };
        default:
            return assertNever(directive);
    }
}
