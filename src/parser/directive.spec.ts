import { parseDirective, applyDirective, initialDirectiveState, isDirectiveLine, Directive } from './directive';
import { expectSuccess } from '../utils';

function directive(text: string): Directive {
    const result = parseDirective(text);
    if (!expectSuccess(result)) {
        throw new Error('unreachable');
    }
    return result.value;
}

it('isDirectiveLine', () => {
    expect(isDirectiveLine('  !+2')).toBe(true);
    expect(isDirectiveLine('![img](a.png)')).toBe(false);
    expect(isDirectiveLine('Hello!')).toBe(false);
});

it('parseDirective: offsets', () => {
    expect(directive('!+5')).toEqual({ directive: 'offset', row: 'primary', semitones: 5 });
    expect(directive('!-3')).toEqual({ directive: 'offset', row: 'primary', semitones: -3 });
    expect(directive('!0')).toEqual({ directive: 'offset', row: 'primary', semitones: 0 });
    expect(directive('!!+2')).toEqual({ directive: 'offset', row: 'secondary', semitones: 2 });
});

it('parseDirective: notations', () => {
    expect(directive('!german')).toEqual({ directive: 'notation', row: 'primary', notation: 'german' });
    expect(directive('!!Nashville')).toEqual({ directive: 'notation', row: 'secondary', notation: 'nashville' });
});

it('parseDirective: malformed', () => {
    for (const text of ['!', '!+', '!5', '!+5x', '!!!+1', '!+ 5']) {
        const result = parseDirective(text);
        expect(result.success).toBe(false);
        expect(result.diagnostic).toMatchObject({ diag: 'syntax-error', found: text });
    }
});

it('parseDirective: unknown notation', () => {
    expect(parseDirective('!klingon')).toEqual({
        success: false,
        diagnostic: { diag: 'unsupported-notation', name: 'klingon' },
    });
});

it('parseDirective: out of range offset', () => {
    expect(parseDirective('!+200')).toEqual({
        success: false,
        diagnostic: { diag: 'invalid-transposition', semitones: 200 },
    });
});

it('applyDirective: offsets are normalized', () => {
    const initial = initialDirectiveState('english');
    const down = applyDirective(initial, directive('!-3'));
    expect(down.primaryOffset).toBe(9);
    expect(applyDirective(down, directive('!0')).primaryOffset).toBe(0);
    expect(applyDirective(initial, directive('!+14')).primaryOffset).toBe(2);
});

it('applyDirective: secondary row is enabled on first use', () => {
    const initial = initialDirectiveState('english');
    expect(initial.secondaryEnabled).toBe(false);
    const state = applyDirective(initial, directive('!!german'));
    expect(state).toEqual({
        primaryOffset: 0,
        primaryNotation: 'english',
        secondaryEnabled: true,
        secondaryOffset: 0,
        secondaryNotation: 'german',
    });
});

it('applyDirective: active notation is a no-op', () => {
    const initial = initialDirectiveState('german');
    expect(applyDirective(initial, directive('!german'))).toEqual(initial);
});
