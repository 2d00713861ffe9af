import { parseInlines, joinLines, InlineEnv } from './inlineParser';
import { initialDirectiveState, DirectiveState } from './directive';
import { Inline } from '../book/book';
import { expectSuccess } from '../utils';

function env(state?: Partial<DirectiveState>, smart: boolean = true): InlineEnv {
    return {
        state: { ...initialDirectiveState('english'), ...state },
        notation: 'english',
        smartPunctuation: smart,
        line: 1,
    };
}

function inlines(text: string, inlineEnv: InlineEnv = env()): Inline[] {
    const result = parseInlines(text, inlineEnv);
    return expectSuccess(result) ? result.value : [];
}

it('chord takes the following lyrics', () => {
    expect(inlines('Hello `G`world')).toEqual([
        { type: 'i-text', text: 'Hello ' },
        {
            type: 'i-chord', primary: 'G', style: 1, baseline: false,
            inlines: [{ type: 'i-text', text: 'world' }],
        },
    ]);
});

it('chords are transposed by the primary offset', () => {
    expect(inlines('`G7`Hello `C`world', env({ primaryOffset: 5 }))).toEqual([
        {
            type: 'i-chord', primary: 'C7', style: 1, baseline: false,
            inlines: [{ type: 'i-text', text: 'Hello ' }],
        },
        {
            type: 'i-chord', primary: 'F', style: 1, baseline: false,
            inlines: [{ type: 'i-text', text: 'world' }],
        },
    ]);
});

it('double backticks give style 2', () => {
    expect(inlines('``C7``')).toEqual([
        { type: 'i-chord', primary: 'C7', style: 2, baseline: true, inlines: [] },
    ]);
});

it('whitespace-only lyrics make a baseline chord', () => {
    expect(inlines('`G` `C`la')).toEqual([
        { type: 'i-chord', primary: 'G', style: 1, baseline: true, inlines: [] },
        {
            type: 'i-chord', primary: 'C', style: 1, baseline: false,
            inlines: [{ type: 'i-text', text: 'la' }],
        },
    ]);
});

it('lyrics stop at a break', () => {
    expect(inlines('`G`la\\\\da')).toEqual([
        {
            type: 'i-chord', primary: 'G', style: 1, baseline: false,
            inlines: [{ type: 'i-text', text: 'la' }],
        },
        { type: 'i-break' },
        { type: 'i-text', text: 'da' },
    ]);
});

it('chord spelling is kept without transposition', () => {
    expect(inlines('`Dbmaj7/Ab`')).toEqual([
        { type: 'i-chord', primary: 'Dbmaj7/Ab', style: 1, baseline: true, inlines: [] },
    ]);
    expect(inlines('`N.C.`', env({ primaryOffset: 3 }))).toEqual([
        { type: 'i-chord', primary: 'N.C.', style: 1, baseline: true, inlines: [] },
    ]);
});

it('unparsable chord without transposition', () => {
    expect(parseInlines('la `xyz`', env())).toEqual({
        success: false,
        diagnostic: {
            diag: 'syntax-error',
            expected: 'chord in english notation',
            found: 'xyz',
            location: { line: 1, column: 5 },
        },
    });
});

it('secondary row adds alt_chord', () => {
    const state = { secondaryEnabled: true, secondaryNotation: 'german' as const };
    expect(inlines('`Bb`', env(state))).toEqual([
        { type: 'i-chord', primary: 'Bb', alt_chord: 'B', style: 1, baseline: true, inlines: [] },
    ]);
});

it('unterminated chord', () => {
    expect(parseInlines('la `G la', env())).toEqual({
        success: false,
        diagnostic: {
            diag: 'syntax-error',
            expected: 'closing backtick of a chord',
            location: { line: 1, column: 4 },
        },
    });
});

it('bad chord delimiters', () => {
    expect(parseInlines('```G```', env()).success).toBe(false);
    expect(parseInlines('`G`` la', env()).success).toBe(false);
    expect(parseInlines('`` la', env()).success).toBe(false);
});

it('unparsable chord under transposition', () => {
    expect(parseInlines('`Xyz`', env({ primaryOffset: 2 }))).toEqual({
        success: false,
        diagnostic: {
            diag: 'syntax-error',
            expected: 'chord in english notation',
            found: 'Xyz',
            location: { line: 1, column: 2 },
        },
    });
});

it('nested chord', () => {
    expect(parseInlines('`G` *la `C` la*', env())).toEqual({
        success: false,
        diagnostic: {
            diag: 'nested-chord',
            chord: 'C',
            location: { line: 1, column: 10 },
        },
    });
    expect(parseInlines('`C`la *`D`li*', env())).toEqual({
        success: false,
        diagnostic: {
            diag: 'nested-chord',
            chord: 'D',
            location: { line: 1, column: 9 },
        },
    });
});

it('emphasis and strong', () => {
    expect(inlines('*soft* and **loud**')).toEqual([
        { type: 'i-emph', inlines: [{ type: 'i-text', text: 'soft' }] },
        { type: 'i-text', text: ' and ' },
        { type: 'i-strong', inlines: [{ type: 'i-text', text: 'loud' }] },
    ]);
    expect(inlines('_a_ __b__')).toEqual([
        { type: 'i-emph', inlines: [{ type: 'i-text', text: 'a' }] },
        { type: 'i-text', text: ' ' },
        { type: 'i-strong', inlines: [{ type: 'i-text', text: 'b' }] },
    ]);
});

it('underscore inside a word is text', () => {
    expect(inlines('snake_case_name')).toEqual([
        { type: 'i-text', text: 'snake_case_name' },
    ]);
});

it('unterminated emphasis', () => {
    expect(parseInlines('la *oops', env())).toEqual({
        success: false,
        diagnostic: {
            diag: 'syntax-error',
            expected: 'closing \'*\'',
            location: { line: 1, column: 4 },
        },
    });
});

it('escapes', () => {
    expect(inlines('\\*not\\*')).toEqual([{ type: 'i-text', text: '*not*' }]);
    expect(inlines('a\\\\b')).toEqual([
        { type: 'i-text', text: 'a' },
        { type: 'i-break' },
        { type: 'i-text', text: 'b' },
    ]);
});

it('images', () => {
    expect(inlines('![alt](img/a.png =100x50 "wide")')).toEqual([
        { type: 'i-image', path: 'img/a.png', width: 100, height: 50, class: 'wide' },
    ]);
    expect(inlines('![](b.png)')).toEqual([
        { type: 'i-image', path: 'b.png', width: 0, height: 0 },
    ]);
});

it('links', () => {
    expect(inlines('[site](https://example.com "Title")')).toEqual([
        { type: 'i-link', url: 'https://example.com', title: 'Title', text: 'site' },
    ]);
    expect(inlines('<https://example.com>')).toEqual([
        { type: 'i-link', url: 'https://example.com', text: 'https://example.com' },
    ]);
    expect(inlines('[just brackets]')).toEqual([
        { type: 'i-text', text: '[just brackets]' },
    ]);
});

it('tags', () => {
    expect(inlines('x <span class="red">y</span>')).toEqual([
        { type: 'i-text', text: 'x ' },
        { type: 'i-tag', name: 'span', attrs: { class: 'red' } },
        { type: 'i-text', text: 'y' },
        { type: 'i-tag', name: '/span', attrs: {} },
    ]);
    expect(parseInlines('<span class=red>', env()).success).toBe(false);
    expect(inlines('1 < 2')).toEqual([{ type: 'i-text', text: '1 < 2' }]);
});

it('chorus references', () => {
    expect(inlines('Repeat >>')).toEqual([
        { type: 'i-text', text: 'Repeat' },
        { type: 'i-chorus-ref', num: 2, prefix_space: true },
    ]);
    expect(inlines('>')).toEqual([
        { type: 'i-chorus-ref', num: 1, prefix_space: false },
    ]);
    expect(inlines('a>b')).toEqual([{ type: 'i-text', text: 'a>b' }]);
});

it('smart punctuation', () => {
    expect(inlines('"Hi" -- it\'s...')).toEqual([
        { type: 'i-text', text: '“Hi” – it’s…' },
    ]);
    expect(inlines('"Hi" -- it\'s...', env({}, false))).toEqual([
        { type: 'i-text', text: '"Hi" -- it\'s...' },
    ]);
});

it('quotes open after a chord and at the start of emphasis', () => {
    expect(inlines('`C`\'Tis "so"')).toEqual([
        {
            type: 'i-chord', primary: 'C', style: 1, baseline: false,
            inlines: [{ type: 'i-text', text: '‘Tis “so”' }],
        },
    ]);
    expect(inlines('*"la"*')).toEqual([
        { type: 'i-emph', inlines: [{ type: 'i-text', text: '“la”' }] },
    ]);
});

it('joinLines', () => {
    const a: Inline = { type: 'i-text', text: 'a' };
    const b: Inline = { type: 'i-text', text: 'b' };
    expect(joinLines([[a], [b]])).toEqual([a, { type: 'i-break' }, b]);
    expect(joinLines([[a, { type: 'i-break' }], []])).toEqual([a]);
});
