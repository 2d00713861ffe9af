import { inlines2text, collectChorusRefs, collectImages } from './bookUtils';
import { Inline, Block } from './book';

const inlines: Inline[] = [
    { type: 'i-text', text: 'Go ' },
    {
        type: 'i-chord', primary: 'G', style: 1, baseline: false,
        inlines: [{ type: 'i-emph', inlines: [{ type: 'i-text', text: 'home' }] }],
    },
    { type: 'i-break' },
    { type: 'i-link', url: 'https://example.com', text: 'site' },
    { type: 'i-chorus-ref', num: 2, prefix_space: true },
    { type: 'i-tag', name: 'br', attrs: {} },
];

it('inlines2text', () => {
    expect(inlines2text(inlines, 'R')).toBe('Go home\nsite R2');
});

it('collectChorusRefs', () => {
    expect(collectChorusRefs(inlines)).toEqual([
        { type: 'i-chorus-ref', num: 2, prefix_space: true },
    ]);
});

it('collectImages', () => {
    const blocks: Block[] = [
        { type: 'b-pre', text: '![x](ignored.png)' },
        {
            type: 'b-verse',
            paragraphs: [{
                label: { label: 'none' },
                inlines: [{
                    type: 'i-strong',
                    inlines: [{ type: 'i-image', path: 'a.png', width: 10, height: 20 }],
                }],
            }],
        },
        { type: 'b-html-block', inlines: [{ type: 'i-image', path: 'b.png', width: 0, height: 0 }] },
    ];
    expect(collectImages(blocks).map(i => i.path)).toEqual(['a.png', 'b.png']);
});
