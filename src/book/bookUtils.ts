import { Inline, Block, ChorusRefInline, ImageInline, Paragraph } from './book';
import { assertNever, flatten } from '../utils';

export function inlines2text(inlines: Inline[], chorusLabel: string): string {
    return inlines.map(i => inline2text(i, chorusLabel)).join('');
}

function inline2text(inline: Inline, chorusLabel: string): string {
    switch (inline.type) {
        case 'i-text':
            return inline.text;
        case 'i-chord':
        case 'i-emph':
        case 'i-strong':
            return inlines2text(inline.inlines, chorusLabel);
        case 'i-break':
            return '\n';
        case 'i-link':
            return inline.text;
        case 'i-chorus-ref':
            return `${inline.prefix_space ? ' ' : ''}${chorusLabel}${inline.num}`;
        case 'i-image':
        case 'i-tag':
            return '';
        default:
            return assertNever(inline);
    }
}

export function visitInlines(inlines: Inline[], visitor: (inline: Inline) => void) {
    for (const inline of inlines) {
        visitor(inline);
        switch (inline.type) {
            case 'i-chord':
            case 'i-emph':
            case 'i-strong':
                visitInlines(inline.inlines, visitor);
                break;
        }
    }
}

export function blockInlines(block: Block): Inline[] {
    switch (block.type) {
        case 'b-verse':
            return flatten(block.paragraphs.map((p: Paragraph) => p.inlines));
        case 'b-html-block':
            return block.inlines;
        case 'b-bullet-list':
        case 'b-horizontal-line':
        case 'b-pre':
            return [];
        default:
            return assertNever(block);
    }
}

export function collectChorusRefs(inlines: Inline[]): ChorusRefInline[] {
    const refs: ChorusRefInline[] = [];
    visitInlines(inlines, i => {
        if (i.type === 'i-chorus-ref') {
            refs.push(i);
        }
    });
    return refs;
}

export function collectImages(blocks: Block[]): ImageInline[] {
    const images: ImageInline[] = [];
    for (const block of blocks) {
        visitInlines(blockInlines(block), i => {
            if (i.type === 'i-image') {
                images.push(i);
            }
        });
    }
    return images;
}
