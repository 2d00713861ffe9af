import { Notation } from '../music/notation';

export const inlineTypes = [
    'i-text', 'i-chord', 'i-break', 'i-emph', 'i-strong',
    'i-link', 'i-image', 'i-chorus-ref', 'i-tag',
] as const;
export type InlineType = typeof inlineTypes[number];

export const blockTypes = [
    'b-verse', 'b-bullet-list', 'b-horizontal-line', 'b-pre', 'b-html-block',
] as const;
export type BlockType = typeof blockTypes[number];

type DefInline<T extends InlineType, P = {}> = { type: T } & P;

export type TextInline = DefInline<'i-text', {
    text: string,
}>;
export type ChordInline = DefInline<'i-chord', {
    primary: string,
    alt_chord?: string,
    style: ChordStyle,
    baseline: boolean,
    inlines: Inline[],
}>;
export type BreakInline = DefInline<'i-break'>;
export type EmphInline = DefInline<'i-emph', {
    inlines: Inline[],
}>;
export type StrongInline = DefInline<'i-strong', {
    inlines: Inline[],
}>;
export type LinkInline = DefInline<'i-link', {
    url: string,
    title?: string,
    text: string,
}>;
export type ImageInline = DefInline<'i-image', {
    path: string,
    width: number,
    height: number,
    class?: string,
}>;
export type ChorusRefInline = DefInline<'i-chorus-ref', {
    num: number,
    prefix_space: boolean,
}>;
export type TagInline = DefInline<'i-tag', {
    name: string,
    attrs: TagAttributes,
}>;
export type TagAttributes = {
    [name: string]: string,
};

export type ChordStyle = 1 | 2;

export type Inline =
    | TextInline | ChordInline | BreakInline
    | EmphInline | StrongInline
    | LinkInline | ImageInline
    | ChorusRefInline | TagInline
    ;

export type VerseLabel =
    | { label: 'verse', num: number }
    | { label: 'chorus', num: number }
    | { label: 'custom', text: string }
    | { label: 'none' }
    ;

export type Paragraph = {
    label: VerseLabel,
    inlines: Inline[],
};

type DefBlock<T extends BlockType, P = {}> = { type: T } & P;

export type VerseBlock = DefBlock<'b-verse', {
    paragraphs: Paragraph[],
}>;
export type BulletListBlock = DefBlock<'b-bullet-list', {
    items: string[],
}>;
export type HorizontalLineBlock = DefBlock<'b-horizontal-line'>;
export type PreBlock = DefBlock<'b-pre', {
    text: string,
}>;
export type HtmlBlock = DefBlock<'b-html-block', {
    inlines: Inline[],
}>;

export type Block =
    | VerseBlock | BulletListBlock | HorizontalLineBlock
    | PreBlock | HtmlBlock
    ;

export type Song = {
    title: string,
    subtitles: string[],
    blocks: Block[],
};

export type SongRef = {
    title: string,
    idx: number,
};

export type BookMeta = {
    title: string,
    subtitle?: string,
    front_img?: string,
    title_note?: string,
    chorus_label: string,
    notation: Notation,
};

export type Book = BookMeta & {
    songs: Song[],
    songs_sorted: SongRef[],
};
