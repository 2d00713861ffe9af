import {
    StreamParser, Stream, Result, headParser, nextStream, reportUnparsedTail,
    yieldLast, yieldNext, reject, choice, some, translate,
    Diagnostic, compoundDiagnostic, hasErrors,
} from '../combinators';
import {
    Block, Inline, Paragraph, VerseLabel, BulletListBlock,
} from '../book/book';
import { inlines2text, collectChorusRefs } from '../book/bookUtils';
import { isWhitespaces, assertNever } from '../utils';
import { isDirectiveLine } from './directive';
import { parseInlines, joinLines } from './inlineParser';
import { SongContext, SourceLine, LabelRecord } from './context';

export type SongItem =
    | { item: 'block', block: Block }
    | { item: 'subtitle', subtitle: string }
    | { item: 'skip' }
    ;

type LineStream = Stream<SourceLine, SongContext>;
type BlockParser = StreamParser<SourceLine, SongItem, SongContext>;

type LineKind =
    | 'blank' | 'directive' | 'subtitle' | 'fence' | 'html'
    | 'horizontal-line' | 'bullet' | 'verse-item' | 'text'
    ;

const subtitleRegex = /^##\s+(.*)$/;
export const fenceRegex = /^\s*(`{3,}|~{3,})/;
const htmlRegex = /^\s*<\/?[A-Za-z][\w-]*(\s|\/?>|$)/;
const horizontalLineRegex = /^\s*([-*_])(\s*\1){2,}\s*$/;
const bulletRegex = /^\s*[-+*]\s+/;
const verseNumRegex = /^\s*(\d+)\.(\s+|$)/;
const chorusRegex = /^\s*(>+)\s+(?=\S)/;
const customLabelRegex = /^\s*\[([^\]]+)\](?!\()\s*/;
const indentRegex = /^( {2,}|\t)/;

export function lineKind(text: string): LineKind {
    if (isWhitespaces(text)) {
        return 'blank';
    } else if (isDirectiveLine(text)) {
        return 'directive';
    } else if (subtitleRegex.test(text)) {
        return 'subtitle';
    } else if (fenceRegex.test(text)) {
        return 'fence';
    } else if (htmlRegex.test(text)) {
        return 'html';
    } else if (horizontalLineRegex.test(text)) {
        return 'horizontal-line';
    } else if (bulletRegex.test(text)) {
        return 'bullet';
    } else if (verseNumRegex.test(text) || chorusRegex.test(text) || customLabelRegex.test(text)) {
        return 'verse-item';
    } else {
        return 'text';
    }
}

const skip: SongItem = { item: 'skip' };

function lineOf(kind: LineKind, f: (line: SourceLine, ctx: SongContext) => SongItem): BlockParser {
    return headParser((line: SourceLine, ctx: SongContext) => lineKind(line.text) === kind
        ? yieldLast(f(line, ctx))
        : reject());
}

const blankLine = lineOf('blank', () => skip);

const directiveLine: BlockParser = headParser((line: SourceLine, ctx: SongContext) => lineKind(line.text) === 'directive'
    ? yieldLast(skip, ctx.applyDirectiveLine(line))
    : reject());

const subtitleLine = lineOf('subtitle', line => {
    const match = line.text.match(subtitleRegex);
    return {
        item: 'subtitle',
        subtitle: match ? match[1].trim() : '',
    };
});

const horizontalLine = lineOf('horizontal-line', () => ({
    item: 'block',
    block: { type: 'b-horizontal-line' },
}));

const preBlock: BlockParser = input => {
    const head = input.stream[0];
    const fence = head !== undefined ? head.text.match(fenceRegex) : null;
    if (head === undefined || !fence) {
        return reject();
    }

    const marker = fence[1];
    const content: string[] = [];
    let idx = 1;
    while (idx < input.stream.length) {
        const line = input.stream[idx];
        idx++;
        if (isClosingFence(line.text, marker)) {
            return yieldNext(
                preItem(content),
                nextStream(input, idx),
            );
        }
        content.push(line.text);
    }

    return yieldNext(
        preItem(content),
        nextStream(input, idx),
        input.env.locate({ diag: 'unterminated-fence', severity: 'warning' }, head.line),
    );
};

export function isClosingFence(text: string, marker: string): boolean {
    const trimmed = text.trim();
    return trimmed.length >= marker.length
        && trimmed.split('').every(ch => ch === marker[0]);
}

function preItem(lines: string[]): SongItem {
    return {
        item: 'block',
        block: { type: 'b-pre', text: lines.join('\n') },
    };
}

type LineParse = {
    inlines: Inline[],
    labels: LabelRecord[],
    diagnostic: Diagnostic,
};

function parseLine(ctx: SongContext, line: SourceLine, column: number = 1): LineParse {
    const text = line.text.substring(column - 1).replace(/\s+$/, '');
    const result = parseInlines(text, ctx.inlineEnv(line.line, column));
    if (!result.success) {
        return {
            inlines: [],
            labels: [],
            diagnostic: ctx.locate(result.diagnostic, line.line),
        };
    }
    return {
        inlines: result.value,
        labels: collectChorusRefs(result.value).map(ref => ({
            kind: 'chorus-reference' as const,
            num: ref.num,
            line: line.line,
        })),
        diagnostic: ctx.locate(result.diagnostic, line.line),
    };
}

// Lines of a block, collected in order; directive lines take effect as they are met
class BlockLines {
    private readonly lines: Inline[][] = [];
    private readonly labelRecords: LabelRecord[] = [];
    private readonly diags: Diagnostic[] = [];
    private hasFailedLine = false;

    constructor(readonly ctx: SongContext) { }

    public add(line: SourceLine, column?: number) {
        const parsed = parseLine(this.ctx, line, column);
        this.lines.push(parsed.inlines);
        this.labelRecords.push(...parsed.labels);
        this.diags.push(parsed.diagnostic);
        this.hasFailedLine = this.hasFailedLine || hasErrors(parsed.diagnostic);
    }

    public directive(line: SourceLine) {
        this.diags.push(this.ctx.applyDirectiveLine(line));
    }

    public label(record: LabelRecord) {
        this.labelRecords.push(record);
    }

    public take(): Inline[] {
        const inlines = joinLines(this.lines);
        this.lines.length = 0;
        return inlines;
    }

    get labels(): LabelRecord[] {
        return this.labelRecords;
    }

    get diagnostic(): Diagnostic {
        return compoundDiagnostic(this.diags);
    }

    // Directive errors are reported but keep the block
    get failed(): boolean {
        return this.hasFailedLine;
    }
}

function finishBlock(input: LineStream, consumed: number, lines: BlockLines, block: Block): Result<LineStream, SongItem> {
    const next = nextStream(input, consumed);
    if (lines.failed) {
        return yieldNext(skip, next, lines.diagnostic);
    }
    lines.ctx.registerLabels(lines.labels);
    const item: SongItem = { item: 'block', block };
    return yieldNext(item, next, lines.diagnostic);
}

const htmlBlock: BlockParser = input => {
    const head = input.stream[0];
    if (head === undefined || lineKind(head.text) !== 'html') {
        return reject();
    }

    const lines = new BlockLines(input.env);
    let idx = 0;
    for (; idx < input.stream.length; idx++) {
        const line = input.stream[idx];
        const kind = lineKind(line.text);
        if (kind === 'blank') {
            break;
        } else if (kind === 'directive') {
            lines.directive(line);
        } else {
            lines.add(line);
        }
    }

    return finishBlock(input, idx, lines, {
        type: 'b-html-block',
        inlines: lines.take(),
    });
};

const bulletList: BlockParser = input => {
    const head = input.stream[0];
    if (head === undefined || lineKind(head.text) !== 'bullet') {
        return reject();
    }

    const lines = new BlockLines(input.env);
    const items: Inline[][] = [];
    let idx = 0;
    for (; idx < input.stream.length; idx++) {
        const line = input.stream[idx];
        const kind = lineKind(line.text);
        if (kind === 'directive') {
            lines.directive(line);
        } else if (kind === 'bullet') {
            const marker = line.text.match(bulletRegex);
            lines.add(line, marker ? marker[0].length + 1 : 1);
            items.push(lines.take());
        } else {
            break;
        }
    }

    const chorusLabel = input.env.settings.chorusLabel;
    const block: BulletListBlock = {
        type: 'b-bullet-list',
        items: items.map(i => inlines2text(i, chorusLabel).trim()),
    };
    return finishBlock(input, idx, lines, block);
};

type ItemStart = {
    label: VerseLabel,
    column: number,
};

function itemStart(ctx: SongContext, line: SourceLine, lines: BlockLines): ItemStart {
    const { text } = line;
    const verse = text.match(verseNumRegex);
    if (verse) {
        return {
            label: { label: 'verse', num: ctx.verseNumber(parseInt(verse[1], 10)) },
            column: verse[0].length + 1,
        };
    }

    const chorus = text.match(chorusRegex);
    if (chorus) {
        const num = chorus[1].length;
        lines.label({ kind: 'chorus-declaration', num, line: line.line });
        return {
            label: { label: 'chorus', num },
            column: chorus[0].length + 1,
        };
    }

    const custom = text.match(customLabelRegex);
    if (custom) {
        return {
            label: { label: 'custom', text: custom[1].trim() },
            column: custom[0].length + 1,
        };
    }

    const indent = text.match(/^\s*/);
    return {
        label: { label: 'none' },
        column: (indent ? indent[0].length : 0) + 1,
    };
}

function continuesParagraph(kind: LineKind): boolean {
    return kind === 'text' || kind === 'directive';
}

const verse: BlockParser = input => {
    const head = input.stream[0];
    const headKind = head !== undefined ? lineKind(head.text) : 'blank';
    if (head === undefined || (headKind !== 'verse-item' && headKind !== 'text')) {
        return reject();
    }

    const ctx = input.env;
    const lines = new BlockLines(ctx);
    const start = itemStart(ctx, head, lines);
    lines.add(head, start.column);

    const paragraphs: Paragraph[] = [];
    let label = start.label;
    let idx = 1;
    while (true) {
        while (idx < input.stream.length) {
            const line = input.stream[idx];
            const kind = lineKind(line.text);
            if (!continuesParagraph(kind)) {
                break;
            }
            if (kind === 'directive') {
                lines.directive(line);
            } else {
                lines.add(line, leadingSpace(line.text) + 1);
            }
            idx++;
        }
        paragraphs.push({ label, inlines: lines.take() });

        const resume = indentedContinuation(input, idx);
        if (start.label.label === 'none' || resume === undefined) {
            break;
        }
        idx = resume;
        label = { label: 'none' };
    }

    if (start.label.label === 'verse' && !lines.failed) {
        ctx.commitVerse(start.label.num);
    }
    return finishBlock(input, idx, lines, {
        type: 'b-verse',
        paragraphs,
    });
};

function indentedContinuation(input: LineStream, from: number): number | undefined {
    let idx = from;
    while (idx < input.stream.length && lineKind(input.stream[idx].text) === 'blank') {
        idx++;
    }
    const line = input.stream[idx];
    return idx > from
        && line !== undefined
        && indentRegex.test(line.text)
        && lineKind(line.text) === 'text'
        ? idx
        : undefined;
}

function leadingSpace(text: string): number {
    const match = text.match(/^\s*/);
    return match ? match[0].length : 0;
}

const block: BlockParser = choice(
    blankLine,
    directiveLine,
    subtitleLine,
    preBlock,
    htmlBlock,
    horizontalLine,
    bulletList,
    verse,
);

export type SongBody = {
    blocks: Block[],
    subtitles: string[],
};

export const songBody: StreamParser<SourceLine, SongBody, SongContext> = translate(
    reportUnparsedTail(
        some(block),
        rest => rest.env.locate({
            diag: 'extra-lines-tail',
            lines: rest.stream.length,
        }, rest.stream[0].line),
    ),
    items => collectItems(items),
);

function collectItems(items: SongItem[]): SongBody {
    const body: SongBody = { blocks: [], subtitles: [] };
    for (const item of items) {
        switch (item.item) {
            case 'block':
                body.blocks.push(item.block);
                break;
            case 'subtitle':
                body.subtitles.push(item.subtitle);
                break;
            case 'skip':
                break;
            default:
                assertNever(item);
        }
    }
    return body;
}
