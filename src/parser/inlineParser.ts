import {
    ResultLast, yieldLast, reject, Diagnostic, compoundDiagnostic, diagnosticList,
} from '../combinators';
import { withLocation } from '../log';
import { Inline, ChordInline, ChordStyle } from '../book/book';
import { Notation } from '../music/notation';
import { parseChord, transpose, convertNotation, chordToString } from '../music/chord';
import { isWhitespaces, last } from '../utils';
import { DirectiveState } from './directive';
import { smartPunctuation } from './smartPunctuation';
import { parseTag, findTagEnd, startsTag } from './tagParser';

export type InlineEnv = {
    state: DirectiveState,
    notation: Notation,
    smartPunctuation: boolean,
    line: number,
    column?: number,
};

type Scan = {
    text: string,
    pos: number,
    env: InlineEnv,
    // Position where text starts fresh, as after a chord or a tag
    boundary: number,
    chordAt: Map<Inline, number>,
};

const special = /[\\`*_!\[<>]/;
const escapable = /[!-/:-@\[-`{-~]/;

export function parseInlines(text: string, env: InlineEnv): ResultLast<Inline[]> {
    const scan: Scan = { text, pos: 0, env, boundary: 0, chordAt: new Map() };
    const parsed = parseSpan(scan, undefined, 0);
    if (!parsed.success) {
        return parsed;
    }
    return absorbChords(scan, parsed.value);
}

class InlineBuilder {
    private readonly inlines: Inline[] = [];
    private pending = '';

    public text(text: string) {
        this.pending += text;
    }

    public push(inline: Inline) {
        this.flush();
        this.inlines.push(inline);
    }

    public trimEnd() {
        this.pending = this.pending.replace(/\s+$/, '');
    }

    public build(): Inline[] {
        this.flush();
        return this.inlines;
    }

    private flush() {
        if (this.pending.length > 0) {
            this.inlines.push({ type: 'i-text', text: this.pending });
            this.pending = '';
        }
    }
}

function parseSpan(scan: Scan, closer: string | undefined, openedAt: number): ResultLast<Inline[]> {
    const builder = new InlineBuilder();
    while (scan.pos < scan.text.length) {
        if (closer !== undefined && atCloser(scan, closer)) {
            scan.pos += closer.length;
            return yieldLast(builder.build());
        }
        const step = parseNext(scan, builder);
        if (!step.success) {
            return step;
        }
    }

    if (closer !== undefined) {
        return reject(locate(scan, {
            diag: 'syntax-error',
            expected: `closing '${closer}'`,
        }, openedAt));
    }
    return yieldLast(builder.build());
}

function atCloser(scan: Scan, closer: string): boolean {
    const { text, pos } = scan;
    if (!text.startsWith(closer, pos)) {
        return false;
    }
    // A single mark followed by the same mark opens a strong span instead
    return closer.length > 1 || text[pos + 1] !== closer;
}

function parseNext(scan: Scan, builder: InlineBuilder): ResultLast<undefined> {
    const { text, pos } = scan;
    const ch = text[pos];
    switch (ch) {
        case '\\':
            return parseEscape(scan, builder);
        case '`':
            return parseChordSpan(scan, builder);
        case '*':
        case '_':
            return parseEmphasis(scan, builder);
        case '!':
        case '[':
            return parseLinkOrImage(scan, builder);
        case '<':
            return parseAngle(scan, builder);
        case '>':
            return parseChorusRef(scan, builder);
        default:
            return parsePlainText(scan, builder);
    }
}

function parsePlainText(scan: Scan, builder: InlineBuilder): ResultLast<undefined> {
    const { text, pos } = scan;
    let end = pos + 1;
    while (end < text.length && !special.test(text[end])) {
        end++;
    }
    addText(scan, builder, text.substring(pos, end));
    scan.pos = end;
    return yieldLast(undefined);
}

function addText(scan: Scan, builder: InlineBuilder, raw: string) {
    const before = scan.pos > scan.boundary ? scan.text[scan.pos - 1] : undefined;
    builder.text(scan.env.smartPunctuation ? smartPunctuation(raw, before) : raw);
}

function addLiteral(scan: Scan, builder: InlineBuilder, length: number) {
    addText(scan, builder, scan.text.substring(scan.pos, scan.pos + length));
    scan.pos += length;
    return yieldLast(undefined);
}

function parseEscape(scan: Scan, builder: InlineBuilder): ResultLast<undefined> {
    const next = scan.text[scan.pos + 1];
    if (next === '\\') {
        builder.push({ type: 'i-break' });
        scan.pos += 2;
    } else if (next !== undefined && escapable.test(next)) {
        builder.text(next);
        scan.pos += 2;
    } else {
        builder.text('\\');
        scan.pos += 1;
    }
    return yieldLast(undefined);
}

function parseChordSpan(scan: Scan, builder: InlineBuilder): ResultLast<undefined> {
    const { text } = scan;
    const start = scan.pos;
    const marks = markRun(text, start, '`');
    if (marks > 2) {
        return reject(locate(scan, {
            diag: 'syntax-error',
            expected: 'chord delimited by one or two backticks',
            found: text.substring(start, start + marks),
        }, start));
    }

    const closeAt = text.indexOf('`', start + marks);
    if (closeAt < 0) {
        return reject(locate(scan, {
            diag: 'syntax-error',
            expected: 'closing backtick of a chord',
        }, start));
    }
    const closing = markRun(text, closeAt, '`');
    if (closing !== marks) {
        return reject(locate(scan, {
            diag: 'syntax-error',
            expected: `chord closed by ${marks} backtick(s)`,
            found: text.substring(closeAt, closeAt + closing),
        }, closeAt));
    }

    const chordText = text.substring(start + marks, closeAt).trim();
    const style: ChordStyle = marks === 2 ? 2 : 1;
    const chord = chordInline(chordText, style, scan.env);
    if (!chord.success) {
        return reject(locate(scan, chord.diagnostic, start + marks));
    }
    builder.push(chord.value);
    scan.chordAt.set(chord.value, start + marks);
    scan.pos = closeAt + closing;
    scan.boundary = scan.pos;
    return yieldLast(undefined);
}

function markRun(text: string, pos: number, mark: string): number {
    let end = pos;
    while (text[end] === mark) {
        end++;
    }
    return end - pos;
}

function chordInline(text: string, style: ChordStyle, env: InlineEnv): ResultLast<ChordInline> {
    if (text.length === 0) {
        return reject({ diag: 'syntax-error', expected: 'chord', found: '' });
    }
    const { state } = env;
    const primary = renderChord(text, env.notation, state.primaryOffset, state.primaryNotation);
    if (!primary.success) {
        return primary;
    }

    let alt: string | undefined = undefined;
    if (state.secondaryEnabled) {
        const secondary = renderChord(text, env.notation, state.secondaryOffset, state.secondaryNotation);
        if (!secondary.success) {
            return secondary;
        }
        alt = secondary.value;
    }

    const chord: ChordInline = {
        type: 'i-chord',
        primary: primary.value,
        style,
        baseline: true,
        inlines: [],
    };
    return yieldLast(alt !== undefined
        ? { ...chord, alt_chord: alt }
        : chord);
}

const noChord = 'N.C.';

function renderChord(text: string, source: Notation, offset: number, target: Notation): ResultLast<string> {
    if (text === noChord) {
        return yieldLast(text);
    }
    const parsed = parseChord(text, source);
    if (!parsed.success) {
        return parsed;
    }
    if (offset === 0 && source === target) {
        return yieldLast(text);
    }
    const transposed = transpose(parsed.value, offset);
    if (!transposed.success) {
        return transposed;
    }
    const converted = convertNotation(transposed.value, target);
    return converted.success
        ? yieldLast(chordToString(converted.value))
        : converted;
}

function parseEmphasis(scan: Scan, builder: InlineBuilder): ResultLast<undefined> {
    const { text, pos } = scan;
    const mark = text[pos];
    const prev = pos > 0 ? text[pos - 1] : undefined;
    if (mark === '_' && prev !== undefined && /\w/.test(prev)) {
        return addLiteral(scan, builder, 1);
    }

    const strong = text[pos + 1] === mark;
    const opener = strong ? mark + mark : mark;
    const next = text[pos + opener.length];
    if (next === undefined || /\s/.test(next)) {
        return addLiteral(scan, builder, opener.length);
    }

    scan.pos += opener.length;
    scan.boundary = scan.pos;
    const inner = parseSpan(scan, opener, pos);
    if (!inner.success) {
        return inner;
    }
    builder.push(strong
        ? { type: 'i-strong', inlines: inner.value }
        : { type: 'i-emph', inlines: inner.value });
    return yieldLast(undefined);
}

const imageRegex = /^!\[([^\]]*)\]\(\s*([^\s)"]+)(?:\s+=(\d*)x(\d*))?(?:\s+"([^"]*)")?\s*\)/;
const linkRegex = /^\[([^\]]*)\]\(\s*([^\s)"]+)(?:\s+"([^"]*)")?\s*\)/;

function parseLinkOrImage(scan: Scan, builder: InlineBuilder): ResultLast<undefined> {
    const rest = scan.text.substring(scan.pos);
    const image = rest.match(imageRegex);
    if (image) {
        const [whole, , path, width, height, cls] = image;
        builder.push({
            type: 'i-image',
            path,
            width: width ? parseInt(width, 10) : 0,
            height: height ? parseInt(height, 10) : 0,
            ...(cls !== undefined ? { class: cls } : {}),
        });
        scan.pos += whole.length;
        return yieldLast(undefined);
    }

    const link = rest.match(linkRegex);
    if (link) {
        const [whole, linkText, url, title] = link;
        builder.push({
            type: 'i-link',
            url,
            text: linkText,
            ...(title !== undefined ? { title } : {}),
        });
        scan.pos += whole.length;
        return yieldLast(undefined);
    }

    return addLiteral(scan, builder, 1);
}

const autolinkRegex = /^<([A-Za-z][A-Za-z0-9+.-]{1,31}:[^<>\s]*)>/;

function parseAngle(scan: Scan, builder: InlineBuilder): ResultLast<undefined> {
    const { text, pos } = scan;
    const rest = text.substring(pos);
    const autolink = rest.match(autolinkRegex);
    if (autolink) {
        const [whole, url] = autolink;
        builder.push({ type: 'i-link', url, text: url });
        scan.pos += whole.length;
        return yieldLast(undefined);
    }

    if (!startsTag(rest)) {
        return addLiteral(scan, builder, 1);
    }
    const end = findTagEnd(text, pos);
    if (end === undefined) {
        return reject(locate(scan, {
            diag: 'syntax-error',
            expected: 'closing \'>\' of a tag',
            found: rest,
        }, pos));
    }
    const tag = parseTag(text.substring(pos, end));
    if (!tag.success) {
        return reject(locate(scan, tag.diagnostic, pos));
    }
    builder.push(tag.value);
    scan.pos = end;
    scan.boundary = end;
    return yieldLast(undefined);
}

function parseChorusRef(scan: Scan, builder: InlineBuilder): ResultLast<undefined> {
    const { text, pos } = scan;
    const marks = markRun(text, pos, '>');
    const prev = pos > 0 ? text[pos - 1] : undefined;
    const after = text[pos + marks];
    const prefixSpace = prev !== undefined && /\s/.test(prev);
    if ((prev !== undefined && !prefixSpace) || (after !== undefined && !/\s/.test(after))) {
        return addLiteral(scan, builder, marks);
    }

    if (prefixSpace) {
        builder.trimEnd();
    }
    builder.push({
        type: 'i-chorus-ref',
        num: marks,
        prefix_space: prefixSpace,
    });
    scan.pos += marks;
    return yieldLast(undefined);
}

function absorbChords(scan: Scan, inlines: Inline[]): ResultLast<Inline[]> {
    const result: Inline[] = [];
    let idx = 0;
    while (idx < inlines.length) {
        const inline = inlines[idx];
        idx++;
        if (inline.type === 'i-emph' || inline.type === 'i-strong') {
            const inner = absorbChords(scan, inline.inlines);
            if (!inner.success) {
                return inner;
            }
            result.push({ ...inline, inlines: inner.value });
        } else if (inline.type === 'i-chord') {
            const lyrics: Inline[] = [];
            while (idx < inlines.length && !endsLyrics(inlines[idx])) {
                lyrics.push(inlines[idx]);
                idx++;
            }
            const nested = firstChord(lyrics);
            if (nested !== undefined) {
                const at = scan.chordAt.get(nested);
                return reject(locate(
                    scan,
                    { diag: 'nested-chord', chord: nested.primary },
                    at !== undefined ? at : 0,
                ));
            }
            result.push(isBaseline(lyrics)
                ? { ...inline, baseline: true, inlines: [] }
                : { ...inline, baseline: false, inlines: lyrics });
        } else {
            result.push(inline);
        }
    }
    return yieldLast(result);
}

function endsLyrics(inline: Inline): boolean {
    return inline.type === 'i-chord' || inline.type === 'i-break';
}

function firstChord(inlines: Inline[]): ChordInline | undefined {
    for (const inline of inlines) {
        if (inline.type === 'i-chord') {
            return inline;
        } else if (inline.type === 'i-emph' || inline.type === 'i-strong') {
            const inner = firstChord(inline.inlines);
            if (inner !== undefined) {
                return inner;
            }
        }
    }
    return undefined;
}

function isBaseline(lyrics: Inline[]): boolean {
    return lyrics.every(l => l.type === 'i-text' && isWhitespaces(l.text));
}

function locate(scan: Scan, diag: Diagnostic, at: number): Diagnostic {
    const column = (scan.env.column !== undefined ? scan.env.column : 1) + at;
    return compoundDiagnostic(diagnosticList(diag).map(
        d => withLocation(d, { line: scan.env.line, column }),
    ));
}

export function trimTrailingBreaks(inlines: Inline[]): Inline[] {
    let end = inlines.length;
    while (end > 0 && inlines[end - 1].type === 'i-break') {
        end--;
    }
    return end === inlines.length
        ? inlines
        : inlines.slice(0, end);
}

export function joinLines(lines: Inline[][]): Inline[] {
    const result: Inline[] = [];
    for (const line of lines) {
        const prev = last(result);
        if (prev !== undefined && prev.type !== 'i-break') {
            result.push({ type: 'i-break' });
        }
        result.push(...line);
    }
    return trimTrailingBreaks(result);
}
