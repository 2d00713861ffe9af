import {
    makeStream, Diagnostic, compoundDiagnostic,
} from '../combinators';
import { Song } from '../book/book';
import { isWhitespaces } from '../utils';
import { SongContext, SongSettings, SourceLine, LabelRecord } from './context';
import { songBody, fenceRegex, isClosingFence } from './blockParser';

export type ParsedSong = {
    song: Song,
    labels: LabelRecord[],
    file?: string,
    line: number,
    diagnostic: Diagnostic,
};

export type ParsedSource = {
    songs: ParsedSong[],
    diagnostic: Diagnostic,
};

type SongSource = {
    title: string,
    line: number,
    lines: SourceLine[],
};

const titleRegex = /^#\s+(.*)$/;

export function parseSongs(source: string, settings: SongSettings, file?: string): ParsedSource {
    const { sources, preamble } = splitSongs(source);
    const diagnostic = preamble !== undefined
        ? {
            diag: 'content-before-title' as const,
            severity: 'warning' as const,
            location: { file, line: preamble },
        }
        : undefined;
    return {
        songs: sources.map(s => parseSong(s, settings, file)),
        diagnostic,
    };
}

function parseSong(source: SongSource, settings: SongSettings, file?: string): ParsedSong {
    const ctx = new SongContext(settings, source.title, file);
    const result = songBody(makeStream(source.lines, ctx));
    const body = result.success
        ? result.value
        : { blocks: [], subtitles: [] };
    return {
        song: {
            title: source.title,
            subtitles: body.subtitles,
            blocks: body.blocks,
        },
        labels: ctx.labels,
        file,
        line: source.line,
        diagnostic: compoundDiagnostic([result.diagnostic]),
    };
}

// Title lines inside fenced regions belong to the fenced text
function splitSongs(source: string) {
    const sources: SongSource[] = [];
    let preamble: number | undefined = undefined;
    let fence: string | undefined = undefined;
    let current: SongSource | undefined = undefined;

    const texts = source.split(/\r?\n/);
    for (let idx = 0; idx < texts.length; idx++) {
        const line: SourceLine = { text: texts[idx], line: idx + 1 };
        const title = fence === undefined ? line.text.match(titleRegex) : null;
        if (title) {
            current = { title: title[1].trim(), line: line.line, lines: [] };
            sources.push(current);
            continue;
        }

        fence = nextFence(fence, line.text);
        if (current !== undefined) {
            current.lines.push(line);
        } else if (preamble === undefined && !isWhitespaces(line.text)) {
            preamble = line.line;
        }
    }

    return { sources, preamble };
}

function nextFence(open: string | undefined, text: string): string | undefined {
    if (open === undefined) {
        const match = text.match(fenceRegex);
        return match ? match[1] : undefined;
    }
    return isClosingFence(text, open) ? undefined : open;
}
