import {
    ResultLast, yieldLast, Diagnostic, compoundDiagnostic,
} from '../combinators';
import { ParserDiagnostic } from '../log';
import { Book, BookMeta, SongRef, Song } from '../book/book';
import { deepFreeze } from '../utils';
import { ParsedSong } from '../parser/songParser';

export function assembleBook(meta: BookMeta, songs: ParsedSong[]): ResultLast<Book> {
    const diags: Diagnostic[] = songs.map(s => compoundDiagnostic([
        s.diagnostic,
        validateLabels(s),
    ]));

    const book: Book = {
        ...meta,
        songs: songs.map(s => s.song),
        songs_sorted: sortSongs(songs.map(s => s.song)),
    };

    return yieldLast(deepFreeze(book), compoundDiagnostic(diags));
}

export function validateLabels(parsed: ParsedSong): Diagnostic {
    const declared = new Set<number>();
    const diags: ParserDiagnostic[] = [];
    const location = (line: number) => ({
        file: parsed.file,
        song: parsed.song.title,
        line,
    });

    for (const record of parsed.labels) {
        switch (record.kind) {
            case 'chorus-declaration':
                if (declared.has(record.num)) {
                    diags.push({
                        diag: 'duplicate-chorus-label',
                        num: record.num,
                        severity: 'warning',
                        location: location(record.line),
                    });
                }
                declared.add(record.num);
                break;
            case 'chorus-reference':
                if (!declared.has(record.num)) {
                    diags.push({
                        diag: 'unknown-chorus-reference',
                        num: record.num,
                        location: location(record.line),
                    });
                }
                break;
        }
    }

    return compoundDiagnostic(diags);
}

export function sortSongs(songs: Song[]): SongRef[] {
    return songs
        .map((song, idx) => ({ title: song.title, idx }))
        .sort((a, b) => a.title.localeCompare(b.title, undefined, { sensitivity: 'base' }) || a.idx - b.idx);
}
