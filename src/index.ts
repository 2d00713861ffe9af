import {
    ResultLast, Diagnostic, compoundDiagnostic, yieldLast,
} from './combinators';
import { Book } from './book/book';
import { parseBookConfig, bookMeta, songSettings } from './config';
import { parseSongs, ParsedSong } from './parser/songParser';
import { assembleBook } from './assembler/assembler';

export {
    Result, ResultLast, Diagnostic,
    diagnosticList, hasErrors, isCompoundDiagnostic,
} from './combinators';
export * from './book/book';
export { inlines2text, collectChorusRefs, collectImages } from './book/bookUtils';
export {
    astVersionLog, currentAstVersion, checkAstCompat, changesSince, parseVersion,
} from './book/version';
export {
    parseChord, transpose, convertNotation, chordToString, Chord,
} from './music/chord';
export { notations, Notation, parseNotation } from './music/notation';
export { bookConfigSchema, parseBookConfig, BookConfig, BookConfigInput } from './config';
export {
    ParserDiagnostic, Severity, Location, diagnosticMessage, locationToString,
} from './log';

export type SourceFile = {
    path?: string,
    source: string,
};

export type ParseBookInput = {
    config: unknown,
    files: SourceFile[],
};

export function parseBook({ config, files }: ParseBookInput): ResultLast<Book> {
    const parsedConfig = parseBookConfig(config);
    if (!parsedConfig.success) {
        return parsedConfig;
    }

    const settings = songSettings(parsedConfig.value);
    const songs: ParsedSong[] = [];
    const preambles: Diagnostic[] = [];
    for (const file of files) {
        const parsed = parseSongs(file.source, settings, file.path);
        songs.push(...parsed.songs);
        preambles.push(parsed.diagnostic);
    }

    const assembled = assembleBook(bookMeta(parsedConfig.value), songs);
    return assembled.success
        ? yieldLast(assembled.value, compoundDiagnostic([...preambles, assembled.diagnostic]))
        : assembled;
}
