import { Logger } from './logger';
import { ParserDiagnostic, Location } from './diagnostics';
import { assertNever } from '../utils';

export type ParserContext = {
    file?: string,
    song?: string,
};

export function diagnoser(context: ParserContext): ParserDiagnoser {
    return new ParserDiagnoser(context);
}

export class ParserDiagnoser {
    private readonly diags: ParserDiagnostic[] = [];

    constructor(readonly context: ParserContext) { }

    public add(diag: ParserDiagnostic) {
        this.diags.push(diag);
    }

    public all(): ParserDiagnostic[] {
        return this.diags;
    }

    public log(logger: Logger) {
        if (this.diags.length === 0) {
            return;
        }
        this.logContext(logger);
        for (const d of this.diags) {
            const message = `${locationToString(d.location)}${diagnosticMessage(d)}`;
            if (d.severity === 'info') {
                logger.info(message);
            } else {
                logger.warn(message);
            }
        }
        logger.warn('-----');
    }

    logContext(logger: Logger) {
        const { file, song } = this.context;
        if (file !== undefined) {
            logger.warn(`Parse file: ${file}`);
        }
        if (song !== undefined) {
            logger.warn(`Song: ${song}`);
        }
    }
}

export function diagnosticMessage(d: ParserDiagnostic): string {
    switch (d.diag) {
        case 'syntax-error':
            return d.found !== undefined
                ? `Syntax error: expected ${d.expected}, found '${d.found}'`
                : `Syntax error: expected ${d.expected}`;
        case 'unsupported-notation':
            return `Unsupported notation: '${d.name}'`;
        case 'invalid-transposition':
            return `Invalid transposition by ${d.semitones} semitones`;
        case 'nested-chord':
            return `Chord '${d.chord}' is placed inside another chord's lyrics`;
        case 'unknown-chorus-reference':
            return `Reference to chorus ${d.num}, which is not declared earlier in the song`;
        case 'duplicate-chorus-label':
            return `Chorus ${d.num} is declared more than once`;
        case 'unterminated-fence':
            return `Preformatted block is not closed before the end of the song`;
        case 'content-before-title':
            return `Content before the first song title is ignored`;
        case 'extra-lines-tail':
            return `${d.lines} line(s) at the end of the song could not be parsed`;
        case 'invalid-config':
            return `Invalid book configuration: ${d.issues.join('; ')}`;
        default:
            return assertNever(d);
    }
}

export function locationToString(location: Location | undefined): string {
    if (location === undefined) {
        return '';
    }
    const file = location.file !== undefined ? `${location.file}:` : '';
    const column = location.column !== undefined ? `:${location.column}` : '';
    const song = location.song !== undefined ? ` [${location.song}]` : '';
    return `${file}${location.line}${column}${song}: `;
}
