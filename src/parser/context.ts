import { Diagnostic, compoundDiagnostic, diagnosticList } from '../combinators';
import { withLocation, Location } from '../log';
import { Notation } from '../music/notation';
import {
    DirectiveState, initialDirectiveState, parseDirective, applyDirective,
} from './directive';
import { InlineEnv } from './inlineParser';

export type SongSettings = {
    notation: Notation,
    smartPunctuation: boolean,
    chorusLabel: string,
};

export type SourceLine = {
    text: string,
    line: number,
};

export type LabelRecord = {
    kind: 'chorus-declaration' | 'chorus-reference',
    num: number,
    line: number,
};

/**
 * Mutable state of one song's parse: directive rows, verse counter,
 * chorus labels seen so far. Never shared between songs.
 */
export class SongContext {
    private state: DirectiveState;
    private lastVerse = 0;
    private readonly labelRecords: LabelRecord[] = [];

    constructor(
        readonly settings: SongSettings,
        readonly song: string,
        readonly file?: string,
    ) {
        this.state = initialDirectiveState(settings.notation);
    }

    get directives(): DirectiveState {
        return this.state;
    }

    get labels(): LabelRecord[] {
        return this.labelRecords;
    }

    public applyDirectiveLine(line: SourceLine): Diagnostic {
        const directive = parseDirective(line.text);
        if (!directive.success) {
            return this.locate(directive.diagnostic, line.line);
        }
        this.state = applyDirective(this.state, directive.value);
        return undefined;
    }

    public verseNumber(written: number | undefined): number {
        return written !== undefined && written > this.lastVerse
            ? written
            : this.lastVerse + 1;
    }

    public commitVerse(num: number) {
        this.lastVerse = num;
    }

    public registerLabels(records: LabelRecord[]) {
        this.labelRecords.push(...records);
    }

    public inlineEnv(line: number, column: number): InlineEnv {
        return {
            state: this.state,
            notation: this.settings.notation,
            smartPunctuation: this.settings.smartPunctuation,
            line,
            column,
        };
    }

    public location(line: number): Location {
        return {
            file: this.file,
            song: this.song,
            line,
        };
    }

    public locate(diag: Diagnostic, line: number): Diagnostic {
        const location = this.location(line);
        return compoundDiagnostic(diagnosticList(diag).map(
            d => withLocation(d, location),
        ));
    }
}
