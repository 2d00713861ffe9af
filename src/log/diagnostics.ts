export type Severity =
    | 'error' | undefined // NOTE: treat undefined as 'error'
    | 'warning'
    | 'info'
    ;

export type Location = {
    file?: string,
    song?: string,
    line: number,
    column?: number,
};

type Diag<K extends string> = {
    diag: K,
    severity?: Severity,
    location?: Location,
};

export type ParserDiagnostic =
    | Diag<'syntax-error'> & { expected: string, found?: string }
    | Diag<'unsupported-notation'> & { name: string }
    | Diag<'invalid-transposition'> & { semitones: number }
    | Diag<'nested-chord'> & { chord: string }
    | Diag<'unknown-chorus-reference'> & { num: number }
    | Diag<'duplicate-chorus-label'> & { num: number }
    | Diag<'unterminated-fence'>
    | Diag<'content-before-title'>
    | Diag<'extra-lines-tail'> & { lines: number }
    | Diag<'invalid-config'> & { issues: string[] }
    ;

export function withLocation<D extends ParserDiagnostic>(diag: D, location: Location): D {
    return diag.location === undefined
        ? { ...diag, location }
        : { ...diag, location: { ...location, ...diag.location } };
}
