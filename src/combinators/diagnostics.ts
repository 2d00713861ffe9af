import { ParserDiagnostic } from '../log';

export type EmptyDiagnostic = undefined;
type SimpleDiagnostic = ParserDiagnostic | EmptyDiagnostic;
type CompoundDiagnostic = SimpleDiagnostic[];

export type Diagnostic = SimpleDiagnostic | CompoundDiagnostic;

export function getErrors(diag: Diagnostic): Diagnostic {
    if (diag === undefined) {
        return diag;
    } else if (isCompoundDiagnostic(diag)) {
        return compoundDiagnostic(diag.map(getErrors));
    } else {
        return diag.severity === 'error' || diag.severity === undefined
            ? diag
            : undefined;
    }
}

export function hasErrors(diag: Diagnostic): boolean {
    return getErrors(diag) !== undefined;
}

export function compoundDiagnostic(diags: Diagnostic[]): Diagnostic {
    const result = diags.reduce<ParserDiagnostic[]>(
        (all, one) => {
            if (isCompoundDiagnostic(one)) {
                all.push(...diagnosticList(one));
            } else if (one !== undefined) {
                all.push(one);
            }
            return all;
        },
        []);
    return result.length === 0 ? undefined
        : result.length === 1 ? result[0]
            : result;
}

export function diagnosticList(diag: Diagnostic): ParserDiagnostic[] {
    if (diag === undefined) {
        return [];
    } else if (isCompoundDiagnostic(diag)) {
        return diag.filter((d): d is ParserDiagnostic => d !== undefined);
    } else {
        return [diag];
    }
}

export function isCompoundDiagnostic(d: Diagnostic): d is CompoundDiagnostic {
    return Array.isArray(d);
}
