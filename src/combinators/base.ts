import { Diagnostic, compoundDiagnostic } from './diagnostics';

export type Parser<TIn, TOut> = (input: TIn) => Result<TIn, TOut>;
export type SuccessParser<TIn, TOut> = (input: TIn) => SuccessNext<TIn, TOut>;
export type SuccessLast<Out> = {
    success: true,
    value: Out,
    diagnostic?: Diagnostic,
};
export type SuccessNext<In, Out> = SuccessLast<Out> & {
    next?: In,
};
export type Fail = {
    success: false,
    diagnostic?: Diagnostic,
};

export type Result<In, Out> = SuccessNext<In, Out> | Fail;
export type ResultLast<Out> = SuccessLast<Out> | Fail;

export function reject(reason?: Diagnostic): Fail {
    return { success: false, diagnostic: reason };
}

export function yieldLast<Out>(value: Out, diagnostic?: Diagnostic): SuccessLast<Out> {
    return {
        success: true,
        value, diagnostic,
    };
}

export function yieldNext<TIn, TOut>(value: TOut, next: TIn | undefined, diagnostic?: Diagnostic): SuccessNext<TIn, TOut> {
    return {
        value, next, diagnostic,
        success: true,
    };
}

export function seq<TI, T1, T2>(p1: Parser<TI, T1>, p2: Parser<TI, T2>): Parser<TI, [T1, T2]>;
export function seq<TI, T1, T2, T3>(p1: Parser<TI, T1>, p2: Parser<TI, T2>, p3: Parser<TI, T3>): Parser<TI, [T1, T2, T3]>;
export function seq<TI, TS>(...ps: Array<Parser<TI, TS>>): Parser<TI, TS[]>;
export function seq<TI>(...ps: Array<Parser<TI, unknown>>): Parser<TI, unknown[]> {
    return input => {
        let currentInput: TI | undefined = input;
        const results: unknown[] = [];
        const diagnostics: Diagnostic[] = [];
        for (const p of ps) {
            if (currentInput === undefined) {
                return reject();
            }
            const result = p(currentInput);
            if (!result.success) {
                return result;
            }
            results.push(result.value);
            diagnostics.push(result.diagnostic);
            currentInput = result.next;
        }

        const diagnostic = compoundDiagnostic(diagnostics);
        return yieldNext(results, currentInput, diagnostic);
    };
}

export function choice<TI, T1, T2>(p1: Parser<TI, T1>, p2: Parser<TI, T2>): Parser<TI, T1 | T2>;
export function choice<TI, T1, T2, T3>(p1: Parser<TI, T1>, p2: Parser<TI, T2>, p3: Parser<TI, T3>): Parser<TI, T1 | T2 | T3>;
export function choice<TI, TS>(...ps: Array<Parser<TI, TS>>): Parser<TI, TS>;
export function choice<TI>(...ps: Array<Parser<TI, unknown>>): Parser<TI, unknown> {
    return input => {
        const failReasons: Diagnostic[] = [];
        for (const p of ps) {
            const result = p(input);
            if (result.success) {
                return result;
            }
            failReasons.push(result.diagnostic);
        }

        return reject(compoundDiagnostic(failReasons));
    };
}

export function projectFirst<TI, T1, T2>(parser: Parser<TI, [T1, T2]>): Parser<TI, T1> {
    return translate(parser, result => result[0]);
}

export function some<In, Out>(parser: Parser<In, Out>): SuccessParser<In, Out[]> {
    return input => {
        const results: Out[] = [];
        const diagnostics: Diagnostic[] = [];
        let currentInput: In | undefined = input;
        while (currentInput !== undefined) {
            const currentResult: Result<In, Out> = parser(currentInput);
            if (!currentResult.success) {
                break;
            }
            results.push(currentResult.value);
            diagnostics.push(currentResult.diagnostic);
            currentInput = currentResult.next;
        }

        const diagnostic = compoundDiagnostic(diagnostics);
        return yieldNext(results, currentInput, diagnostic);
    };
}

export function translate<TI, From, To>(parser: SuccessParser<TI, From>, f: (from: From, input: TI) => To): SuccessParser<TI, To>;
export function translate<TI, From, To>(parser: Parser<TI, From>, f: (from: From, input: TI) => To): Parser<TI, To>;
export function translate<TI, From, To>(parser: Parser<TI, From>, f: (from: From, input: TI) => To): Parser<TI, To> {
    return input => {
        const from = parser(input);
        if (from.success) {
            const translated = f(from.value, input);
            return yieldNext(translated, from.next, from.diagnostic);
        } else {
            return from;
        }
    };
}

