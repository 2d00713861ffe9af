import {
    Parser, yieldNext, reject, ResultLast, projectFirst, seq,
} from './base';
import { Diagnostic } from './diagnostics';

export type Stream<T, E> = {
    stream: T[],
    env: E,
};
export type StreamParser<TIn, TOut, TEnv> =
    Parser<Stream<TIn, TEnv>, TOut>;

export function makeStream<I, E>(arr: I[], env: E): Stream<I, E> {
    return {
        stream: arr,
        env: env,
    };
}

export function nextStream<T, E>(input: Stream<T, E>, count: number = 1): Stream<T, E> {
    return {
        stream: input.stream.slice(count),
        env: input.env,
    };
}

export type HeadFn<In, Out, Env> = (head: In, env: Env) => ResultLast<Out>;
export function headParser<In, Out, Env>(f: HeadFn<In, Out, Env>): StreamParser<In, Out, Env> {
    return (input: Stream<In, Env>) => {
        const head = input.stream[0];
        if (head === undefined) {
            return reject();
        }
        const result = f(head, input.env);
        return result.success
            ? {
                ...result,
                next: nextStream(input),
            }
            : result;
    };
}

export function reportUnparsedTail<In, Out, E>(
    single: StreamParser<In, Out, E>,
    reporter: (stream: Stream<In, E>) => Diagnostic,
): StreamParser<In, Out, E> {
    const tail: StreamParser<In, undefined, E> = input => {
        if (input.stream.length > 0) {
            return yieldNext(undefined, input, reporter(input));
        } else {
            return yieldNext(undefined, input);
        }
    };
    return projectFirst(seq(single, tail));
}
