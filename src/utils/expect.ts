import { ResultLast, SuccessLast } from '../combinators';

export function expectSuccess<T>(result: ResultLast<T>): result is SuccessLast<T> {
    if (!result.success) {
        throw new Error(`Expected success, got failure: ${JSON.stringify(result.diagnostic)}`);
    }
    return true;
}
