export function isWhitespaces(input: string): boolean {
    return input.match(/^\s*$/) ? true : false;
}

export function equalsToOneOf<TX, TO extends TX>(x: TX, opts: readonly TO[]): x is TO {
    for (const o of opts) {
        if (x === o) {
            return true;
        }
    }
    return false;
}

export function last<T>(arr: T[]): T | undefined {
    return arr[arr.length - 1];
}

export function flatten<T>(arrArr: T[][]): T[] {
    return arrArr.reduce((all, arr) => all.concat(arr), []);
}

export function mod(n: number, m: number): number {
    return ((n % m) + m) % m;
}

export function assertNever(x: never): never {
    throw new Error(`Should not be here: ${JSON.stringify(x)}`);
}

export function deepFreeze<T>(obj: T): T {
    if (typeof obj === 'object' && obj !== null && !Object.isFrozen(obj)) {
        Object.freeze(obj);
        for (const value of Object.values(obj)) {
            deepFreeze(value);
        }
    }
    return obj;
}
