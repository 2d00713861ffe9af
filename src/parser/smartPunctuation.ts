const openingContext = /[\s([{—–-]/;

/**
 * Replaces ASCII punctuation with its typographic form.
 * `before` is the character that precedes `text` in the paragraph, if any.
 */
export function smartPunctuation(text: string, before?: string): string {
    let result = '';
    let prev = before;
    let pos = 0;
    while (pos < text.length) {
        const rest = text.substring(pos);
        let replacement: string;
        let length = 1;
        if (rest.startsWith('...')) {
            replacement = '…';
            length = 3;
        } else if (rest.startsWith('---')) {
            replacement = '—';
            length = 3;
        } else if (rest.startsWith('--')) {
            replacement = '–';
            length = 2;
        } else if (rest[0] === '"') {
            replacement = opens(prev) ? '“' : '”';
        } else if (rest[0] === '\'') {
            replacement = opens(prev) ? '‘' : '’';
        } else {
            replacement = rest[0];
        }
        result += replacement;
        prev = replacement;
        pos += length;
    }
    return result;
}

function opens(prev: string | undefined): boolean {
    return prev === undefined || openingContext.test(prev);
}
