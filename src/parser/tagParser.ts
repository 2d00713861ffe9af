import { parseXml } from '@rgrove/parse-xml';
import { ResultLast, yieldLast, reject } from '../combinators';
import { TagInline } from '../book/book';

/**
 * Finds the end of a tag that starts at `pos`, skipping quoted attribute values.
 * Returns the index just past `>` or undefined when the tag is not closed.
 */
export function findTagEnd(text: string, pos: number): number | undefined {
    let quote: string | undefined = undefined;
    for (let idx = pos + 1; idx < text.length; idx++) {
        const ch = text[idx];
        if (quote !== undefined) {
            if (ch === quote) {
                quote = undefined;
            }
        } else if (ch === '"' || ch === '\'') {
            quote = ch;
        } else if (ch === '>') {
            return idx + 1;
        } else if (ch === '<') {
            return undefined;
        }
    }
    return undefined;
}

export function startsTag(text: string): boolean {
    return /^<\/?[A-Za-z]/.test(text);
}

export function parseTag(text: string): ResultLast<TagInline> {
    const closing = text.match(/^<\/([A-Za-z][\w.:-]*)\s*>$/);
    if (closing) {
        return yieldLast({
            type: 'i-tag',
            name: `/${closing[1]}`,
            attrs: {},
        });
    }

    const selfClosing = text.replace(/\s*\/?>$/, '/>');
    try {
        const document = parseXml(selfClosing, {
            ignoreUndefinedEntities: true,
        });
        const element = document.root;
        if (element === null) {
            return reject(tagSyntaxError(text));
        }
        return yieldLast({
            type: 'i-tag',
            name: element.name,
            attrs: { ...element.attributes },
        });
    } catch (e) {
        return reject(tagSyntaxError(text));
    }
}

function tagSyntaxError(found: string) {
    return {
        diag: 'syntax-error' as const,
        expected: 'well-formed tag',
        found,
    };
}
