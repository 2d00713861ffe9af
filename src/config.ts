import { z } from 'zod';
import { ResultLast, yieldLast, reject } from './combinators';
import { notations } from './music/notation';
import { BookMeta } from './book/book';
import { SongSettings } from './parser/context';

const notationSchema = z.preprocess(
    value => typeof value === 'string' ? value.trim().toLowerCase() : value,
    z.enum(notations),
);

export const bookConfigSchema = z.object({
    title: z.string().min(1, 'title must not be empty'),
    subtitle: z.string().optional(),
    front_img: z.string().optional(),
    title_note: z.string().optional(),
    chorus_label: z.string().default('Ch'),
    notation: notationSchema.default('english'),
    smart_punctuation: z.boolean().default(true),
});

export type BookConfig = z.output<typeof bookConfigSchema>;
export type BookConfigInput = z.input<typeof bookConfigSchema>;

export function parseBookConfig(raw: unknown): ResultLast<BookConfig> {
    const parsed = bookConfigSchema.safeParse(raw);
    if (parsed.success) {
        return yieldLast(parsed.data);
    }
    return reject({
        diag: 'invalid-config',
        issues: parsed.error.issues.map(
            issue => issue.path.length > 0
                ? `${issue.path.join('.')}: ${issue.message}`
                : issue.message,
        ),
    });
}

export function bookMeta(config: BookConfig): BookMeta {
    return {
        title: config.title,
        ...(config.subtitle !== undefined ? { subtitle: config.subtitle } : {}),
        ...(config.front_img !== undefined ? { front_img: config.front_img } : {}),
        ...(config.title_note !== undefined ? { title_note: config.title_note } : {}),
        chorus_label: config.chorus_label,
        notation: config.notation,
    };
}

export function songSettings(config: BookConfig): SongSettings {
    return {
        notation: config.notation,
        smartPunctuation: config.smart_punctuation,
        chorusLabel: config.chorus_label,
    };
}
