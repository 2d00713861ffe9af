import { parseBookConfig, bookMeta, songSettings } from './config';
import { expectSuccess } from './utils';

it('defaults', () => {
    const result = parseBookConfig({ title: 'Campfire' });
    expect(result).toEqual({
        success: true,
        value: {
            title: 'Campfire',
            chorus_label: 'Ch',
            notation: 'english',
            smart_punctuation: true,
        },
        diagnostic: undefined,
    });
});

it('notation is case insensitive', () => {
    const result = parseBookConfig({ title: 'Campfire', notation: 'German' });
    expect(expectSuccess(result) && result.value.notation).toBe('german');
});

it('invalid config reports issues', () => {
    const result = parseBookConfig({ title: '', smart_punctuation: 'yes' });
    expect(result.success).toBe(false);
    expect(result.diagnostic).toMatchObject({ diag: 'invalid-config' });
    const issues = !Array.isArray(result.diagnostic)
        && result.diagnostic !== undefined
        && result.diagnostic.diag === 'invalid-config'
        ? result.diagnostic.issues
        : [];
    expect(issues).toHaveLength(2);
    expect(issues[0]).toBe('title: title must not be empty');
});

it('unknown notation is rejected', () => {
    expect(parseBookConfig({ title: 'x', notation: 'klingon' }).success).toBe(false);
});

it('bookMeta and songSettings', () => {
    const result = parseBookConfig({ title: 'Campfire', subtitle: 'Vol. 1', chorus_label: 'R' });
    if (!expectSuccess(result)) {
        return;
    }
    expect(bookMeta(result.value)).toEqual({
        title: 'Campfire',
        subtitle: 'Vol. 1',
        chorus_label: 'R',
        notation: 'english',
    });
    expect(songSettings(result.value)).toEqual({
        notation: 'english',
        smartPunctuation: true,
        chorusLabel: 'R',
    });
});
