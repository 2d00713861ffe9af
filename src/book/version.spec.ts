import {
    currentAstVersion, checkAstCompat, changesSince, parseVersion, versionToString,
} from './version';

it('current version is the last log entry', () => {
    expect(versionToString(currentAstVersion())).toBe('1.2.0');
});

it('parseVersion', () => {
    expect(parseVersion('1.2.3')).toEqual({ major: 1, minor: 2, patch: 3 });
    expect(parseVersion('v1.1')).toEqual({ major: 1, minor: 1, patch: 0 });
    expect(parseVersion('one.two')).toBeUndefined();
});

it('checkAstCompat', () => {
    expect(checkAstCompat({ major: 1, minor: 2, patch: 0 })).toBe('same');
    expect(checkAstCompat({ major: 1, minor: 2, patch: 3 })).toBe('newer');
    expect(checkAstCompat({ major: 2, minor: 0, patch: 0 })).toBe('newer');
    expect(checkAstCompat({ major: 1, minor: 0, patch: 0 })).toBe('older-minor');
    expect(checkAstCompat({ major: 0, minor: 9, patch: 0 })).toBe('older-major');
});

it('changesSince lists later entries only', () => {
    const changes = changesSince({ major: 1, minor: 0, patch: 5 });
    expect(changes.map(c => versionToString(c.version))).toEqual(['1.1.0', '1.2.0']);
    expect(changesSince(currentAstVersion())).toEqual([]);
});
