export type Version = {
    major: number,
    minor: number,
    patch: number,
};

export type AstVersion = {
    version: Version,
    description: string,
};

export const astVersionLog: AstVersion[] = [
    astVersion(1, 0, 'Initial version'),
    astVersion(1, 1, 'New style, added support for HTML snippets, TTF font files, and baseline chords'),
    astVersion(1, 2, 'Added scaling of images in HTML via the dpi setting, width and height are now provided in i-image elements'),
];

function astVersion(major: number, minor: number, description: string): AstVersion {
    return {
        version: { major, minor, patch: 0 },
        description,
    };
}

export function currentAstVersion(): Version {
    return astVersionLog[astVersionLog.length - 1].version;
}

export function parseVersion(text: string): Version | undefined {
    const match = text.trim().match(/^v?(\d+)\.(\d+)(?:\.(\d+))?$/);
    if (!match) {
        return undefined;
    }
    const [, major, minor, patch] = match;
    return {
        major: parseInt(major, 10),
        minor: parseInt(minor, 10),
        patch: patch !== undefined ? parseInt(patch, 10) : 0,
    };
}

export function compareVersions(left: Version, right: Version): number {
    return left.major - right.major
        || left.minor - right.minor
        || left.patch - right.patch;
}

export function versionToString(version: Version): string {
    return `${version.major}.${version.minor}.${version.patch}`;
}

export type AstCompat =
    | 'same'
    | 'newer'       // template expects a newer tree than this parser produces
    | 'older-major' // template is from an incompatible older generation
    | 'older-minor'
    ;

export function checkAstCompat(templateVersion: Version): AstCompat {
    const current = currentAstVersion();
    const cmp = compareVersions(current, templateVersion);
    if (cmp < 0) {
        return 'newer';
    } else if (current.major > templateVersion.major) {
        return 'older-major';
    } else if (cmp > 0) {
        return 'older-minor';
    } else {
        return 'same';
    }
}

export function changesSince(version: Version): AstVersion[] {
    return astVersionLog.filter(v => compareVersions(v.version, version) > 0);
}
