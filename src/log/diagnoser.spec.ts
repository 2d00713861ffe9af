import { diagnoser, diagnosticMessage, locationToString } from './diagnoser';
import { Logger } from './logger';

function recordingLogger() {
    const lines: string[] = [];
    const log: Logger = {
        info: message => lines.push(`info: ${message}`),
        important: message => lines.push(`important: ${message}`),
        warn: message => lines.push(`warn: ${message}`),
    };
    return { log, lines };
}

it('diagnosticMessage', () => {
    expect(diagnosticMessage({ diag: 'syntax-error', expected: 'chord', found: 'X' }))
        .toBe('Syntax error: expected chord, found \'X\'');
    expect(diagnosticMessage({ diag: 'unknown-chorus-reference', num: 2 }))
        .toBe('Reference to chorus 2, which is not declared earlier in the song');
    expect(diagnosticMessage({ diag: 'invalid-config', issues: ['a', 'b'] }))
        .toBe('Invalid book configuration: a; b');
});

it('locationToString', () => {
    expect(locationToString({ file: 'songs.md', song: 'Song', line: 3, column: 7 }))
        .toBe('songs.md:3:7 [Song]: ');
    expect(locationToString({ line: 1 })).toBe('1: ');
    expect(locationToString(undefined)).toBe('');
});

it('ParserDiagnoser.log', () => {
    const { log, lines } = recordingLogger();
    const diag = diagnoser({ file: 'songs.md' });
    diag.add({ diag: 'unterminated-fence', severity: 'warning', location: { line: 4 } });
    diag.add({ diag: 'content-before-title', severity: 'info' });
    diag.log(log);
    expect(lines).toEqual([
        'warn: Parse file: songs.md',
        'warn: 4: Preformatted block is not closed before the end of the song',
        'info: Content before the first song title is ignored',
        'warn: -----',
    ]);
});

it('ParserDiagnoser.log is silent without diagnostics', () => {
    const { log, lines } = recordingLogger();
    diagnoser({}).log(log);
    expect(lines).toEqual([]);
});
