#! /usr/bin/env node
import * as fs from 'fs';
import { extname, join, dirname, basename } from 'path';
import { promisify } from 'util';
import { parseBook, Book, SourceFile, diagnosticList } from '.';
import { logger, logTime, diagnoser, Logger, Verbosity } from './log';

exec().catch(err => {
    // tslint:disable-next-line: no-console
    console.error(err);
    process.exitCode = 1;
});

async function exec() {
    const args = process.argv.slice(2);
    const verbosity: Verbosity = args.includes('-q') ? 'quiet'
        : args.includes('-v') ? 'verbose'
            : 'normal';
    const [path, title] = args.filter(a => !a.startsWith('-'));
    const log = logger(verbosity);
    if (!path) {
        log.warn('You need to pass a song file or directory as an arg');
        process.exitCode = 2;
        return;
    }
    if (!fs.existsSync(path)) {
        log.warn(`Couldn't find file or directory: ${path}`);
        process.exitCode = 2;
        return;
    }

    const paths = (await listFiles(path)).filter(isSongFile);
    log.info(`Song files: ${paths.join(', ')}`);
    const files = await Promise.all(paths.map(readSource));
    const bookTitle = title !== undefined ? title : basename(path, extname(path));
    const book = logTime(log, 'parsing', () => processBook(log, path, bookTitle, files));
    if (book === undefined) {
        process.exitCode = 1;
        return;
    }
    log.important(`Parsed ${book.songs.length} song(s) from ${files.length} file(s)`);

    const pathToSave = outputPath(path);
    await saveBook(pathToSave, book);
    log.important(`Saved: ${pathToSave}`);
}

function processBook(log: Logger, path: string, title: string, files: SourceFile[]): Book | undefined {
    const result = parseBook({ config: { title }, files });
    const diag = diagnoser({ file: path });
    for (const d of diagnosticList(result.diagnostic)) {
        diag.add(d);
    }
    diag.log(log);
    return result.success
        ? result.value
        : undefined;
}

async function listFiles(path: string) {
    const isDirectory = (await promisify(fs.lstat)(path)).isDirectory();
    if (isDirectory) {
        const files = await promisify(fs.readdir)(path);
        return files.sort().map(f => join(path, f));
    } else {
        return [path];
    }
}

async function readSource(path: string): Promise<SourceFile> {
    const source = await promisify(fs.readFile)(path, 'utf8');
    return { path, source };
}

function isSongFile(path: string): boolean {
    return extname(path) === '.md';
}

function outputPath(path: string): string {
    return extname(path) === '.md'
        ? join(dirname(path), `${basename(path, '.md')}.chordbook.json`)
        : join(path, `${basename(path)}.chordbook.json`);
}

async function saveBook(path: string, book: Book) {
    const str = JSON.stringify({ book }, undefined, 2);
    return promisify(fs.writeFile)(path, str);
}
