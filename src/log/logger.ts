export type LogLevel = 'info' | 'important' | 'warn';

export type Logger = {
    [k in LogLevel]: (message: string) => void;
};

export type LoggerSettings = {
    [k in LogLevel]?: boolean;
};

export type Verbosity = 'quiet' | 'normal' | 'verbose';

export function logger(verbosity: Verbosity = 'normal'): Logger {
    switch (verbosity) {
        case 'quiet':
            return loggerImpl({ warn: true });
        case 'verbose':
            return loggerImpl({ warn: true, important: true, info: true });
        default:
            return loggerImpl({ warn: true, important: true });
    }
}

export function logTime<T = void>(log: Logger, msg: string, f: () => T): T {
    const begin = Date.now();
    log.info(`${msg} - start`);
    const result = f();
    const end = Date.now();
    const diff = end - begin;
    log.info(`${msg} duration: ${diff / 1000}s`);
    return result;
}

function loggerImpl(settings: LoggerSettings): Logger {
    return {
        info(message: string) {
            if (settings.info) {
                // tslint:disable-next-line: no-console
                console.log(message);
            }
        },

        warn(message: string) {
            if (settings.warn) {
                // tslint:disable-next-line: no-console
                console.warn(message);
            }
        },

        important(message: string) {
            if (settings.important) {
                // tslint:disable-next-line: no-console
                console.log(message);
            }
        },
    };
}
