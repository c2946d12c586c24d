import { consoleAppender, formatMessage } from './details/consoleAppender.js';
import { filterMessages } from './details/filter.js';
import { LogLevel, type Appender, type Logger } from './details/types.js';

let globalInputId = 0;

let currentAppender: Appender = consoleAppender;

export function createLogger(tag?: string): Logger {
    const inputId = globalInputId++;
    const emit = (loglevel: LogLevel, message: string) => {
        currentAppender({
            inputId,
            loglevel,
            message,
            tag
        });
    };
    return {
        verbose(message: string) {
            emit(LogLevel.verbose, message);
        },
        info(message: string) {
            emit(LogLevel.info, message);
        },
        warn(message: string) {
            emit(LogLevel.warn, message);
        },
        error(message: string) {
            emit(LogLevel.error, message);
        }
    };
}

export function setAppender(appender: Appender) {
    currentAppender = appender;
}

export { consoleAppender, formatMessage, filterMessages, LogLevel };
export type { Appender, Logger, LogMessage } from './details/types.js';
