import kleur from 'kleur';
import { LogLevel, type LogMessage } from './types.js';

export function formatMessage(logMessage: LogMessage) {
    let prefix = '';
    switch (logMessage.loglevel) {
    case LogLevel.warn:
        prefix = kleur.yellow('!') + ' ';
        break;
    case LogLevel.error:
        prefix = kleur.red('✕') + ' ';
        break;
    }
    const tag = logMessage.tag !== undefined ? `[${logMessage.tag}] ` : '';
    return `${prefix}${tag}${logMessage.message}`;
}

export function consoleAppender(logMessage: LogMessage) {
    if (logMessage.loglevel > LogLevel.verbose) {
        const line = formatMessage(logMessage);
        if (logMessage.loglevel === LogLevel.error) {
            console.error(line);
        } else if (logMessage.loglevel === LogLevel.warn) {
            console.warn(line);
        } else {
            console.log(line);
        }
    }
}
