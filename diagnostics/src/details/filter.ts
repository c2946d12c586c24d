import type { Appender, LogMessage } from './types.js';

export function filterMessages(predicate: (logMessage: LogMessage) => boolean, appender: Appender): Appender {
    return function(logMessage: LogMessage) {
        if (predicate(logMessage)) {
            appender(logMessage);
        }
    };
}
