export enum LogLevel {
    verbose, // internal bookkeeping, hidden by the console appender
    info, // worth showing but nothing is wrong
    warn, // misuse that was tolerated
    error // operation was rejected
}

export interface LogMessage {
    inputId: number;
    loglevel: LogLevel;
    message: string;
    tag?: string;
}

export type Appender = (message: LogMessage) => void;

export interface Logger {
    verbose(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}
