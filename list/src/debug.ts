import type { Logger } from '@chainlist/diagnostics';

/**
 * Debug configuration flag: Warn when an erased or disposed iterator is used
 */
export const WARN_ON_STALE_ITERATOR = 1 << 0;

/**
 * Debug configuration flag: Warn when an iterator is handed to a list it does not belong to
 */
export const WARN_ON_FOREIGN_ITERATOR = 1 << 1;

/**
 * Current debug configuration bitfield
 */
let debugConfigFlags = 0;

/**
 * Configure debug behavior using a bitfield of flags
 */
export const debugConfig = (flags: number): void => {
    debugConfigFlags = flags | 0;
};

export const warnIfStale = (logger: Logger, operation: string): void => {
    if (debugConfigFlags & WARN_ON_STALE_ITERATOR) {
        logger.warn(`Tried to ${operation} through an invalidated iterator.`);
    }
};

export const warnIfForeign = (logger: Logger): void => {
    if (debugConfigFlags & WARN_ON_FOREIGN_ITERATOR) {
        logger.warn('Tried to erase through an iterator of another list.');
    }
};
