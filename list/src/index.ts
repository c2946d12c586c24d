export { List, type ListOptions } from './list.js';
export type { ListIterator } from './iterator.js';
export { DisposedListError, EmptyListError, InvalidIteratorError, ListError } from './errors.js';
export { debugConfig, WARN_ON_FOREIGN_ITERATOR, WARN_ON_STALE_ITERATOR } from './debug.js';
