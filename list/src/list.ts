import { createLogger, type Logger } from '@chainlist/diagnostics';
import { warnIfForeign } from './debug.js';
import { DisposedListError, EmptyListError, InvalidIteratorError } from './errors.js';
import { Cursor, type ListIterator } from './iterator.js';
import { HEAD, NodeStore, TAIL } from './store.js';

export interface ListOptions {
    /**
     * Tag of the default logger, `list` by default. Ignored when `logger` is given
     */
    tag?: string;
    /**
     * Diagnostics sink, a tagged logger from `@chainlist/diagnostics` by default
     */
    logger?: Logger;
}

export class List<T> implements Iterable<T> {
    private readonly store = new NodeStore<T>();
    private readonly logger: Logger;

    constructor(initialItems: Iterable<T> = [], options: ListOptions = {}) {
        this.logger = options.logger ?? createLogger(options.tag ?? 'list');
        for (const item of initialItems) {
            this.store.linkBefore(this.store.allocate(item), TAIL);
        }
    }

    /**
     * O(1)
     */
    get empty() {
        this.assertAlive();
        return this.store.next(HEAD) === TAIL;
    }

    /**
     * Counts the nodes, O(n)
     */
    get size() {
        this.assertAlive();
        let size = 0;
        for (let current = this.store.next(HEAD); current !== TAIL; current = this.store.next(current)) {
            size++;
        }
        return size;
    }

    push(...items: T[]) {
        this.assertAlive();
        for (const item of items) {
            this.store.linkBefore(this.store.allocate(item), TAIL);
        }
    }

    unshift(...items: T[]) {
        this.assertAlive();
        for (let i = items.length - 1; i >= 0; i--) {
            this.store.linkAfter(this.store.allocate(items[i]), HEAD);
        }
    }

    pop(): T {
        this.assertNotEmpty('pop');
        return this.store.unlink(this.store.previous(TAIL));
    }

    shift(): T {
        this.assertNotEmpty('shift');
        return this.store.unlink(this.store.next(HEAD));
    }

    front(): T {
        this.assertNotEmpty('read the front of');
        return this.store.value(this.store.next(HEAD));
    }

    back(): T {
        this.assertNotEmpty('read the back of');
        return this.store.value(this.store.previous(TAIL));
    }

    toArray(): T[] {
        return Array.from(this);
    }

    begin(): ListIterator<T> {
        this.assertAlive();
        return new Cursor(this.store, this.store.next(HEAD), this.logger);
    }

    end(): ListIterator<T> {
        this.assertAlive();
        return new Cursor(this.store, TAIL, this.logger);
    }

    /**
     * Removes the node under `iterator` and returns an iterator to the node
     * that followed it (`end()` when the last item was erased).
     * `iterator` is invalid afterwards.
     */
    erase(iterator: ListIterator<T>): ListIterator<T> {
        this.assertAlive();
        if (!(iterator instanceof Cursor) || iterator.store !== this.store) {
            warnIfForeign(this.logger);
            throw new InvalidIteratorError('Iterator does not belong to this list.');
        }
        return iterator.erase();
    }

    /**
     * Removes every item. Iterators to items become invalid, iterators at the
     * list boundaries stay usable.
     */
    clear() {
        this.assertAlive();
        const released = this.store.clear();
        this.logger.verbose(`Cleared ${released} node(s).`);
    }

    /**
     * Releases every node and invalidates all iterators of the list.
     */
    dispose() {
        if (this.store.disposed) {
            this.logger.warn('List is already disposed.');
            return;
        }
        const released = this.store.dispose();
        this.logger.verbose(`Disposed list, released ${released} node(s).`);
    }

    /**
     * Values from front to back. Nodes may be inserted or erased while the
     * iteration runs: erased nodes are stepped over through the successor
     * they had when they were unlinked. If the storage of such a node was
     * reused in the meantime the iteration ends with `InvalidIteratorError`.
     */
    [Symbol.iterator](): Iterator<T> {
        this.assertAlive();
        const store = this.store;
        let current = HEAD;
        let generation = store.generation(current);
        return {
            next: () => {
                this.assertAlive();
                const position = store.successor(current, generation);
                if (position === undefined) {
                    throw new InvalidIteratorError('List was modified ahead of the iteration.');
                }
                current = position.slot;
                generation = position.generation;
                if (current === TAIL) {
                    return { done: true, value: undefined };
                }
                return { done: false, value: store.value(current) };
            }
        };
    }

    private assertAlive() {
        if (this.store.disposed) {
            throw new DisposedListError('List has been disposed.');
        }
    }

    private assertNotEmpty(operation: string) {
        if (this.empty) {
            throw new EmptyListError(`Cannot ${operation} an empty list.`);
        }
    }
}
