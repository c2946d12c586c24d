import type { Logger } from '@chainlist/diagnostics';
import { warnIfStale } from './debug.js';
import { InvalidIteratorError } from './errors.js';
import { HEAD, TAIL, type NodeStore } from './store.js';

/**
 * Stable cursor over one node of a list.
 *
 * Stays usable while its node is linked, whatever happens to the rest of
 * the list. Once the node is erased (or the list disposed) every operation
 * except `valid` and `equals` throws `InvalidIteratorError`.
 */
export interface ListIterator<T> {
    /**
     * `false` once the referenced node has been erased or the list disposed
     */
    readonly valid: boolean;
    /**
     * Item of the referenced node, throws on the end position
     */
    readonly value: T;
    next(): ListIterator<T>;
    previous(): ListIterator<T>;
    insertAfter(...items: T[]): void;
    insertBefore(...items: T[]): void;
    equals(other: ListIterator<T>): boolean;
}

export class Cursor<T> implements ListIterator<T> {
    private readonly generation: number;

    constructor(
        readonly store: NodeStore<T>,
        private readonly slot: number,
        private readonly logger: Logger
    ) {
        this.generation = store.generation(slot);
    }

    get valid() {
        return this.store.isLive(this.slot, this.generation);
    }

    get value(): T {
        this.check('dereference');
        if (this.slot === HEAD || this.slot === TAIL) {
            throw new InvalidIteratorError('Cannot dereference an iterator at a list boundary.');
        }
        return this.store.value(this.slot);
    }

    next(): ListIterator<T> {
        this.check('advance');
        if (this.slot === TAIL) {
            throw new InvalidIteratorError('Cannot advance past the end of the list.');
        }
        return this.at(this.store.next(this.slot));
    }

    previous(): ListIterator<T> {
        this.check('step back');
        if (this.slot === HEAD) {
            throw new InvalidIteratorError('Cannot step back before the start of the list.');
        }
        return this.at(this.store.previous(this.slot));
    }

    insertAfter(...items: T[]) {
        this.check('insert');
        if (this.slot === TAIL) {
            throw new InvalidIteratorError('Cannot insert after the end of the list.');
        }
        let anchor = this.slot;
        for (const item of items) {
            const slot = this.store.allocate(item);
            this.store.linkAfter(slot, anchor);
            anchor = slot;
        }
    }

    insertBefore(...items: T[]) {
        this.check('insert');
        if (this.slot === HEAD) {
            throw new InvalidIteratorError('Cannot insert before the start of the list.');
        }
        for (const item of items) {
            this.store.linkBefore(this.store.allocate(item), this.slot);
        }
    }

    equals(other: ListIterator<T>): boolean {
        return other instanceof Cursor
            && other.store === this.store
            && other.slot === this.slot
            && other.generation === this.generation;
    }

    /**
     * Unlinks the referenced node and returns a cursor to the node that
     * followed it. This cursor is invalid afterwards.
     */
    erase(): ListIterator<T> {
        this.check('erase');
        if (this.slot === HEAD || this.slot === TAIL) {
            throw new InvalidIteratorError('Cannot erase a list boundary.');
        }
        const following = this.store.next(this.slot);
        this.store.unlink(this.slot);
        return this.at(following);
    }

    private at(slot: number) {
        return new Cursor(this.store, slot, this.logger);
    }

    private check(operation: string) {
        if (!this.valid) {
            warnIfStale(this.logger, operation);
            throw new InvalidIteratorError(`Cannot ${operation} through an invalidated iterator.`);
        }
    }
}
