export class ListError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * Thrown when a value is read or removed from a list that has none.
 */
export class EmptyListError extends ListError {}

/**
 * Thrown when an iterator is used where its position does not allow the
 * operation (a sentinel), after its node was erased, or with a list it does
 * not belong to.
 */
export class InvalidIteratorError extends ListError {}

/**
 * Thrown by every list operation after `dispose()`.
 */
export class DisposedListError extends ListError {}
