/**
 * Slot based storage for the list chain.
 *
 * Nodes live in parallel arrays indexed by slot number and link to each
 * other by slot number, so the chain holds no object references and
 * teardown is a matter of resetting the arrays. Every slot carries a
 * generation counter: even while the slot holds a linked node, odd after
 * the node is released, advanced again when the slot is reused. A cursor
 * that recorded another generation is stale.
 *
 * A released slot keeps the successor it had when it was unlinked (and that
 * successor's generation) until it is reused, so a traversal standing on it
 * can still find its way back into the chain.
 *
 * Slot 0 is the head sentinel and slot 1 is the tail sentinel.
 */

export const HEAD = 0;
export const TAIL = 1;

export class NodeStore<T> {
    private values: T[] = new Array<T>(2); // sentinel slots stay holes
    private n: number[] = [TAIL, TAIL]; // next slot
    private p: number[] = [HEAD, HEAD]; // previous slot
    private generations: number[] = [0, 0];
    private successorGenerations: number[] = [0, 0];
    private free: number[] = [];
    private isDisposed = false;

    get disposed() {
        return this.isDisposed;
    }

    next(slot: number) {
        return this.n[slot];
    }

    previous(slot: number) {
        return this.p[slot];
    }

    value(slot: number) {
        return this.values[slot];
    }

    generation(slot: number) {
        return this.generations[slot];
    }

    isLive(slot: number, generation: number) {
        return !this.isDisposed && this.generations[slot] === generation;
    }

    allocate(value: T) {
        const reused = this.free.pop();
        if (reused !== undefined) {
            this.values[reused] = value;
            this.generations[reused]++;
            return reused;
        }
        const slot = this.values.length;
        this.values.push(value);
        this.n.push(slot);
        this.p.push(slot);
        this.generations.push(0);
        this.successorGenerations.push(0);
        return slot;
    }

    /**
     * Position following `slot` as seen by someone who recorded `generation`
     * for it. When the node was released since, the successors it had at
     * unlink time are followed until a linked node is reached. Returns
     * `undefined` when a released slot on the way has been reused.
     */
    successor(slot: number, generation: number): { slot: number; generation: number } | undefined {
        if (this.generations[slot] === generation) {
            const following = this.n[slot];
            return { slot: following, generation: this.generations[following] };
        }
        for (;;) {
            if (this.generations[slot] !== generation + 1) {
                return undefined;
            }
            generation = this.successorGenerations[slot];
            slot = this.n[slot];
            if (this.generations[slot] === generation) {
                return { slot, generation };
            }
        }
    }

    linkAfter(slot: number, anchor: number) {
        // link new node
        this.p[slot] = anchor;
        this.n[slot] = this.n[anchor];
        // link chain
        this.p[this.n[anchor]] = slot;
        this.n[anchor] = slot;
    }

    linkBefore(slot: number, anchor: number) {
        this.linkAfter(slot, this.p[anchor]);
    }

    unlink(slot: number) {
        const value = this.values[slot];
        this.n[this.p[slot]] = this.n[slot];
        this.p[this.n[slot]] = this.p[slot];
        this.release(slot);
        return value;
    }

    /**
     * Releases every value slot, walking from the head end.
     * Returns the number of released nodes.
     */
    clear() {
        let released = 0;
        let current = this.n[HEAD];
        while (current !== TAIL) {
            const following = this.n[current];
            this.release(current);
            current = following;
            released++;
        }
        this.n[HEAD] = TAIL;
        this.p[TAIL] = HEAD;
        return released;
    }

    dispose() {
        const released = this.clear();
        this.isDisposed = true;
        this.values = [];
        this.n = [];
        this.p = [];
        this.generations = [];
        this.successorGenerations = [];
        this.free = [];
        return released;
    }

    private release(slot: number) {
        delete this.values[slot];
        this.successorGenerations[slot] = this.generations[this.n[slot]];
        this.generations[slot]++;
        this.free.push(slot);
    }
}
