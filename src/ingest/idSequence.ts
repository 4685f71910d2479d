/**
 * Hands out chunk ids. The only state is the next unused id; it is not safe to
 * share between concurrent builds.
 */
export class IdSequence {
    private nextId: number;

    constructor(start = 0) {
        if (!Number.isInteger(start) || start < 0) {
            throw new RangeError(`Id sequence must start at a non-negative integer, got ${start}.`);
        }
        this.nextId = start;
    }

    next(): number {
        const id = this.nextId;
        this.nextId += 1;
        return id;
    }

    peek(): number {
        return this.nextId;
    }
}
