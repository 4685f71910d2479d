/** Splits `items` into consecutive batches of at most `size`; the last batch may be shorter. */
export function batchChunks<T>(items: readonly T[], size: number): T[][] {
    if (!Number.isInteger(size) || size <= 0) {
        throw new RangeError(`Batch size must be a positive integer, got ${size}.`);
    }

    const batches: T[][] = [];
    for (let start = 0; start < items.length; start += size) {
        batches.push(items.slice(start, start + size));
    }
    return batches;
}
