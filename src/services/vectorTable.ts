/**
 * Read-only word → embedding table.
 *
 * Built once by the loader and shared by every request. There is no way to
 * add or replace entries after construction; swapping vocabularies means
 * building a new table and publishing the new reference.
 */
export class VectorTable {
    private readonly vectors: ReadonlyMap<string, Float64Array>;

    constructor(
        vectors: ReadonlyMap<string, Float64Array>,
        public readonly dimension: number
    ) {
        for (const [word, vector] of vectors) {
            if (vector.length !== dimension) {
                throw new RangeError(
                    `Vector for '${word}' has ${vector.length} components, expected ${dimension}`
                );
            }
        }
        this.vectors = new Map(vectors);
    }

    get size(): number {
        return this.vectors.size;
    }

    get(word: string): Float64Array | undefined {
        return this.vectors.get(word.toLowerCase());
    }

    has(word: string): boolean {
        return this.vectors.has(word.toLowerCase());
    }

    entries(): IterableIterator<[string, Float64Array]> {
        return this.vectors.entries();
    }

    [Symbol.iterator](): IterableIterator<[string, Float64Array]> {
        return this.entries();
    }
}
