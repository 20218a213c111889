// ============================================================================
// IdAllocator — Placeholder ids for entities created on write
// ============================================================================

/**
 * Hands out strictly decreasing negative integers.
 *
 * Metabase creates any tab or dashcard whose id is negative when a dashboard
 * is written back. The first id handed out is `min(min(ids in scope) - 1, -1)`,
 * so it never collides with an id already present.
 */
export class IdAllocator {
    private _next: number;

    private constructor(start: number) {
        this._next = start;
    }

    /** Seed an allocator below every id in `ids`. */
    static below(ids: Iterable<number>): IdAllocator {
        let lowest = Infinity;
        for (const id of ids) {
            if (id < lowest) lowest = id;
        }
        return new IdAllocator(Math.min(lowest - 1, -1));
    }

    next(): number {
        const id = this._next;
        this._next -= 1;
        return id;
    }
}
