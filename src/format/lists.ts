// ============================================================================
// List responses — Metabase answers lists bare or wrapped in `{ data }`
// ============================================================================

import { z } from 'zod';
import { parseDocument } from '../domain/documents.js';

const ListSchema = z.union([
    z.array(z.unknown()),
    z.object({ data: z.array(z.unknown()) }).passthrough(),
]);

/** Items of a list response, whichever of the two shapes it came in. */
export function listItems(raw: unknown, what: string): unknown[] {
    const parsed = parseDocument(ListSchema, raw, what);
    return Array.isArray(parsed) ? parsed : parsed.data;
}

/**
 * Parse every item against `schema`, dropping the ones that do not fit
 * (Metabase mixes item kinds in some listings).
 */
export function parseItems<T extends z.ZodTypeAny>(schema: T, items: readonly unknown[]): z.output<T>[] {
    return items.flatMap(item => {
        const parsed = schema.safeParse(item);
        return parsed.success ? [parsed.data] : [];
    });
}
