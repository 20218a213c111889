/**
 * Collection tools
 *
 * @module
 */
import { z } from 'zod';
import { action, type ToolContext } from '../context.js';
import { withOperation } from '../errors.js';
import { listItems, parseItems } from '../format/lists.js';
import { defineTool } from '../server/defineTool.js';
import { success, toonSuccess } from '../server/response.js';
import { IdSchema } from './params.js';

const CollectionSummarySchema = z.object({
    // The root collection's id is the string "root"
    id: z.union([z.number().int(), z.string()]),
    name: z.string(),
    description: z.string().nullable().optional(),
    location: z.string().nullable().optional(),
    archived: z.boolean().optional(),
});

export const collectionTools = defineTool<ToolContext>('collection', {
    description: 'Collections (folders for cards and dashboards)',
    actions: {
        list: action({
            description: 'List collections.',
            readOnly: true,
            params: z.object({}),
            handler: async (ctx) => {
                const collections = parseItems(CollectionSummarySchema, listItems(await withOperation('list_collections', () => ctx.gateway.get('/collection')), 'collection list'));
                ctx.logger.info(`Retrieved ${collections.length} collections`);
                return toonSuccess(collections.map(c => ({
                    id: c.id,
                    name: c.name,
                    location: c.location ?? null,
                    archived: c.archived ?? false,
                    description: c.description ?? null,
                })));
            },
        }),

        create: action({
            description: 'Create a collection.',
            params: z.object({
                name: z.string().min(1),
                description: z.string().optional(),
                color: z.string().regex(/^#[0-9A-Fa-f]{6}$/).optional().describe('Hex color, e.g. #509EE3'),
                parent_id: IdSchema.optional().describe('Parent collection (default: the root collection)'),
            }),
            handler: async (ctx, args) => {
                const body = {
                    name: args.name,
                    ...(args.description ? { description: args.description } : {}),
                    ...(args.color ? { color: args.color } : {}),
                    ...(args.parent_id !== undefined ? { parent_id: args.parent_id } : {}),
                };
                const created = await withOperation('create_collection', () => ctx.gateway.send('POST', '/collection', body));
                ctx.logger.info(`Created collection "${args.name}"`);
                return success(created);
            },
        }),
    },
});
