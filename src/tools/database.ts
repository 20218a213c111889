/**
 * Database tools — databases, tables and fields
 *
 * @module
 */
import { z } from 'zod';
import { action, type ToolContext } from '../context.js';
import { parseDocument } from '../domain/documents.js';
import { withOperation } from '../errors.js';
import { listItems, parseItems } from '../format/lists.js';
import { tablesMarkdown } from '../format/markdown.js';
import { defineTool } from '../server/defineTool.js';
import { success, toonSuccess } from '../server/response.js';
import { IdSchema } from './params.js';

export const DEFAULT_FIELD_LIMIT = 20;

const DatabaseSummarySchema = z.object({
    id: z.number().int(),
    name: z.string(),
    engine: z.string().nullable().optional(),
    is_sample: z.boolean().optional(),
});

const TableSchema = z.object({
    id: z.number().int(),
    display_name: z.string().nullable().optional(),
    name: z.string().optional(),
    description: z.string().nullable().optional(),
    entity_type: z.string().nullable().optional(),
}).passthrough();

const DatabaseMetadataSchema = z.object({
    tables: z.array(TableSchema).nullable().optional(),
}).passthrough();

const TableMetadataSchema = z.object({
    fields: z.array(z.unknown()).optional(),
}).passthrough();

export type TableMetadata = z.output<typeof TableMetadataSchema>;

export type TruncatedTableMetadata = TableMetadata & {
    _truncated?: true;
    _total_fields?: number;
    _limit_applied?: number;
};

/**
 * Keep at most `limit` fields. `limit` 0 keeps all of them. Only a list
 * that was actually shortened is marked.
 */
export function limitFields(metadata: TableMetadata, limit: number): TruncatedTableMetadata {
    const fields = metadata.fields;
    if (limit <= 0 || fields === undefined || fields.length <= limit) return metadata;
    return {
        ...metadata,
        fields: fields.slice(0, limit),
        _truncated: true,
        _total_fields: fields.length,
        _limit_applied: limit,
    };
}

export const databaseTools = defineTool<ToolContext>('database', {
    description: 'Databases connected to Metabase',
    actions: {
        list: action({
            description: 'List the databases connected to Metabase.',
            readOnly: true,
            params: z.object({}),
            handler: async (ctx) => {
                const databases = parseItems(DatabaseSummarySchema, listItems(await withOperation('list_databases', () => ctx.gateway.get('/database')), 'database list'));
                ctx.logger.info(`Retrieved ${databases.length} databases`);
                return toonSuccess(databases.map(db => ({
                    id: db.id,
                    name: db.name,
                    engine: db.engine ?? null,
                    is_sample: db.is_sample ?? false,
                })));
            },
        }),

        tables: action({
            description: 'List the tables of a database as a markdown table sorted by display name.',
            readOnly: true,
            params: z.object({
                database_id: IdSchema,
            }),
            handler: async (ctx, args) => {
                const raw = await withOperation('list_tables', () => ctx.gateway.get(`/database/${args.database_id}/metadata`));
                const metadata = parseDocument(DatabaseMetadataSchema, raw, 'database metadata');
                const tables = (metadata.tables ?? []).map(t => ({
                    id: t.id,
                    displayName: t.display_name ?? t.name ?? '',
                    description: t.description ?? null,
                    entityType: t.entity_type ?? null,
                }));
                if (tables.length === 0) ctx.logger.warn(`No tables found in database ${args.database_id}`);
                return success(tablesMarkdown(args.database_id, tables));
            },
        }),
    },
});

export const tableTools = defineTool<ToolContext>('table', {
    description: 'Table metadata',
    actions: {
        fields: action({
            description: 'Get the fields (columns) of a table with their ids and types. Use the field ids in query clauses.',
            readOnly: true,
            params: z.object({
                table_id: IdSchema,
                limit: z.number().int().min(0).default(DEFAULT_FIELD_LIMIT)
                    .describe('Maximum number of fields to return; 0 returns all of them'),
            }),
            handler: async (ctx, args) => {
                const raw = await withOperation('get_table_fields', () => ctx.gateway.get(`/table/${args.table_id}/query_metadata`));
                const result = limitFields(parseDocument(TableMetadataSchema, raw, 'table metadata'), args.limit);
                if (result._truncated === true) {
                    ctx.logger.info(`Truncated ${result._total_fields ?? 0} fields to ${args.limit}`);
                }
                return success(result);
            },
        }),
    },
});
