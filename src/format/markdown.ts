// ============================================================================
// Markdown rendering of table listings
// ============================================================================

export interface TableRow {
    readonly id: number;
    readonly displayName: string;
    readonly description: string | null;
    readonly entityType: string | null;
}

/** `|` would end a markdown cell early. */
export function escapeCell(text: string): string {
    return text.replace(/\|/g, '\\|');
}

/** Markdown listing of a database's tables, sorted by display name. */
export function tablesMarkdown(databaseId: number, tables: readonly TableRow[]): string {
    const sorted = [...tables].sort((a, b) => compare(a.displayName, b.displayName));
    const lines: string[] = [
        `# Tables in Database ${databaseId}`,
        '',
        `**Total Tables:** ${sorted.length}`,
        '',
    ];

    if (sorted.length === 0) {
        lines.push('*No tables found in this database.*');
        return `${lines.join('\n')}\n`;
    }

    lines.push('| Table ID | Display Name | Description | Entity Type |');
    lines.push('|----------|--------------|-------------|-------------|');
    for (const table of sorted) {
        const description = table.description !== null && table.description.length > 0
            ? table.description
            : 'No description';
        lines.push(`| ${table.id} | ${escapeCell(table.displayName)} | ${escapeCell(description)} | ${table.entityType ?? 'N/A'} |`);
    }
    return `${lines.join('\n')}\n`;
}

function compare(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}
