/**
 * Response Helpers
 *
 * Builders for the MCP tool response shape. Failures are rendered as a
 * `<tool_error>` XML envelope so the calling agent can read the error code,
 * a recovery hint and the ids it may retry with.
 *
 * @example
 * ```typescript
 * return success({ id: 12, name: 'Revenue' });
 *
 * return toonSuccess(databases);
 *
 * return toolError('NOT_FOUND', {
 *     message: 'Tab 7 not found (available: 1, 2)',
 *     suggestion: 'Call dashboard_get to list the tabs, then retry.',
 *     availableActions: ['dashboard_get'],
 * });
 * ```
 *
 * @module
 */
import { encode, type EncodeOptions } from '@toon-format/toon';

// ============================================================================
// XML Safety
// ============================================================================

/** Escape text content placed between XML tags. */
export function escapeXml(str: string): string {
    return str
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;');
}

/** Escape a value placed inside a double-quoted XML attribute. */
export function escapeXmlAttr(str: string): string {
    return str
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&apos;');
}

// ============================================================================
// Types
// ============================================================================

/**
 * MCP tool response.
 *
 * Every handler returns this shape; build it with {@link success},
 * {@link toonSuccess}, {@link error} or {@link toolError}.
 */
export interface ToolResponse {
    readonly content: ReadonlyArray<{ readonly type: 'text'; readonly text: string }>;
    readonly isError?: boolean;
}

// ============================================================================
// Response Builders
// ============================================================================

/**
 * Success response from text or a JSON-serializable value.
 *
 * Strings are returned verbatim (an empty string or `undefined` becomes
 * `"OK"`); anything else is pretty-printed JSON.
 */
export function success(data: unknown): ToolResponse {
    const text = typeof data === 'string'
        ? (data || 'OK')
        : data === undefined ? 'OK' : JSON.stringify(data, null, 2);
    return { content: [{ type: 'text', text }] };
}

/** Plain error response, optionally tagged with a code. */
export function error(message: string, code?: ErrorCode): ToolResponse {
    const codeAttr = code !== undefined ? ` code="${escapeXmlAttr(code)}"` : '';
    return {
        content: [{ type: 'text', text: `<tool_error${codeAttr}>\n<message>${escapeXml(message)}</message>\n</tool_error>` }],
        isError: true,
    };
}

/**
 * Success response encoded as TOON, which takes far fewer tokens than JSON
 * for lists of uniform records (databases, cards, collections).
 */
export function toonSuccess(data: unknown, options?: EncodeOptions): ToolResponse {
    const defaults: EncodeOptions = { delimiter: '|' };
    const text = encode(data, { ...defaults, ...options });
    return { content: [{ type: 'text', text }] };
}

// ============================================================================
// Self-Healing Errors
// ============================================================================

export type ErrorCode =
    | 'VALIDATION_ERROR'
    | 'NOT_FOUND'
    | 'REMOTE_ERROR'
    | 'TRANSPORT_ERROR'
    | 'INTERNAL_ERROR'
    | 'UNKNOWN_TOOL';

export type ErrorSeverity = 'error' | 'critical';

export interface ToolErrorOptions {
    message: string;
    /** Recovery suggestion for the agent */
    suggestion?: string;
    /** Tool names the agent should try instead */
    availableActions?: string[];
    /** Defaults to `'error'` */
    severity?: ErrorSeverity;
    /** Rendered as `<detail key="...">` entries */
    details?: Record<string, string>;
}

/** Error response with recovery guidance. */
export function toolError(code: ErrorCode, options: ToolErrorOptions): ToolResponse {
    const severity = options.severity ?? 'error';
    const parts: string[] = [
        `<tool_error code="${escapeXmlAttr(code)}" severity="${escapeXmlAttr(severity)}">`,
        `<message>${escapeXml(options.message)}</message>`,
    ];

    if (options.suggestion) {
        parts.push(`<recovery>${escapeXml(options.suggestion)}</recovery>`);
    }

    const actions = options.availableActions ?? [];
    if (actions.length > 0) {
        parts.push('<available_actions>');
        for (const action of actions) {
            parts.push(`  <action>${escapeXml(action)}</action>`);
        }
        parts.push('</available_actions>');
    }

    if (options.details !== undefined && Object.keys(options.details).length > 0) {
        parts.push('<details>');
        for (const [key, value] of Object.entries(options.details)) {
            parts.push(`  <detail key="${escapeXmlAttr(key)}">${escapeXml(value)}</detail>`);
        }
        parts.push('</details>');
    }

    parts.push('</tool_error>');

    return { content: [{ type: 'text', text: parts.join('\n') }], isError: true };
}
