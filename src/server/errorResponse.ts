// ============================================================================
// Error Boundary — Thrown failures as tool responses
// ============================================================================

import { GatewayError, MetabaseError, NotFoundError, TransportError, ValidationError } from '../errors.js';
import { toolError, type ToolResponse } from './response.js';

/** Where the agent can look up the ids a failed call should have used. */
const LOOKUP_TOOLS: Readonly<Record<string, string | undefined>> = {
    Tab: 'dashboard_get',
    Dashcard: 'dashboard_get',
};

/**
 * Render an error thrown by a handler. `MetabaseError`s keep their code and
 * operation; anything else is reported as `INTERNAL_ERROR`.
 */
export function errorResponse(err: unknown): ToolResponse {
    if (!(err instanceof MetabaseError)) {
        const message = err instanceof Error ? err.message : String(err);
        return toolError('INTERNAL_ERROR', { message, severity: 'critical' });
    }

    const details: Record<string, string> = {};
    if (err.operation !== undefined) details['operation'] = err.operation;

    if (err instanceof NotFoundError) {
        details['resource'] = err.resource;
        details['requested_id'] = String(err.id);
        details['available_ids'] = err.available.length > 0 ? err.available.join(', ') : 'none';
        const lookup = LOOKUP_TOOLS[err.resource];
        return toolError('NOT_FOUND', {
            message: err.describe(),
            suggestion: `Use one of the available ${err.resource.toLowerCase()} ids and retry.`,
            ...(lookup !== undefined ? { availableActions: [lookup] } : {}),
            details,
        });
    }

    if (err instanceof ValidationError) {
        if (err.field !== undefined) details['field'] = err.field;
        return toolError('VALIDATION_ERROR', {
            message: err.describe(),
            suggestion: 'Correct the arguments and call the tool again. Nothing was sent to Metabase.',
            details,
        });
    }

    if (err instanceof GatewayError) {
        details['status'] = String(err.status);
        details['request'] = `${err.method} ${err.path}`;
        return toolError('REMOTE_ERROR', {
            message: err.describe(),
            suggestion: remoteSuggestion(err.status),
            details,
        });
    }

    if (err instanceof TransportError) {
        details['request'] = `${err.method} ${err.path}`;
        return toolError('TRANSPORT_ERROR', {
            message: err.describe(),
            suggestion: 'Metabase could not be reached. Check that the server is up, then retry.',
            details,
        });
    }

    return toolError(err.code, { message: err.describe(), details });
}

function remoteSuggestion(status: number): string {
    if (status === 401 || status === 403) return 'The configured credentials were rejected. Ask the user to check them.';
    if (status === 404) return 'The requested Metabase object does not exist. List the available ones first.';
    if (status >= 500) return 'Metabase failed to process the request. Retry later or simplify the request.';
    return 'Metabase rejected the request. Read the message, correct the arguments and retry.';
}
