import { errors } from '@opensearch-project/opensearch';

export type ClusterErrorCategory = 'connectivity' | 'response' | 'unexpected';

export interface ClassifiedClusterError {
    category: ClusterErrorCategory;
    detail: string;
    statusCode?: number;
    errorType?: string;
}

const CONNECTIVITY_ERROR_NAMES = new Set([
    'ConnectionError',
    'TimeoutError',
    'NoLivingConnectionsError',
]);

const SOCKET_ERROR_CODES = new Set([
    'ECONNREFUSED',
    'ECONNRESET',
    'ENOTFOUND',
    'ETIMEDOUT',
    'EHOSTUNREACH',
    'EAI_AGAIN',
]);

interface OpenSearchErrorBody {
    type?: string;
    reason?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readErrorBody(body: unknown): OpenSearchErrorBody | null {
    if (!isRecord(body)) {
        return null;
    }
    const error = body.error;
    if (typeof error === 'string') {
        return { reason: error };
    }
    if (!isRecord(error)) {
        return null;
    }
    // Failures caused by a nested exception report the useful part under root_cause.
    const rootCause = Array.isArray(error.root_cause) ? error.root_cause.find(isRecord) : undefined;
    const source = typeof error.type === 'string' ? error : rootCause ?? error;
    return {
        type: typeof source.type === 'string' ? source.type : undefined,
        reason: typeof source.reason === 'string' ? source.reason : undefined,
    };
}

function isConnectivityError(error: unknown): boolean {
    if (
        error instanceof errors.ConnectionError
        || error instanceof errors.TimeoutError
        || error instanceof errors.NoLivingConnectionsError
    ) {
        return true;
    }
    if (!(error instanceof Error)) {
        return false;
    }
    if (CONNECTIVITY_ERROR_NAMES.has(error.name)) {
        return true;
    }
    const code = 'code' in error ? error.code : undefined;
    return typeof code === 'string' && SOCKET_ERROR_CODES.has(code);
}

function readStatusCode(error: Error): number | undefined {
    if (error instanceof errors.ResponseError) {
        return error.statusCode;
    }
    const statusCode = 'statusCode' in error ? error.statusCode : undefined;
    return typeof statusCode === 'number' ? statusCode : undefined;
}

function readBody(error: Error): unknown {
    if (error instanceof errors.ResponseError) {
        return error.body;
    }
    return 'body' in error ? error.body : undefined;
}

function describeUnknown(error: unknown): string {
    if (typeof error === 'string') {
        return error;
    }
    try {
        return JSON.stringify(error) ?? String(error);
    } catch {
        return String(error);
    }
}

/**
 * Sort a failure from the OpenSearch client (or anything thrown near it) into
 * the buckets callers report on: unreachable cluster, cluster-side rejection,
 * or something else entirely.
 */
export function classifyClusterError(error: unknown): ClassifiedClusterError {
    if (isConnectivityError(error) && error instanceof Error) {
        return {
            category: 'connectivity',
            detail: `${error.name}: ${error.message}`,
        };
    }

    if (!(error instanceof Error)) {
        return { category: 'unexpected', detail: describeUnknown(error) };
    }

    const statusCode = readStatusCode(error);
    if (statusCode === undefined) {
        return { category: 'unexpected', detail: error.message || error.name };
    }

    const body = readErrorBody(readBody(error));
    const errorType = body?.type;
    const reason = body?.reason ?? error.message;
    const detail = errorType
        ? `HTTP ${statusCode} ${errorType}: ${reason}`
        : `HTTP ${statusCode}: ${reason}`;

    return { category: 'response', detail, statusCode, errorType };
}

export function isResourceAlreadyExistsError(error: unknown): boolean {
    const classified = classifyClusterError(error);
    return classified.category === 'response'
        && classified.errorType === 'resource_already_exists_exception';
}
