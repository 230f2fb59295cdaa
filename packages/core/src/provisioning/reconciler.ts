import { ClusterGateway } from '../cluster/types.js';
import { classifyClusterError, isResourceAlreadyExistsError } from '../cluster/errors.js';
import { IndexSpec, toCreateIndexBody } from './index-definition.js';

export type ReconciliationOutcome = 'created' | 'already_exists' | 'failed';
export type ReconciliationErrorKind = 'cluster_connectivity' | 'index_creation';

export interface ReconciliationResult {
    file: string;
    indexName: string;
    outcome: ReconciliationOutcome;
    errorKind?: ReconciliationErrorKind;
    errorDetail?: string;
}

function failedResult(spec: IndexSpec, error: unknown): ReconciliationResult {
    const classified = classifyClusterError(error);
    return {
        file: spec.sourceFile,
        indexName: spec.name,
        outcome: 'failed',
        errorKind: classified.category === 'connectivity' ? 'cluster_connectivity' : 'index_creation',
        errorDetail: classified.detail,
    };
}

async function reconcileOne(spec: IndexSpec, gateway: ClusterGateway): Promise<ReconciliationResult> {
    const base = { file: spec.sourceFile, indexName: spec.name };

    let exists: boolean;
    try {
        exists = await gateway.indexExists(spec.name);
    } catch (error) {
        return failedResult(spec, error);
    }
    if (exists) {
        console.log(`[PROVISION] Index '${spec.name}' already exists, leaving it untouched`);
        return { ...base, outcome: 'already_exists' };
    }

    try {
        await gateway.createIndex(spec.name, toCreateIndexBody(spec));
    } catch (error) {
        if (isResourceAlreadyExistsError(error)) {
            console.log(`[PROVISION] Index '${spec.name}' was created concurrently`);
            return { ...base, outcome: 'already_exists' };
        }
        return failedResult(spec, error);
    }

    console.log(`[PROVISION] Created index '${spec.name}' from ${spec.sourceFile}`);
    return { ...base, outcome: 'created' };
}

/**
 * Bring the cluster in line with `specs`, one index at a time and in order.
 * Existing indices are never modified. A failure is recorded against its definition
 * and the run moves on to the next one.
 */
export async function reconcileIndices(specs: readonly IndexSpec[], gateway: ClusterGateway): Promise<ReconciliationResult[]> {
    const results: ReconciliationResult[] = [];
    for (const spec of specs) {
        const result = await reconcileOne(spec, gateway);
        if (result.outcome === 'failed') {
            console.error(`[PROVISION] Failed to reconcile '${spec.name}' (${result.errorKind}): ${result.errorDetail}`);
        }
        results.push(result);
    }
    return results;
}
