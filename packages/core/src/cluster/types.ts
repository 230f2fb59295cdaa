export type JsonObject = Record<string, unknown>;

export interface CreateIndexBody {
    settings?: JsonObject;
    mappings?: JsonObject;
    aliases?: JsonObject;
}

export interface BulkDocument {
    id: string;
    source: JsonObject;
}

export interface BulkItemFailure {
    id: string;
    status: number;
    reason: string;
}

export interface BulkIndexSummary {
    took: number | null;
    errors: boolean;
    indexed: number;
    failures: BulkItemFailure[];
}

/**
 * The slice of the cluster API the server depends on.
 *
 * Every method talks to the cluster; nothing here caches. Failures are
 * whatever the underlying client throws and are sorted by
 * `classifyClusterError`.
 */
export interface ClusterGateway {
    indexExists(index: string): Promise<boolean>;
    createIndex(index: string, body: CreateIndexBody): Promise<unknown>;
    deleteIndex(index: string): Promise<unknown>;
    listIndices(): Promise<unknown>;
    getMapping(index: string): Promise<unknown>;
    getSettings(index: string): Promise<unknown>;
    search(index: string, body: JsonObject): Promise<unknown>;
    indexDocument(index: string, body: JsonObject, id?: string): Promise<unknown>;
    deleteDocument(index: string, id: string): Promise<unknown>;
    bulkIndex(index: string, documents: BulkDocument[]): Promise<BulkIndexSummary>;
    clusterHealth(): Promise<unknown>;
    clusterStats(): Promise<unknown>;
}
