import { Client, ClientOptions } from '@opensearch-project/opensearch';
import { z } from 'zod';
import {
    BulkDocument,
    BulkIndexSummary,
    BulkItemFailure,
    ClusterGateway,
    CreateIndexBody,
    JsonObject,
} from './types.js';

export interface OpenSearchConnectionConfig {
    url: string;
    username?: string;
    password?: string;
    verifyCerts: boolean;
    requestTimeoutMs: number;
    maxRetries: number;
}

export function buildClientOptions(config: OpenSearchConnectionConfig): ClientOptions {
    const options: ClientOptions = {
        node: config.url,
        requestTimeout: config.requestTimeoutMs,
        maxRetries: config.maxRetries,
    };
    if (config.username && config.password) {
        options.auth = { username: config.username, password: config.password };
    }
    if (config.url.startsWith('https:')) {
        options.ssl = { rejectUnauthorized: config.verifyCerts };
    }
    return options;
}

const bulkItemSchema = z.object({
    _id: z.string().nullable().optional(),
    status: z.number(),
    error: z.unknown().optional(),
}).passthrough();

const bulkResponseSchema = z.object({
    took: z.number().optional(),
    errors: z.boolean(),
    items: z.array(z.record(z.string(), bulkItemSchema)),
});

function describeBulkError(error: unknown): string {
    if (typeof error === 'string') {
        return error;
    }
    if (typeof error === 'object' && error !== null) {
        const type = 'type' in error && typeof error.type === 'string' ? error.type : 'error';
        const reason = 'reason' in error && typeof error.reason === 'string' ? error.reason : '';
        return reason ? `${type}: ${reason}` : type;
    }
    return 'unknown bulk item failure';
}

export function buildBulkOperations(index: string, documents: BulkDocument[]): JsonObject[] {
    return documents.flatMap((doc) => [
        { index: { _index: index, _id: doc.id } },
        doc.source,
    ]);
}

export function summarizeBulkResponse(body: unknown, documents: BulkDocument[]): BulkIndexSummary {
    const parsed = bulkResponseSchema.safeParse(body);
    if (!parsed.success) {
        throw new Error(`Unexpected bulk response shape: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`);
    }

    const failures: BulkItemFailure[] = [];
    let indexed = 0;
    parsed.data.items.forEach((entry, position) => {
        const result = Object.values(entry)[0];
        if (!result) {
            return;
        }
        const id = result._id ?? documents[position]?.id ?? `#${position}`;
        if (result.error === undefined && result.status < 300) {
            indexed++;
            return;
        }
        failures.push({ id, status: result.status, reason: describeBulkError(result.error) });
    });

    return {
        took: parsed.data.took ?? null,
        errors: parsed.data.errors,
        indexed,
        failures,
    };
}

export class OpenSearchGateway implements ClusterGateway {
    private readonly client: Client;

    constructor(client: Client) {
        this.client = client;
    }

    static fromConfig(config: OpenSearchConnectionConfig): OpenSearchGateway {
        console.log(`[CLUSTER] Creating OpenSearch client for ${config.url}`);
        return new OpenSearchGateway(new Client(buildClientOptions(config)));
    }

    async indexExists(index: string): Promise<boolean> {
        const response = await this.client.indices.exists({ index });
        return response.body === true;
    }

    async createIndex(index: string, body: CreateIndexBody): Promise<unknown> {
        const response = await this.client.indices.create({ index, body });
        return response.body;
    }

    async deleteIndex(index: string): Promise<unknown> {
        const response = await this.client.indices.delete({ index });
        return response.body;
    }

    async listIndices(): Promise<unknown> {
        const response = await this.client.cat.indices({ format: 'json' });
        return response.body;
    }

    async getMapping(index: string): Promise<unknown> {
        const response = await this.client.indices.getMapping({ index });
        return response.body;
    }

    async getSettings(index: string): Promise<unknown> {
        const response = await this.client.indices.getSettings({ index });
        return response.body;
    }

    async search(index: string, body: JsonObject): Promise<unknown> {
        const response = await this.client.search({ index, body });
        return response.body;
    }

    async indexDocument(index: string, body: JsonObject, id?: string): Promise<unknown> {
        const response = id === undefined
            ? await this.client.index({ index, body })
            : await this.client.index({ index, id, body });
        return response.body;
    }

    async deleteDocument(index: string, id: string): Promise<unknown> {
        const response = await this.client.delete({ index, id });
        return response.body;
    }

    async bulkIndex(index: string, documents: BulkDocument[]): Promise<BulkIndexSummary> {
        const response = await this.client.bulk({ body: buildBulkOperations(index, documents) });
        return summarizeBulkResponse(response.body, documents);
    }

    async clusterHealth(): Promise<unknown> {
        const response = await this.client.cluster.health();
        return response.body;
    }

    async clusterStats(): Promise<unknown> {
        const response = await this.client.cluster.stats();
        return response.body;
    }
}
