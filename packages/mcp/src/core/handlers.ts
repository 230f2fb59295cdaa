import { randomUUID } from "node:crypto";
import {
    BulkDocument,
    ClusterGateway,
    ConfigDirectoryError,
    CreateIndexBody,
    JsonObject,
    classifyClusterError,
    configureIndices,
    isProvisioningClean,
} from "opensearch-mcp-core";
import type { ToolResponse } from "../tools/types.js";

export type HandlerErrorReason =
    | 'cluster_connectivity'
    | 'request_rejected'
    | 'config_directory'
    | 'internal_error';

export interface IndexArgs {
    index: string;
}

export interface CreateIndexArgs extends IndexArgs {
    body?: CreateIndexBody;
}

export interface SearchDocumentsArgs extends IndexArgs {
    body: JsonObject;
}

export interface IndexDocumentArgs extends IndexArgs {
    body: JsonObject;
    id?: string;
}

export interface DeleteDocumentArgs extends IndexArgs {
    id: string;
}

export interface BulkIndexDocumentsArgs extends IndexArgs {
    documents: JsonObject[];
}

export interface ConfigureIndicesArgs {
    config_dir?: string;
}

export interface ClusterToolHandlersOptions {
    defaultConfigDir: string;
}

function textResponse(payload: Record<string, unknown>, isError = false): ToolResponse {
    const response: ToolResponse = {
        content: [{
            type: "text",
            text: JSON.stringify(payload, null, 2)
        }]
    };
    if (isError) {
        response.isError = true;
    }
    return response;
}

export function okResponse(payload: Record<string, unknown>): ToolResponse {
    return textResponse({ status: 'ok', ...payload });
}

export function errorResponse(reason: HandlerErrorReason, message: string): ToolResponse {
    return textResponse({ status: 'error', reason, message }, true);
}

export function reasonForError(error: unknown): { reason: HandlerErrorReason; message: string } {
    const classified = classifyClusterError(error);
    switch (classified.category) {
        case 'connectivity':
            return { reason: 'cluster_connectivity', message: classified.detail };
        case 'response':
            return { reason: 'request_rejected', message: classified.detail };
        default:
            return { reason: 'internal_error', message: classified.detail };
    }
}

/**
 * Document ids come from the document's own `id` field when it is a string
 * or a number; anything else gets a fresh UUID.
 */
export function toBulkDocuments(documents: JsonObject[], generateId: () => string = randomUUID): BulkDocument[] {
    return documents.map((source) => {
        const id = source.id;
        if (typeof id === 'string' && id.length > 0) {
            return { id, source };
        }
        if (typeof id === 'number' && Number.isFinite(id)) {
            return { id: String(id), source };
        }
        return { id: generateId(), source };
    });
}

export class ClusterToolHandlers {
    private readonly gateway: ClusterGateway;
    private readonly defaultConfigDir: string;
    private readonly generateId: () => string;

    constructor(gateway: ClusterGateway, options: ClusterToolHandlersOptions, generateId: () => string = randomUUID) {
        this.gateway = gateway;
        this.defaultConfigDir = options.defaultConfigDir;
        this.generateId = generateId;
    }

    private async run(tool: string, call: () => Promise<Record<string, unknown>>): Promise<ToolResponse> {
        try {
            return okResponse(await call());
        } catch (error) {
            const { reason, message } = reasonForError(error);
            console.error(`[MCP] ${tool} failed (${reason}): ${message}`);
            return errorResponse(reason, message);
        }
    }

    public async handleListIndices(): Promise<ToolResponse> {
        return this.run('list_indices', async () => ({ indices: await this.gateway.listIndices() }));
    }

    public async handleGetMapping(args: IndexArgs): Promise<ToolResponse> {
        return this.run('get_mapping', async () => ({
            index: args.index,
            mapping: await this.gateway.getMapping(args.index),
        }));
    }

    public async handleGetSettings(args: IndexArgs): Promise<ToolResponse> {
        return this.run('get_settings', async () => ({
            index: args.index,
            settings: await this.gateway.getSettings(args.index),
        }));
    }

    public async handleCreateIndex(args: CreateIndexArgs): Promise<ToolResponse> {
        console.log(`[MCP] Creating index '${args.index}'`);
        return this.run('create_index', async () => ({
            index: args.index,
            result: await this.gateway.createIndex(args.index, args.body ?? {}),
        }));
    }

    public async handleDeleteIndex(args: IndexArgs): Promise<ToolResponse> {
        console.log(`[MCP] Deleting index '${args.index}'`);
        return this.run('delete_index', async () => ({
            index: args.index,
            result: await this.gateway.deleteIndex(args.index),
        }));
    }

    public async handleConfigureIndices(args: ConfigureIndicesArgs): Promise<ToolResponse> {
        try {
            const report = await configureIndices({
                configDir: args.config_dir,
                defaultConfigDir: this.defaultConfigDir,
                gateway: this.gateway,
            });
            return textResponse({ status: isProvisioningClean(report) ? 'ok' : 'partial', ...report });
        } catch (error) {
            if (error instanceof ConfigDirectoryError) {
                console.error(`[MCP] configure_indices failed: ${error.message}`);
                return errorResponse('config_directory', error.message);
            }
            const { reason, message } = reasonForError(error);
            console.error(`[MCP] configure_indices failed (${reason}): ${message}`);
            return errorResponse(reason, message);
        }
    }

    public async handleSearchDocuments(args: SearchDocumentsArgs): Promise<ToolResponse> {
        return this.run('search_documents', async () => ({
            index: args.index,
            result: await this.gateway.search(args.index, args.body),
        }));
    }

    public async handleIndexDocument(args: IndexDocumentArgs): Promise<ToolResponse> {
        return this.run('index_document', async () => ({
            index: args.index,
            result: await this.gateway.indexDocument(args.index, args.body, args.id),
        }));
    }

    public async handleDeleteDocument(args: DeleteDocumentArgs): Promise<ToolResponse> {
        return this.run('delete_document', async () => ({
            index: args.index,
            id: args.id,
            result: await this.gateway.deleteDocument(args.index, args.id),
        }));
    }

    public async handleBulkIndexDocuments(args: BulkIndexDocumentsArgs): Promise<ToolResponse> {
        const documents = toBulkDocuments(args.documents, this.generateId);
        console.log(`[MCP] Bulk indexing ${documents.length} document(s) into '${args.index}'`);
        try {
            const summary = await this.gateway.bulkIndex(args.index, documents);
            return textResponse({
                status: summary.failures.length === 0 ? 'ok' : 'partial',
                index: args.index,
                requested: documents.length,
                ...summary,
            });
        } catch (error) {
            const { reason, message } = reasonForError(error);
            console.error(`[MCP] bulk_index_documents failed (${reason}): ${message}`);
            return errorResponse(reason, message);
        }
    }

    public async handleClusterHealth(): Promise<ToolResponse> {
        return this.run('get_cluster_health', async () => ({ health: await this.gateway.clusterHealth() }));
    }

    public async handleClusterStats(): Promise<ToolResponse> {
        return this.run('get_cluster_stats', async () => ({ stats: await this.gateway.clusterStats() }));
    }
}
