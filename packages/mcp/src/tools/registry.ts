import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { listIndicesTool } from "./list_indices.js";
import { getMappingTool } from "./get_mapping.js";
import { getSettingsTool } from "./get_settings.js";
import { createIndexTool } from "./create_index.js";
import { deleteIndexTool } from "./delete_index.js";
import { configureIndicesTool } from "./configure_indices.js";
import { searchDocumentsTool } from "./search_documents.js";
import { indexDocumentTool } from "./index_document.js";
import { deleteDocumentTool } from "./delete_document.js";
import { bulkIndexDocumentsTool } from "./bulk_index_documents.js";
import { getClusterHealthTool } from "./get_cluster_health.js";
import { getClusterStatsTool } from "./get_cluster_stats.js";
import { McpTool, ToolContext, ToolResponse } from "./types.js";

export const toolList: McpTool[] = [
    listIndicesTool,
    getMappingTool,
    getSettingsTool,
    createIndexTool,
    deleteIndexTool,
    configureIndicesTool,
    searchDocumentsTool,
    indexDocumentTool,
    deleteDocumentTool,
    bulkIndexDocumentsTool,
    getClusterHealthTool,
    getClusterStatsTool,
];

export interface McpToolDescriptor {
    name: string;
    description: string;
    inputSchema: { type: "object"; [key: string]: unknown };
}

function toJsonSchema(schema: z.ZodTypeAny): McpToolDescriptor["inputSchema"] {
    const jsonSchema: Record<string, unknown> = {
        ...zodToJsonSchema(schema, {
            target: 'jsonSchema7',
            $refStrategy: 'none',
        }),
    };

    // MCP doesn't need draft metadata in the tool schema payload.
    delete jsonSchema.$schema;
    delete jsonSchema.definitions;
    return { ...jsonSchema, type: "object" };
}

/**
 * Name-to-tool lookup shared by the stdio server and the CLI. Built once at
 * start-up and never mutated afterwards.
 */
export class ToolRegistry {
    private readonly tools: ReadonlyMap<string, McpTool>;

    constructor(tools: readonly McpTool[]) {
        const byName = new Map<string, McpTool>();
        for (const tool of tools) {
            if (byName.has(tool.name)) {
                throw new Error(`Duplicate tool name '${tool.name}'`);
            }
            byName.set(tool.name, tool);
        }
        this.tools = byName;
    }

    get names(): string[] {
        return [...this.tools.keys()];
    }

    get(name: string): McpTool | undefined {
        return this.tools.get(name);
    }

    toMcpToolList(ctx: ToolContext): McpToolDescriptor[] {
        return [...this.tools.values()].map((tool) => ({
            name: tool.name,
            description: tool.description(ctx),
            inputSchema: toJsonSchema(tool.inputSchemaZod(ctx)),
        }));
    }

    async call(name: string, args: unknown, ctx: ToolContext): Promise<ToolResponse> {
        const tool = this.tools.get(name);
        if (!tool) {
            return {
                content: [{
                    type: "text",
                    text: `Unknown tool: ${name}. Supported tools: ${this.names.join(', ')}`
                }],
                isError: true
            };
        }
        return tool.execute(args, ctx);
    }
}

export function createToolRegistry(): ToolRegistry {
    return new ToolRegistry(toolList);
}
