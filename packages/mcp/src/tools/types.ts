import { z } from "zod";
import type { OpenSearchMcpConfig } from "../config.js";
import type { ClusterToolHandlers } from "../core/handlers.js";

export interface ToolResponse {
    content: Array<{ type: "text"; text: string }>;
    isError?: boolean;
    [key: string]: unknown;
}

export interface ToolContext {
    toolHandlers: ClusterToolHandlers;
    config: OpenSearchMcpConfig;
}

export interface McpTool<TSchema extends z.ZodTypeAny = z.ZodTypeAny> {
    name: string;
    description: (ctx: ToolContext) => string;
    inputSchemaZod: (ctx: ToolContext) => TSchema;
    execute: (args: unknown, ctx: ToolContext) => Promise<ToolResponse>;
}

export function formatZodError(toolName: string, error: z.ZodError): string {
    const issues = error.issues.map((issue) => {
        const key = issue.path.length > 0 ? issue.path.join('.') : 'input';
        return `${key}: ${issue.message}`;
    });

    return `Error: Invalid arguments for '${toolName}'. ${issues.join('; ')}`;
}

export function invalidArgumentsResponse(toolName: string, error: z.ZodError): ToolResponse {
    return {
        content: [{
            type: "text",
            text: formatZodError(toolName, error)
        }],
        isError: true
    };
}

export const indexNameArg = z.string().min(1).describe('Name of the target index.');
export const jsonObjectArg = z.record(z.string(), z.unknown());
