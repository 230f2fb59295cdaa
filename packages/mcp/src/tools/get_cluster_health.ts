import { z } from "zod";
import { McpTool, ToolContext, invalidArgumentsResponse } from "./types.js";

const getClusterHealthInputSchema = z.object({}).strict();

export const getClusterHealthTool: McpTool = {
    name: "get_cluster_health",
    description: () => "Get cluster health: status (green/yellow/red), node counts and shard allocation.",
    inputSchemaZod: () => getClusterHealthInputSchema,
    execute: async (args: unknown, ctx: ToolContext) => {
        const parsed = getClusterHealthInputSchema.safeParse(args ?? {});
        if (!parsed.success) {
            return invalidArgumentsResponse("get_cluster_health", parsed.error);
        }

        return ctx.toolHandlers.handleClusterHealth();
    }
};
