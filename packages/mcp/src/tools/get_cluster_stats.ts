import { z } from "zod";
import { McpTool, ToolContext, invalidArgumentsResponse } from "./types.js";

const getClusterStatsInputSchema = z.object({}).strict();

export const getClusterStatsTool: McpTool = {
    name: "get_cluster_stats",
    description: () => "Get cluster-wide statistics for indices and nodes.",
    inputSchemaZod: () => getClusterStatsInputSchema,
    execute: async (args: unknown, ctx: ToolContext) => {
        const parsed = getClusterStatsInputSchema.safeParse(args ?? {});
        if (!parsed.success) {
            return invalidArgumentsResponse("get_cluster_stats", parsed.error);
        }

        return ctx.toolHandlers.handleClusterStats();
    }
};
