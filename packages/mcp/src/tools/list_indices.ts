import { z } from "zod";
import { McpTool, ToolContext, invalidArgumentsResponse } from "./types.js";

const listIndicesInputSchema = z.object({}).strict();

export const listIndicesTool: McpTool = {
    name: "list_indices",
    description: () => "List all indices in the OpenSearch cluster with their health, status and document counts.",
    inputSchemaZod: () => listIndicesInputSchema,
    execute: async (args: unknown, ctx: ToolContext) => {
        const parsed = listIndicesInputSchema.safeParse(args ?? {});
        if (!parsed.success) {
            return invalidArgumentsResponse("list_indices", parsed.error);
        }

        return ctx.toolHandlers.handleListIndices();
    }
};
