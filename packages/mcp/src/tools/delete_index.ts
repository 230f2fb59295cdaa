import { z } from "zod";
import { McpTool, ToolContext, indexNameArg, invalidArgumentsResponse } from "./types.js";

const deleteIndexInputSchema = z.object({
    index: indexNameArg,
});

export const deleteIndexTool: McpTool = {
    name: "delete_index",
    description: () => "Delete an index and all of its documents.",
    inputSchemaZod: () => deleteIndexInputSchema,
    execute: async (args: unknown, ctx: ToolContext) => {
        const parsed = deleteIndexInputSchema.safeParse(args ?? {});
        if (!parsed.success) {
            return invalidArgumentsResponse("delete_index", parsed.error);
        }

        return ctx.toolHandlers.handleDeleteIndex(parsed.data);
    }
};
