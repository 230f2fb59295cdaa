import { z } from "zod";
import { McpTool, ToolContext, indexNameArg, invalidArgumentsResponse } from "./types.js";

const getMappingInputSchema = z.object({
    index: indexNameArg,
});

export const getMappingTool: McpTool = {
    name: "get_mapping",
    description: () => "Get the field mappings of an index.",
    inputSchemaZod: () => getMappingInputSchema,
    execute: async (args: unknown, ctx: ToolContext) => {
        const parsed = getMappingInputSchema.safeParse(args ?? {});
        if (!parsed.success) {
            return invalidArgumentsResponse("get_mapping", parsed.error);
        }

        return ctx.toolHandlers.handleGetMapping(parsed.data);
    }
};
