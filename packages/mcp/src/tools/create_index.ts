import { z } from "zod";
import { McpTool, ToolContext, indexNameArg, invalidArgumentsResponse, jsonObjectArg } from "./types.js";

const createIndexBodySchema = z.object({
    settings: jsonObjectArg.optional().describe('Index settings, e.g. number_of_shards or analysis.'),
    mappings: jsonObjectArg.optional().describe('Field mappings, usually under a properties key.'),
    aliases: jsonObjectArg.optional().describe('Aliases to attach to the new index.'),
}).strict();

const createIndexInputSchema = z.object({
    index: indexNameArg,
    body: createIndexBodySchema.optional().describe('Optional settings, mappings and aliases for the new index.'),
});

export const createIndexTool: McpTool = {
    name: "create_index",
    description: () => "Create a new index, optionally with settings, mappings and aliases. Fails if the index already exists.",
    inputSchemaZod: () => createIndexInputSchema,
    execute: async (args: unknown, ctx: ToolContext) => {
        const parsed = createIndexInputSchema.safeParse(args ?? {});
        if (!parsed.success) {
            return invalidArgumentsResponse("create_index", parsed.error);
        }

        return ctx.toolHandlers.handleCreateIndex(parsed.data);
    }
};
