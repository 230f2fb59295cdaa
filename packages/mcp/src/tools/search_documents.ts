import { z } from "zod";
import { McpTool, ToolContext, indexNameArg, invalidArgumentsResponse, jsonObjectArg } from "./types.js";

const searchDocumentsInputSchema = z.object({
    index: indexNameArg,
    body: jsonObjectArg.describe('OpenSearch query DSL, e.g. {"query":{"match":{"title":"dune"}}}.'),
});

export const searchDocumentsTool: McpTool = {
    name: "search_documents",
    description: () => "Search documents in an index with an OpenSearch query DSL body.",
    inputSchemaZod: () => searchDocumentsInputSchema,
    execute: async (args: unknown, ctx: ToolContext) => {
        const parsed = searchDocumentsInputSchema.safeParse(args ?? {});
        if (!parsed.success) {
            return invalidArgumentsResponse("search_documents", parsed.error);
        }

        return ctx.toolHandlers.handleSearchDocuments(parsed.data);
    }
};
