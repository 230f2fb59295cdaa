import { z } from "zod";
import { McpTool, ToolContext, indexNameArg, invalidArgumentsResponse, jsonObjectArg } from "./types.js";

const indexDocumentInputSchema = z.object({
    index: indexNameArg,
    body: jsonObjectArg.describe('Document source.'),
    id: z.string().min(1).optional().describe('Document id. The cluster generates one when omitted.'),
});

export const indexDocumentTool: McpTool = {
    name: "index_document",
    description: () => "Index a single document, replacing any existing document with the same id.",
    inputSchemaZod: () => indexDocumentInputSchema,
    execute: async (args: unknown, ctx: ToolContext) => {
        const parsed = indexDocumentInputSchema.safeParse(args ?? {});
        if (!parsed.success) {
            return invalidArgumentsResponse("index_document", parsed.error);
        }

        return ctx.toolHandlers.handleIndexDocument(parsed.data);
    }
};
