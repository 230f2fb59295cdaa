import { z } from "zod";
import { McpTool, ToolContext, indexNameArg, invalidArgumentsResponse, jsonObjectArg } from "./types.js";

const bulkIndexDocumentsInputSchema = z.object({
    index: indexNameArg,
    documents: z.array(jsonObjectArg).min(1).describe('Documents to index. A string or numeric "id" field is used as the document id.'),
});

export const bulkIndexDocumentsTool: McpTool = {
    name: "bulk_index_documents",
    description: () => "Index many documents in one bulk request. Reports per-document failures; status is \"partial\" when some documents were rejected.",
    inputSchemaZod: () => bulkIndexDocumentsInputSchema,
    execute: async (args: unknown, ctx: ToolContext) => {
        const parsed = bulkIndexDocumentsInputSchema.safeParse(args ?? {});
        if (!parsed.success) {
            return invalidArgumentsResponse("bulk_index_documents", parsed.error);
        }

        return ctx.toolHandlers.handleBulkIndexDocuments(parsed.data);
    }
};
