import { z } from "zod";
import { McpTool, ToolContext, indexNameArg, invalidArgumentsResponse } from "./types.js";

const deleteDocumentInputSchema = z.object({
    index: indexNameArg,
    id: z.string().min(1).describe('Id of the document to delete.'),
});

export const deleteDocumentTool: McpTool = {
    name: "delete_document",
    description: () => "Delete a document from an index by id.",
    inputSchemaZod: () => deleteDocumentInputSchema,
    execute: async (args: unknown, ctx: ToolContext) => {
        const parsed = deleteDocumentInputSchema.safeParse(args ?? {});
        if (!parsed.success) {
            return invalidArgumentsResponse("delete_document", parsed.error);
        }

        return ctx.toolHandlers.handleDeleteDocument(parsed.data);
    }
};
