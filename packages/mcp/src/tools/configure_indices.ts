import { z } from "zod";
import { McpTool, ToolContext, invalidArgumentsResponse } from "./types.js";

const configureIndicesInputSchema = z.object({
    config_dir: z.string().optional().describe('Directory of YAML index definitions. Defaults to the server\'s configured directory.'),
});

export const configureIndicesTool: McpTool = {
    name: "configure_indices",
    description: (ctx) => [
        "Create the indices declared in YAML definition files that do not exist yet.",
        "Each .yaml/.yml file holds index_name, optional settings and optional mappings.",
        "Existing indices are never modified; a failing file does not stop the others.",
        `Default directory: ${ctx.config.indexConfigDir}`,
    ].join(' '),
    inputSchemaZod: () => configureIndicesInputSchema,
    execute: async (args: unknown, ctx: ToolContext) => {
        const parsed = configureIndicesInputSchema.safeParse(args ?? {});
        if (!parsed.success) {
            return invalidArgumentsResponse("configure_indices", parsed.error);
        }

        return ctx.toolHandlers.handleConfigureIndices(parsed.data);
    }
};
