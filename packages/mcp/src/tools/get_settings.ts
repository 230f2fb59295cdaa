import { z } from "zod";
import { McpTool, ToolContext, indexNameArg, invalidArgumentsResponse } from "./types.js";

const getSettingsInputSchema = z.object({
    index: indexNameArg,
});

export const getSettingsTool: McpTool = {
    name: "get_settings",
    description: () => "Get the settings of an index.",
    inputSchemaZod: () => getSettingsInputSchema,
    execute: async (args: unknown, ctx: ToolContext) => {
        const parsed = getSettingsInputSchema.safeParse(args ?? {});
        if (!parsed.success) {
            return invalidArgumentsResponse("get_settings", parsed.error);
        }

        return ctx.toolHandlers.handleGetSettings(parsed.data);
    }
};
