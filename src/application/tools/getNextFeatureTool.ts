import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { formatFeatureDetails, formatSummary } from "../formatters/featureFormatter.js";
import { createErrorResponse, createTextResponse } from "./toolResponse.js";
import type { ToolContext, ToolResponse } from "./toolResponse.js";

const getNextFeatureSchema = z.object({
    includeQualityGates: z.boolean().optional().default(true).describe("Include merged quality gates in the output (default: true)")
});

type GetNextFeatureParams = z.input<typeof getNextFeatureSchema>;

/**
 * Picks the feature an agent session should work on next.
 * When nothing is eligible, says whether the backlog is done or blocked.
 */
export function createGetNextFeatureHandler(context: ToolContext) {
    return async (params: GetNextFeatureParams): Promise<ToolResponse> => {
        const { includeQualityGates } = getNextFeatureSchema.parse(params);
        const { backlogService } = context;

        try {
            const feature = await backlogService.getNextFeature();

            if (feature) {
                const gates = includeQualityGates
                    ? await backlogService.getResolvedQualityGates(feature.id)
                    : undefined;
                return createTextResponse(`Next feature:\n\n${formatFeatureDetails(feature, gates)}`);
            }

            const summary = await backlogService.getSummary();
            if (summary.complete) {
                return createTextResponse(`Backlog complete: all ${summary.total} features are completed.`);
            }

            let text = `No eligible features. ${summary.blocked} pending feature(s) are blocked by unmet dependencies.\n\n${formatSummary(summary)}`;
            const dangling = await backlogService.validate();
            if (dangling.length > 0) {
                text += `\n\nUnresolvable dependencies:\n` +
                    dangling.map(d => `- ${d.featureId} -> ${d.missingId} (${d.reason})`).join('\n');
            }
            return createTextResponse(text);
        } catch (error) {
            return createErrorResponse('getNextFeature', error);
        }
    };
}

export function registerGetNextFeatureTool(server: McpServer, context: ToolContext): void {
    server.tool(
        "getNextFeature",
        "Returns the next feature to work on: in-progress work first, then the highest-priority pending feature whose dependencies are completed.",
        getNextFeatureSchema.shape,
        createGetNextFeatureHandler(context)
    );
}
