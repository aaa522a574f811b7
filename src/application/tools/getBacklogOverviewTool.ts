import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { featureStatusSchema } from "../schemas/commonSchemas.js";
import { summarizeBacklog } from "../../domain/backlog/services/BacklogScheduler.js";
import { formatFeatureLine, formatSummary } from "../formatters/featureFormatter.js";
import { createErrorResponse, createTextResponse } from "./toolResponse.js";
import type { ToolContext, ToolResponse } from "./toolResponse.js";

const getBacklogOverviewSchema = z.object({
    statusFilter: featureStatusSchema.optional().describe("Only list features with this status")
});

type GetBacklogOverviewParams = z.input<typeof getBacklogOverviewSchema>;

export function createGetBacklogOverviewHandler(context: ToolContext) {
    return async (params: GetBacklogOverviewParams): Promise<ToolResponse> => {
        const { statusFilter } = getBacklogOverviewSchema.parse(params);

        try {
            const backlog = await context.backlogService.getBacklog();
            const features = statusFilter
                ? backlog.features.filter(f => f.status === statusFilter)
                : backlog.features;

            let text = formatSummary(summarizeBacklog(backlog)) + '\n\n';
            if (features.length === 0) {
                text += statusFilter ? `No features found with status '${statusFilter}'.` : "No features found.";
            } else {
                text += features.map(formatFeatureLine).join('\n');
            }
            return createTextResponse(text);
        } catch (error) {
            return createErrorResponse('getBacklogOverview', error);
        }
    };
}

export function registerGetBacklogOverviewTool(server: McpServer, context: ToolContext): void {
    server.tool(
        "getBacklogOverview",
        "Summarizes the backlog: counts by status and one line per feature.",
        getBacklogOverviewSchema.shape,
        createGetBacklogOverviewHandler(context)
    );
}
