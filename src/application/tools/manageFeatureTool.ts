import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { v4 as uuidv4 } from 'uuid';
import { commitHashSchema, featureIdSchema, sessionIdSchema, summarySchema } from "../schemas/commonSchemas.js";
import { formatFeatureDetails } from "../formatters/featureFormatter.js";
import { createErrorResponse, createTextResponse } from "./toolResponse.js";
import type { ToolContext, ToolResponse } from "./toolResponse.js";

const manageFeatureActionSchema = z.enum(['get', 'start', 'complete', 'addNote', 'validate']);

const manageFeatureSchema = z.object({
    action: manageFeatureActionSchema.describe("Feature action to perform (required)"),
    featureId: featureIdSchema.optional().describe("Feature ID (for get, start, complete, addNote)"),
    sessionId: sessionIdSchema.optional().describe("Session ID (for start, complete; generated when omitted)"),
    summary: summarySchema.optional().describe("What was accomplished (required for complete)"),
    commitHash: commitHashSchema.optional().describe("Commit containing the work (for complete)"),
    note: z.string().min(1).optional().describe("Implementation note (for complete, required for addNote)")
});

type ManageFeatureParams = z.input<typeof manageFeatureSchema>;

export function createManageFeatureHandler(context: ToolContext) {
    return async (params: ManageFeatureParams): Promise<ToolResponse> => {
        const { action, featureId, sessionId, summary, commitHash, note } = manageFeatureSchema.parse(params);
        const { backlogService } = context;

        try {
            if (action === 'validate') {
                const dangling = await backlogService.validate();
                if (dangling.length === 0) {
                    return createTextResponse("Backlog is valid: every dependency resolves.");
                }
                return createTextResponse(
                    `Found ${dangling.length} unresolvable dependenc${dangling.length === 1 ? 'y' : 'ies'}:\n` +
                    dangling.map(d => `- ${d.featureId} -> ${d.missingId} (${d.reason})`).join('\n'),
                    true
                );
            }

            if (!featureId) {
                return createTextResponse(`Error: 'featureId' is required for action '${action}'.`, true);
            }

            switch (action) {
                case 'get': {
                    const feature = await backlogService.getFeature(featureId);
                    const gates = await backlogService.getResolvedQualityGates(featureId);
                    return createTextResponse(formatFeatureDetails(feature, gates));
                }

                case 'start': {
                    const session = sessionId ?? uuidv4();
                    const { feature, started } = await backlogService.startFeature(featureId, session);
                    if (!started) {
                        return createTextResponse(`Feature ${featureId} is already completed; nothing to start.`);
                    }
                    return createTextResponse(
                        `Started feature ${feature.id} in session ${session} (sessions spent: ${feature.sessionsSpent}).`
                    );
                }

                case 'complete': {
                    if (!summary) {
                        return createTextResponse("Error: 'summary' is required for action 'complete'.", true);
                    }
                    const session = sessionId ?? uuidv4();
                    const feature = await backlogService.completeFeature(featureId, session, { summary, commitHash, note });
                    return createTextResponse(`Completed feature ${feature.id} at ${feature.completedAt}.`);
                }

                case 'addNote': {
                    if (!note) {
                        return createTextResponse("Error: 'note' is required for action 'addNote'.", true);
                    }
                    const feature = await backlogService.addNote(featureId, note);
                    return createTextResponse(
                        `Added note to feature ${feature.id} (${feature.implementationNotes.length} note(s)).`
                    );
                }

                default:
                    return createTextResponse(`Unknown feature action: ${action}`, true);
            }
        } catch (error) {
            return createErrorResponse(action, error);
        }
    };
}

export function registerManageFeatureTool(server: McpServer, context: ToolContext): void {
    server.tool(
        "manageFeature",
        "Manages backlog features: get details, start, complete, add implementation notes, validate dependencies.",
        manageFeatureSchema.shape,
        createManageFeatureHandler(context)
    );
}
