import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import * as path from 'path';
import {
    commitHashSchema,
    featureIdSchema,
    filesChangedSchema,
    lineCountSchema,
    sessionIdSchema,
    summarySchema,
    tokenCountSchema
} from "../schemas/commonSchemas.js";
import { createErrorResponse, createTextResponse } from "./toolResponse.js";
import type { ToolContext, ToolResponse } from "./toolResponse.js";

const progressActionSchema = z.enum(['initialize', 'read', 'recent', 'archives', 'stats', 'handoff', 'usage']);

const progressLogSchema = z.object({
    action: progressActionSchema.describe("Progress log action to perform (required)"),
    lines: lineCountSchema.optional().default(50).describe("Number of recent lines (for recent, default 50)"),
    sessionId: sessionIdSchema.optional().describe("Session ID (required for handoff, usage)"),
    featureId: featureIdSchema.optional().describe("Feature the entry relates to (for handoff, usage)"),
    summary: summarySchema.optional().describe("Handoff summary (required for handoff)"),
    filesChanged: filesChangedSchema.optional().describe("Files changed in the session (for handoff)"),
    commitHash: commitHashSchema.optional().describe("Commit hash (for handoff)"),
    nextSteps: z.string().optional().describe("Instructions for the incoming session (for handoff)"),
    inputTokens: tokenCountSchema.optional().describe("Input tokens consumed (required for usage)"),
    outputTokens: tokenCountSchema.optional().describe("Output tokens generated (required for usage)"),
    cacheReadTokens: tokenCountSchema.optional().describe("Tokens read from cache (for usage)"),
    cacheWriteTokens: tokenCountSchema.optional().describe("Tokens written to cache (for usage)"),
    model: z.string().optional().describe("Model that consumed the tokens (for usage)")
});

type ProgressLogParams = z.input<typeof progressLogSchema>;

export function createProgressLogHandler(context: ToolContext) {
    return async (params: ProgressLogParams): Promise<ToolResponse> => {
        const safeParams = progressLogSchema.parse(params);
        const { action, lines, sessionId, featureId } = safeParams;
        const { backlogService, progress } = context;

        try {
            switch (action) {
                case 'initialize':
                    await backlogService.initializeProgress();
                    return createTextResponse("Progress log ready.");

                case 'read': {
                    const content = await progress.readProgress();
                    return createTextResponse(content || "Progress log is empty.");
                }

                case 'recent': {
                    const content = await progress.readRecent(lines);
                    return createTextResponse(content || "Progress log is empty.");
                }

                case 'archives': {
                    const archives = await progress.getArchiveFiles();
                    if (archives.length === 0) {
                        return createTextResponse("No progress archives yet.");
                    }
                    return createTextResponse(
                        `Progress archives (oldest first):\n${archives.map(a => `- ${path.basename(a)}`).join('\n')}`
                    );
                }

                case 'stats': {
                    const stats = await progress.getStats();
                    return createTextResponse(
                        `Progress log: ${stats.entries} entries, ${stats.totalLines} lines, ` +
                        `${stats.fileSizeKb} KB, ${stats.archives} archive(s)`
                    );
                }

                case 'handoff': {
                    if (!sessionId || !safeParams.summary) {
                        return createTextResponse("Error: 'sessionId' and 'summary' are required for action 'handoff'.", true);
                    }
                    await backlogService.recordHandoff(sessionId, {
                        featureId,
                        summary: safeParams.summary,
                        filesChanged: safeParams.filesChanged,
                        commitHash: safeParams.commitHash,
                        nextSteps: safeParams.nextSteps
                    });
                    return createTextResponse(`Handoff recorded for session ${sessionId}.`);
                }

                case 'usage': {
                    const { inputTokens, outputTokens } = safeParams;
                    if (!sessionId || inputTokens === undefined || outputTokens === undefined) {
                        return createTextResponse(
                            "Error: 'sessionId', 'inputTokens' and 'outputTokens' are required for action 'usage'.",
                            true
                        );
                    }
                    await backlogService.recordUsage(sessionId, featureId, {
                        inputTokens,
                        outputTokens,
                        cacheReadTokens: safeParams.cacheReadTokens,
                        cacheWriteTokens: safeParams.cacheWriteTokens,
                        model: safeParams.model
                    });
                    return createTextResponse(`Usage recorded for session ${sessionId}.`);
                }

                default:
                    return createTextResponse(`Unknown progress action: ${action}`, true);
            }
        } catch (error) {
            return createErrorResponse(action, error);
        }
    };
}

export function registerProgressLogTool(server: McpServer, context: ToolContext): void {
    server.tool(
        "progressLog",
        "Reads and writes the session progress log: read, recent lines, archives, stats, handoffs and token usage.",
        progressLogSchema.shape,
        createProgressLogHandler(context)
    );
}
