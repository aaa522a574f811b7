import { HarnessError } from "../../domain/backlog/errors.js";
import type { BacklogService } from "../../domain/backlog/services/BacklogService.js";
import type { ProgressLog } from "../../domain/progress/ProgressLog.js";

/**
 * Standard MCP tool result
 */
export type ToolResponse = {
    content: Array<{ type: "text"; text: string }>;
    isError?: boolean;
};

/**
 * Dependencies shared by every tool handler
 */
export interface ToolContext {
    backlogService: BacklogService;
    progress: ProgressLog;
}

// Helper to create the standard response structure
export function createTextResponse(text: string, isError: boolean = false): ToolResponse {
    return {
        content: [{ type: "text", text }],
        isError
    };
}

/**
 * Turn a thrown error into a tool error response.
 * Harness errors carry their code; anything else is reported by message.
 */
export function createErrorResponse(action: string, error: unknown): ToolResponse {
    if (error instanceof HarnessError) {
        return createTextResponse(`Error performing '${action}' [${error.code}]: ${error.message}`, true);
    }
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Tool action '${action}' failed:`, error);
    return createTextResponse(`Error performing '${action}': ${message}`, true);
}
