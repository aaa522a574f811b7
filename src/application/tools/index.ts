import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ToolContext } from "./toolResponse.js";

import { registerGetNextFeatureTool } from "./getNextFeatureTool.js";
import { registerManageFeatureTool } from "./manageFeatureTool.js";
import { registerProgressLogTool } from "./progressLogTool.js";
import { registerGetBacklogOverviewTool } from "./getBacklogOverviewTool.js";

/**
 * Registers all application tools with the MCP server
 */
export function registerAllTools(server: McpServer, context: ToolContext): void {
  registerGetNextFeatureTool(server, context);
  registerManageFeatureTool(server, context);
  registerProgressLogTool(server, context);
  registerGetBacklogOverviewTool(server, context);
}
