import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { registerAllTools } from "../application/tools/index.js";
import { createHarnessServices } from "./services.js";
import type { HarnessServices, HarnessServicesConfig } from "./services.js";

/**
 * Main application class that sets up the MCP server and dependencies.
 * stdout carries the MCP protocol, so everything is logged to stderr.
 */
export class HarnessApp {
  private server: McpServer;
  private services: HarnessServices;
  private config: HarnessServicesConfig;

  constructor(config: HarnessServicesConfig) {
    this.config = config;

    this.server = new McpServer({
      name: "agent-work-tracker",
      version: "1.0.0",
    });

    if (this.config.storageMode === 'remote') {
      console.error(`Using remote backlog at ${this.config.remoteApiUrl ?? 'default URL'}`);
    } else {
      console.error(`Using local backlog in ${this.config.projectPath}`);
    }

    this.services = createHarnessServices(this.config);
  }

  /**
   * Initialize the application
   */
  async initialize(): Promise<void> {
    try {
      await this.prepareProject();

      registerAllTools(this.server, {
        backlogService: this.services.backlogService,
        progress: this.services.progress,
      });

      this.setupShutdownHandlers();

      const transport = new StdioServerTransport();
      await this.server.connect(transport);

      console.error("Work tracker server started.");
    } catch (error) {
      console.error("Failed to start work tracker server:", error);
      process.exit(1);
    }
  }

  /**
   * Create the progress log and report dependency problems when a backlog exists.
   * A missing or unreachable backlog is not fatal: the tools report it per call.
   */
  private async prepareProject(): Promise<void> {
    const { backlogRepository, backlogService } = this.services;

    try {
      if (!(await backlogRepository.exists())) {
        console.error("Note: no backlog found yet. Tools will fail until the backlog file is created.");
        return;
      }

      await backlogService.initializeProgress();
      const dangling = await backlogService.validate();
      if (dangling.length > 0) {
        console.error(`Backlog has ${dangling.length} unresolvable dependency reference(s); affected features will never be scheduled.`);
      }
    } catch (error) {
      console.error("Note: backlog could not be loaded at startup:", error instanceof Error ? error.message : error);
    }
  }

  /**
   * Set up handlers for shutdown signals
   */
  private setupShutdownHandlers(): void {
    const shutdown = async (signal: string): Promise<void> => {
      try {
        await this.server.close();
        console.error(`Shutting down gracefully (${signal}).`);
        process.exit(0);
      } catch (error) {
        console.error("Error during shutdown:", error);
        process.exit(1);
      }
    };

    process.on('SIGINT', () => { void shutdown('SIGINT'); });
    process.on('SIGTERM', () => { void shutdown('SIGTERM'); });
  }
}
