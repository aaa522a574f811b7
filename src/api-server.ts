import { ApiServer } from './infrastructure/api/server.js';
import { createHarnessServices, loadProjectHarnessConfig } from './core/services.js';

/**
 * API Server entry point
 */
async function main(): Promise<void> {
  try {
    const port = process.env.PORT ? parseInt(process.env.PORT, 10) : 4007;
    const projectPath = process.env.PROJECT_PATH || process.cwd();

    // The API server always owns the backlog file itself
    const services = createHarnessServices({
      storageMode: 'local',
      projectPath,
      harness: loadProjectHarnessConfig(projectPath, process.env.HARNESS_CONFIG),
    });

    const server = new ApiServer(port, services, { apiKey: process.env.API_KEY });
    await server.start();

    console.log(`Work tracker API server started on port ${port}`);
    console.log(`Using project path: ${projectPath}`);
  } catch (error) {
    console.error('Failed to start API server:', error);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
