#!/usr/bin/env node
import { HarnessApp } from "./core/app.js";
import { loadProjectHarnessConfig } from "./core/services.js";
import type { HarnessServicesConfig } from "./core/services.js";

/**
 * Application entry point
 */
async function main(): Promise<void> {
  const projectPath = process.env.PROJECT_PATH || process.cwd();

  const config: HarnessServicesConfig = {
    storageMode: (process.env.STORAGE_MODE === 'remote') ? 'remote' : 'local',
    projectPath,
    remoteApiUrl: process.env.REMOTE_API_URL,
    remoteApiKey: process.env.REMOTE_API_KEY,
    harness: loadProjectHarnessConfig(projectPath, process.env.HARNESS_CONFIG),
  };

  console.error(`Storage mode: ${config.storageMode}`);
  console.error(`Progress log: ${config.harness.progressFile} (rotates past ${config.harness.progressRotationThresholdKb} KB)`);

  const app = new HarnessApp(config);
  await app.initialize();
}

main().catch((error) => {
  console.error("Unhandled error:", error);
  process.exit(1);
});
