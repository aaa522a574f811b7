import * as fs from 'fs';
import * as path from 'path';
import type { BacklogRepository } from '../domain/backlog/repositories/BacklogRepository.js';
import { BacklogService } from '../domain/backlog/services/BacklogService.js';
import { FileBacklogRepository } from '../infrastructure/persistence/FileBacklogRepository.js';
import { RemoteBacklogRepository } from '../infrastructure/persistence/RemoteBacklogRepository.js';
import { ProgressTracker } from '../infrastructure/progress/ProgressTracker.js';
import { HARNESS_CONFIG_FILE, loadHarnessConfig } from '../infrastructure/harnessConfigLoader.js';
import type { HarnessConfig } from '../types/HarnessConfigTypes.js';

export type StorageMode = 'local' | 'remote';

export const DEFAULT_REMOTE_API_URL = 'http://localhost:4007';

/**
 * Where the backlog lives and how the progress log is tuned
 */
export interface HarnessServicesConfig {
  /**
   * Storage mode - local or remote
   */
  storageMode: StorageMode;

  /**
   * Project directory holding the backlog and progress log
   */
  projectPath: string;

  /**
   * API URL for remote storage (defaults to localhost:4007)
   */
  remoteApiUrl?: string;

  /**
   * API key for remote storage (optional for remote mode)
   */
  remoteApiKey?: string;

  harness: HarnessConfig;
}

export interface HarnessServices {
  backlogRepository: BacklogRepository;
  progress: ProgressTracker;
  backlogService: BacklogService;
}

/**
 * Wire repository, progress log and service for one project
 */
export function createHarnessServices(config: HarnessServicesConfig): HarnessServices {
  const backlogRepository: BacklogRepository = config.storageMode === 'remote'
    ? new RemoteBacklogRepository(config.remoteApiUrl || DEFAULT_REMOTE_API_URL, config.remoteApiKey)
    : new FileBacklogRepository(config.projectPath, config.harness.backlogFile);

  const progress = new ProgressTracker(config.projectPath, {
    fileName: config.harness.progressFile,
    rotationThresholdKb: config.harness.progressRotationThresholdKb,
    keepEntries: config.harness.progressKeepEntries,
  });

  const backlogService = new BacklogService(backlogRepository, progress, {
    defaultQualityGates: config.harness.defaultQualityGates,
  });

  return { backlogRepository, progress, backlogService };
}

/**
 * Load the harness configuration for a project. An explicit path must exist;
 * otherwise `harness.config.json` in the project is used when present.
 */
export function loadProjectHarnessConfig(
  projectPath: string,
  explicitConfigPath?: string,
  env: NodeJS.ProcessEnv = process.env
): HarnessConfig {
  const projectConfig = path.join(projectPath, HARNESS_CONFIG_FILE);
  const configPath = explicitConfigPath || (fs.existsSync(projectConfig) ? projectConfig : undefined);

  const result = loadHarnessConfig({ configPath, env });
  if (!result.success || !result.config) {
    throw new Error(result.error ?? 'Failed to load harness configuration');
  }
  return result.config;
}
