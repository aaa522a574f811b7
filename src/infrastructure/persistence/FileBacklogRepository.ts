import * as fs from 'fs/promises';
import * as path from 'path';
import type { Backlog } from '../../domain/backlog/entities/Feature.js';
import type { BacklogRepository } from '../../domain/backlog/repositories/BacklogRepository.js';
import { BacklogLoadError } from '../../domain/backlog/errors.js';
import { findDanglingDependencies } from '../../domain/backlog/services/BacklogScheduler.js';
import { DEFAULT_BACKLOG_FILE } from '../../types/HarnessConfigTypes.js';
import { errorCode, fileExists, writeFileAtomic } from '../storage/fileUtils.js';
import { parseBacklog } from './backlogSchema.js';

/**
 * File-based implementation of the BacklogRepository
 * Keeps the whole backlog in one JSON file inside the project
 */
export class FileBacklogRepository implements BacklogRepository {
  private backlogFile: string;

  /**
   * @param projectPath Project root the backlog file lives in (required)
   * @param fileName Backlog file name relative to the project root
   */
  constructor(projectPath: string, fileName: string = DEFAULT_BACKLOG_FILE) {
    if (!projectPath) {
      throw new Error('Project path is required for backlog storage');
    }
    this.backlogFile = path.join(projectPath, fileName);
  }

  /**
   * Get the backlog file path
   */
  getBacklogFilePath(): string {
    return this.backlogFile;
  }

  async exists(): Promise<boolean> {
    return fileExists(this.backlogFile);
  }

  /**
   * Load and validate the backlog. Dangling dependencies do not fail the
   * load; they are reported so the caller can fix the backlog.
   */
  async loadBacklog(): Promise<Backlog> {
    let raw: string;
    try {
      raw = await fs.readFile(this.backlogFile, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        throw new BacklogLoadError(`Backlog file not found: ${this.backlogFile}`, error);
      }
      throw new BacklogLoadError(`Failed to read backlog file ${this.backlogFile}`, error);
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new BacklogLoadError(`Backlog file is not valid JSON: ${this.backlogFile}`, error);
    }

    const backlog = parseBacklog(data, this.backlogFile);

    for (const dangling of findDanglingDependencies(backlog)) {
      console.warn(
        dangling.reason === 'selfDependency'
          ? `Feature ${dangling.featureId} depends on itself and will never be scheduled`
          : `Feature ${dangling.featureId} depends on unknown feature ${dangling.missingId} and will never be scheduled`
      );
    }

    return backlog;
  }

  async saveBacklog(backlog: Backlog): Promise<void> {
    try {
      await writeFileAtomic(this.backlogFile, JSON.stringify(backlog, null, 2) + '\n');
    } catch (error) {
      throw new Error(`Failed to save backlog to ${this.backlogFile}`, { cause: error });
    }
  }
}
