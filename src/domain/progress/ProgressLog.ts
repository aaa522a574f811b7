import type { ProgressEntry } from '../backlog/entities/Feature.js';

/**
 * Result of a rotation triggered by an append
 */
export interface RotationResult {
  archivePath: string;
  archivedEntries: number;
  retainedEntries: number;
}

export interface ProgressStats {
  fileSizeKb: number;
  totalLines: number;
  entries: number;
  archives: number;
}

/**
 * Progress Log interface
 * The append-only activity ledger the backlog service writes to
 */
export interface ProgressLog {
  initialize(projectName: string): Promise<void>;

  /**
   * Append an entry; rotates the live file when it grows past the threshold
   */
  appendEntry(entry: ProgressEntry): Promise<RotationResult | undefined>;

  readProgress(): Promise<string>;

  readRecent(lines?: number): Promise<string>;

  getArchiveFiles(): Promise<string[]>;

  getStats(): Promise<ProgressStats>;
}
