import type { QualityGates } from '../domain/backlog/entities/Feature.js';

export const DEFAULT_PROGRESS_FILE = 'agent-progress.txt';
export const DEFAULT_BACKLOG_FILE = 'feature-list.json';
export const DEFAULT_ROTATION_THRESHOLD_KB = 50;
export const DEFAULT_KEEP_ENTRIES = 100;

/**
 * Process-wide harness configuration.
 * Built once at startup and treated as read-only afterwards.
 */
export interface HarnessConfig {
    defaultQualityGates?: QualityGates;   // Applied to features without their own gates
    progressRotationThresholdKb: number;  // Rotate the progress log past this size
    progressKeepEntries: number;          // Entries kept live after a rotation
    progressFile: string;                 // Progress log file name, relative to the project
    backlogFile: string;                  // Backlog JSON file name, relative to the project
}

/**
 * Result from loading the harness configuration
 */
export interface LoadHarnessConfigResult {
    success: boolean;
    config?: HarnessConfig;
    error?: string;
}
