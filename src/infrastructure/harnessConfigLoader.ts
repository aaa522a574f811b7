import fs from 'fs';
import { z } from 'zod';
import { qualityGatesSchema } from './persistence/backlogSchema.js';
import {
    DEFAULT_BACKLOG_FILE,
    DEFAULT_KEEP_ENTRIES,
    DEFAULT_PROGRESS_FILE,
    DEFAULT_ROTATION_THRESHOLD_KB
} from '../types/HarnessConfigTypes.js';
import type { HarnessConfig, LoadHarnessConfigResult } from '../types/HarnessConfigTypes.js';

export const HARNESS_CONFIG_FILE = 'harness.config.json';

// Zod schema for validating a harness configuration file
const harnessConfigFileSchema = z.object({
    defaultQualityGates: qualityGatesSchema.optional(),
    progressRotationThresholdKb: z.number().int().positive().optional(),
    progressKeepEntries: z.number().int().positive().optional(),
    progressFile: z.string().min(1).optional(),
    backlogFile: z.string().min(1).optional()
}).strict();

// Environment overrides arrive as strings
const harnessConfigEnvSchema = z.object({
    progressRotationThresholdKb: z.coerce.number().int().positive().optional(),
    progressKeepEntries: z.coerce.number().int().positive().optional(),
    progressFile: z.string().min(1).optional(),
    backlogFile: z.string().min(1).optional()
});

const ENV_KEYS = {
    progressRotationThresholdKb: 'HARNESS_PROGRESS_ROTATION_KB',
    progressKeepEntries: 'HARNESS_PROGRESS_KEEP_ENTRIES',
    progressFile: 'HARNESS_PROGRESS_FILE',
    backlogFile: 'HARNESS_BACKLOG_FILE'
} as const;

/**
 * Default harness configuration
 * Used for every field the config file and environment leave unset
 */
export const DEFAULT_HARNESS_CONFIG: HarnessConfig = {
    progressRotationThresholdKb: DEFAULT_ROTATION_THRESHOLD_KB,
    progressKeepEntries: DEFAULT_KEEP_ENTRIES,
    progressFile: DEFAULT_PROGRESS_FILE,
    backlogFile: DEFAULT_BACKLOG_FILE
};

export interface LoadHarnessConfigOptions {
    configPath?: string;
    env?: NodeJS.ProcessEnv;
}

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
}

/**
 * Loads and validates the harness configuration.
 * Precedence: defaults, then the JSON file (when a path is given), then env.
 *
 * @returns Result containing the configuration or an error message
 */
export function loadHarnessConfig(options: LoadHarnessConfigOptions = {}): LoadHarnessConfigResult {
    const env = options.env ?? process.env;

    try {
        let fileConfig: z.infer<typeof harnessConfigFileSchema> = {};

        if (options.configPath) {
            if (!fs.existsSync(options.configPath)) {
                return {
                    success: false,
                    error: `Configuration file not found: ${options.configPath}`
                };
            }

            const configJson: unknown = JSON.parse(fs.readFileSync(options.configPath, 'utf-8'));
            const fileResult = harnessConfigFileSchema.safeParse(configJson);
            if (!fileResult.success) {
                return {
                    success: false,
                    error: `Invalid configuration format: ${formatIssues(fileResult.error)}`
                };
            }
            fileConfig = fileResult.data;
        }

        const rawEnv: Record<string, string> = {};
        for (const [field, envKey] of Object.entries(ENV_KEYS)) {
            const value = env[envKey];
            if (value !== undefined && value !== '') {
                rawEnv[field] = value;
            }
        }

        const envResult = harnessConfigEnvSchema.safeParse(rawEnv);
        if (!envResult.success) {
            return {
                success: false,
                error: `Invalid environment configuration: ${formatIssues(envResult.error)}`
            };
        }

        const envConfig = envResult.data;
        return {
            success: true,
            config: {
                defaultQualityGates: fileConfig.defaultQualityGates ?? DEFAULT_HARNESS_CONFIG.defaultQualityGates,
                progressRotationThresholdKb: envConfig.progressRotationThresholdKb
                    ?? fileConfig.progressRotationThresholdKb
                    ?? DEFAULT_HARNESS_CONFIG.progressRotationThresholdKb,
                progressKeepEntries: envConfig.progressKeepEntries
                    ?? fileConfig.progressKeepEntries
                    ?? DEFAULT_HARNESS_CONFIG.progressKeepEntries,
                progressFile: envConfig.progressFile ?? fileConfig.progressFile ?? DEFAULT_HARNESS_CONFIG.progressFile,
                backlogFile: envConfig.backlogFile ?? fileConfig.backlogFile ?? DEFAULT_HARNESS_CONFIG.backlogFile
            }
        };
    } catch (error) {
        return {
            success: false,
            error: `Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`
        };
    }
}
