import { z } from 'zod';
import type { Backlog } from '../../domain/backlog/entities/Feature.js';
import { BacklogLoadError } from '../../domain/backlog/errors.js';

// Zod schema for validating quality gates (all fields optional on disk)
export const qualityGatesSchema = z.object({
    requireTests: z.boolean().default(false),
    maxFileLines: z.number().int().positive().optional(),
    securityChecklist: z.array(z.string()).default([]),
    lintCommand: z.string().min(1).optional(),
    typeCheckCommand: z.string().min(1).optional(),
    customValidators: z.array(z.string()).default([])
});

export const featureStatusSchema = z.enum(['pending', 'in-progress', 'completed']);

export const featureCategorySchema = z.enum([
    'functional',
    'bugfix',
    'refactor',
    'testing',
    'documentation',
    'infrastructure'
]);

// Zod schema for validating a single feature
export const featureSchema = z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    description: z.string().default(''),
    category: featureCategorySchema.default('functional'),
    status: featureStatusSchema.default('pending'),
    priority: z.number().int().default(0),
    dependsOn: z.array(z.string()).default([]),
    acceptanceCriteria: z.array(z.string()).default([]),
    qualityGates: qualityGatesSchema.optional(),
    startedAt: z.string().optional(),
    completedAt: z.string().optional(),
    sessionsSpent: z.number().int().min(0).default(0),
    implementationNotes: z.array(z.string()).default([])
});

// Zod schema for validating the entire backlog
export const backlogSchema = z.object({
    projectName: z.string().min(1),
    projectPath: z.string(),
    features: z.array(featureSchema).default([]),
    createdAt: z.string().default(() => new Date().toISOString()),
    lastUpdated: z.string().default(() => new Date().toISOString())
}).superRefine((backlog, ctx) => {
    const seen = new Set<string>();
    backlog.features.forEach((feature, index) => {
        if (seen.has(feature.id)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['features', index, 'id'],
                message: `Duplicate feature id: ${feature.id}`
            });
        }
        seen.add(feature.id);
    });
});

/**
 * Validates raw backlog data, filling defaults for omitted fields
 *
 * @param data Parsed JSON
 * @param source Where the data came from, used in error messages
 */
export function parseBacklog(data: unknown, source: string): Backlog {
    const result = backlogSchema.safeParse(data);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new BacklogLoadError(`Invalid backlog format in ${source}: ${issues}`, result.error);
    }
    return result.data;
}
