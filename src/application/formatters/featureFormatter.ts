import type { BacklogSummary, Feature, QualityGates } from "../../domain/backlog/entities/Feature.js";
import { formatQualityGates } from "../../domain/backlog/services/qualityGates.js";

const STATUS_ICONS: Record<Feature['status'], string> = {
    'pending': ' ',
    'in-progress': '~',
    'completed': 'x'
};

/**
 * One-line listing entry, e.g. "[x] auth-login: Login form (priority 5)"
 */
export function formatFeatureLine(feature: Feature): string {
    let line = `[${STATUS_ICONS[feature.status]}] ${feature.id}: ${feature.name} (priority ${feature.priority})`;
    if (feature.dependsOn.length > 0) {
        line += ` depends on: ${feature.dependsOn.join(', ')}`;
    }
    return line;
}

/**
 * Full Markdown description of a feature, suitable for an agent prompt
 */
export function formatFeatureDetails(feature: Feature, gates?: QualityGates): string {
    let md = `# ${feature.name} (ID: ${feature.id})\n\n`;
    md += `**Status**: ${feature.status} | **Priority**: ${feature.priority} | **Category**: ${feature.category}\n`;
    md += `**Sessions spent**: ${feature.sessionsSpent}`;
    if (feature.startedAt) md += ` | **Started**: ${feature.startedAt}`;
    if (feature.completedAt) md += ` | **Completed**: ${feature.completedAt}`;
    md += `\n`;

    if (feature.description) {
        md += `\n## Description\n${feature.description}\n`;
    }

    md += `\n## Acceptance Criteria\n`;
    md += feature.acceptanceCriteria.length > 0
        ? feature.acceptanceCriteria.map(c => `- [ ] ${c}`).join('\n') + '\n'
        : '- No specific criteria defined\n';

    if (feature.dependsOn.length > 0) {
        md += `\n## Dependencies\n`;
        feature.dependsOn.forEach(depId => { md += `- Depends on: ${depId}\n`; });
    }

    md += `\n## Quality Gates\n${formatQualityGates(gates)}\n`;

    if (feature.implementationNotes.length > 0) {
        md += `\n## Implementation Notes\n`;
        feature.implementationNotes.forEach(note => { md += `- ${note}\n`; });
    }

    return md;
}

export function formatSummary(summary: BacklogSummary): string {
    return `Project: ${summary.projectName}\n` +
        `Features: ${summary.total} total, ${summary.completed} completed, ${summary.inProgress} in progress, ` +
        `${summary.pending} pending (${summary.eligible} ready, ${summary.blocked} blocked)`;
}
