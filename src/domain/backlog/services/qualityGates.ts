import type { Feature, QualityGates } from '../entities/Feature.js';

/**
 * Merge feature-specific gates over harness defaults.
 * Scalars fall back to the default when unset on the feature; lists fall back
 * when the feature's list is empty; `requireTests` is enforced if either asks.
 */
export function mergeQualityGates(
  featureGates: QualityGates | undefined,
  defaultGates: QualityGates | undefined
): QualityGates | undefined {
  if (!featureGates) return defaultGates;
  if (!defaultGates) return featureGates;

  return {
    requireTests: featureGates.requireTests || defaultGates.requireTests,
    maxFileLines: featureGates.maxFileLines ?? defaultGates.maxFileLines,
    securityChecklist: featureGates.securityChecklist.length > 0
      ? featureGates.securityChecklist
      : defaultGates.securityChecklist,
    lintCommand: featureGates.lintCommand ?? defaultGates.lintCommand,
    typeCheckCommand: featureGates.typeCheckCommand ?? defaultGates.typeCheckCommand,
    customValidators: featureGates.customValidators.length > 0
      ? featureGates.customValidators
      : defaultGates.customValidators,
  };
}

export function resolveQualityGates(
  feature: Feature,
  defaultGates: QualityGates | undefined
): QualityGates | undefined {
  return mergeQualityGates(feature.qualityGates, defaultGates);
}

/**
 * Render gates as a checklist an agent can read in its prompt
 */
export function formatQualityGates(gates: QualityGates | undefined): string {
  const info: string[] = [];

  if (gates) {
    if (gates.requireTests) info.push('- Tests are required before completion');
    if (gates.maxFileLines) info.push(`- Files must be under ${gates.maxFileLines} lines`);
    if (gates.lintCommand) info.push(`- Lint check will run: \`${gates.lintCommand}\``);
    if (gates.typeCheckCommand) info.push(`- Type check will run: \`${gates.typeCheckCommand}\``);
    if (gates.customValidators.length > 0) {
      info.push(`- ${gates.customValidators.length} custom validator(s) configured`);
    }
    for (const item of gates.securityChecklist) {
      info.push(`- [ ] Security: ${item}`);
    }
  }

  if (info.length === 0) {
    return 'No quality gates configured for this feature.';
  }

  return 'The following quality gates must pass:\n' + info.join('\n');
}
