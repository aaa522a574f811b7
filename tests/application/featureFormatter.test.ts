import { describe, it, expect } from 'vitest';
import {
  formatFeatureDetails,
  formatFeatureLine,
  formatSummary,
} from '../../src/application/formatters/featureFormatter.js';
import { makeFeature } from '../mocks/backlogFixtures.js';

describe('featureFormatter', () => {
  it('should render one line per feature with status and dependencies', () => {
    expect(formatFeatureLine(makeFeature({ id: 'a', name: 'Alpha', priority: 3 }))).toBe(
      '[ ] a: Alpha (priority 3)'
    );
    expect(formatFeatureLine(makeFeature({ id: 'b', name: 'Beta', status: 'in-progress', dependsOn: ['a', 'c'] }))).toBe(
      '[~] b: Beta (priority 0) depends on: a, c'
    );
    expect(formatFeatureLine(makeFeature({ id: 'c', name: 'Gamma', status: 'completed' }))).toBe(
      '[x] c: Gamma (priority 0)'
    );
  });

  it('should render full details as Markdown', () => {
    const feature = makeFeature({
      id: 'login',
      name: 'Login form',
      description: 'Email login',
      priority: 5,
      acceptanceCriteria: ['works'],
      dependsOn: ['setup'],
      implementationNotes: ['n1'],
    });

    expect(formatFeatureDetails(feature)).toBe(
      '# Login form (ID: login)\n\n' +
      '**Status**: pending | **Priority**: 5 | **Category**: functional\n' +
      '**Sessions spent**: 0\n' +
      '\n## Description\nEmail login\n' +
      '\n## Acceptance Criteria\n- [ ] works\n' +
      '\n## Dependencies\n- Depends on: setup\n' +
      '\n## Quality Gates\nNo quality gates configured for this feature.\n' +
      '\n## Implementation Notes\n- n1\n'
    );
  });

  it('should note missing acceptance criteria and show timestamps', () => {
    const feature = makeFeature({
      id: 'x',
      name: 'X',
      status: 'completed',
      startedAt: '2026-01-01T00:00:00.000Z',
      completedAt: '2026-01-02T00:00:00.000Z',
      sessionsSpent: 2,
    });

    const md = formatFeatureDetails(feature);

    expect(md).toContain(
      '**Sessions spent**: 2 | **Started**: 2026-01-01T00:00:00.000Z | **Completed**: 2026-01-02T00:00:00.000Z\n'
    );
    expect(md).toContain('## Acceptance Criteria\n- No specific criteria defined\n');
  });

  it('should summarize counts', () => {
    expect(formatSummary({
      projectName: 'demo',
      total: 4,
      pending: 2,
      inProgress: 1,
      completed: 1,
      blocked: 1,
      eligible: 1,
      complete: false,
    })).toBe('Project: demo\nFeatures: 4 total, 1 completed, 1 in progress, 2 pending (1 ready, 1 blocked)');
  });
});
