import type { Backlog, Feature } from '../../src/domain/backlog/entities/Feature.js';

export function makeFeature(overrides: Partial<Feature> & { id: string }): Feature {
  return {
    name: `Feature ${overrides.id}`,
    description: '',
    category: 'functional',
    status: 'pending',
    priority: 0,
    dependsOn: [],
    acceptanceCriteria: [],
    sessionsSpent: 0,
    implementationNotes: [],
    ...overrides,
  };
}

export function makeBacklog(features: Feature[]): Backlog {
  return {
    projectName: 'demo-project',
    projectPath: '/tmp/demo-project',
    features,
    createdAt: '2026-01-01T00:00:00.000Z',
    lastUpdated: '2026-01-01T00:00:00.000Z',
  };
}
