import { BacklogService } from '../../src/domain/backlog/services/BacklogService.js';
import type { Backlog } from '../../src/domain/backlog/entities/Feature.js';
import type { ToolContext } from '../../src/application/tools/toolResponse.js';
import { MockBacklogRepository } from './MockBacklogRepository.js';
import { MockProgressLog } from './MockProgressLog.js';
import { makeBacklog, makeFeature } from './backlogFixtures.js';

export interface TestToolContext extends ToolContext {
  repo: MockBacklogRepository;
  progress: MockProgressLog;
}

export function sampleBacklog(): Backlog {
  return makeBacklog([
    makeFeature({ id: 'login', name: 'Login form', priority: 5 }),
    makeFeature({ id: 'profile', name: 'Profile page', dependsOn: ['login'] }),
    makeFeature({ id: 'done', name: 'Scaffold', status: 'completed' }),
  ]);
}

/**
 * Pass null for a project whose backlog file does not exist yet
 */
export function createToolContext(backlog: Backlog | null = sampleBacklog()): TestToolContext {
  const repo = new MockBacklogRepository(backlog ?? undefined);
  const progress = new MockProgressLog();
  return { repo, progress, backlogService: new BacklogService(repo, progress) };
}

export function textOf(response: { content: Array<{ text: string }> }): string {
  return response.content.map(c => c.text).join('\n');
}
