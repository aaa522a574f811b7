import { describe, it, expect, beforeEach } from 'vitest';
import { createManageFeatureHandler } from '../../src/application/tools/manageFeatureTool.js';
import { createToolContext, textOf } from '../mocks/toolContext.js';
import type { TestToolContext } from '../mocks/toolContext.js';
import { makeBacklog, makeFeature } from '../mocks/backlogFixtures.js';

describe('manageFeature tool', () => {
  let context: TestToolContext;
  let handler: ReturnType<typeof createManageFeatureHandler>;

  beforeEach(() => {
    context = createToolContext();
    handler = createManageFeatureHandler(context);
  });

  it('should show feature details', async () => {
    const response = await handler({ action: 'get', featureId: 'profile' });

    expect(textOf(response).startsWith('# Profile page (ID: profile)\n')).toBe(true);
  });

  it('should require a feature id', async () => {
    const response = await handler({ action: 'get' });

    expect(response.isError).toBe(true);
    expect(textOf(response)).toBe("Error: 'featureId' is required for action 'get'.");
  });

  it('should report an unknown feature with its error code', async () => {
    const response = await handler({ action: 'start', featureId: 'ghost', sessionId: 's-1' });

    expect(response.isError).toBe(true);
    expect(textOf(response)).toBe("Error performing 'start' [FEATURE_NOT_FOUND]: Feature ghost not found");
  });

  it('should start a feature in the given session', async () => {
    const response = await handler({ action: 'start', featureId: 'login', sessionId: 's-1' });

    expect(textOf(response)).toBe('Started feature login in session s-1 (sessions spent: 1).');
    expect(context.progress.entries[0].action).toBe('session_started');
  });

  it('should generate a session id when none is given', async () => {
    await handler({ action: 'start', featureId: 'login' });

    expect(context.progress.entries[0].sessionId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should not restart a completed feature', async () => {
    const response = await handler({ action: 'start', featureId: 'done', sessionId: 's-1' });

    expect(textOf(response)).toBe('Feature done is already completed; nothing to start.');
    expect(context.progress.entries).toEqual([]);
  });

  it('should require a summary to complete', async () => {
    const response = await handler({ action: 'complete', featureId: 'login' });

    expect(response.isError).toBe(true);
    expect(textOf(response)).toBe("Error: 'summary' is required for action 'complete'.");
  });

  it('should complete a feature', async () => {
    const response = await handler({
      action: 'complete',
      featureId: 'login',
      sessionId: 's-1',
      summary: 'Login done',
      commitHash: 'abc1234',
    });

    const completedAt = context.repo.stored()?.features[0].completedAt;
    expect(textOf(response)).toBe(`Completed feature login at ${completedAt}.`);
    expect(context.progress.entries[0].commitHash).toBe('abc1234');
  });

  it('should add notes', async () => {
    const response = await handler({ action: 'addNote', featureId: 'login', note: 'use the shared form' });

    expect(textOf(response)).toBe('Added note to feature login (1 note(s)).');
  });

  it('should validate dependencies', async () => {
    expect(textOf(await handler({ action: 'validate' }))).toBe('Backlog is valid: every dependency resolves.');

    const broken = createManageFeatureHandler(
      createToolContext(makeBacklog([makeFeature({ id: 'a', dependsOn: ['a', 'ghost'] })]))
    );
    const response = await broken({ action: 'validate' });

    expect(response.isError).toBe(true);
    expect(textOf(response)).toBe(
      'Found 2 unresolvable dependencies:\n- a -> a (selfDependency)\n- a -> ghost (missing)'
    );
  });
});
