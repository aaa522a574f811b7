import type { Feature } from '../backlog/entities/Feature.js';
import type { ProgressLog, RotationResult } from './ProgressLog.js';

/**
 * Token counts reported for one agent session
 */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  cacheReadTokens?: number;
  cacheWriteTokens?: number;
  model?: string;
}

export function logSessionStart(
  progress: ProgressLog,
  sessionId: string,
  feature?: Feature
): Promise<RotationResult | undefined> {
  let summary: string;
  if (feature) {
    summary = `Starting work on feature: ${feature.name}\n\nDescription: ${feature.description}`;
    if (feature.acceptanceCriteria.length > 0) {
      summary += '\n\nAcceptance criteria:\n' + feature.acceptanceCriteria.map(c => `  - ${c}`).join('\n');
    }
  } else {
    summary = 'Starting new session (no specific feature assigned)';
  }

  return progress.appendEntry({
    sessionId,
    featureId: feature?.id,
    action: 'session_started',
    summary,
  });
}

/**
 * Record what the outgoing session leaves for the next one
 */
export function logHandoff(
  progress: ProgressLog,
  sessionId: string,
  featureId: string | undefined,
  summary: string,
  filesChanged: string[],
  commitHash?: string,
  nextSteps?: string
): Promise<RotationResult | undefined> {
  let fullSummary = `HANDOFF: ${summary}`;
  if (nextSteps) {
    fullSummary += `\n\nNEXT STEPS FOR INCOMING SESSION:\n${nextSteps}`;
  }

  return progress.appendEntry({
    sessionId,
    featureId,
    action: 'handoff',
    summary: fullSummary,
    filesChanged,
    commitHash,
  });
}

export function logFeatureCompleted(
  progress: ProgressLog,
  sessionId: string,
  feature: Feature,
  summary: string,
  commitHash?: string
): Promise<RotationResult | undefined> {
  return progress.appendEntry({
    sessionId,
    featureId: feature.id,
    action: 'feature_completed',
    summary: `COMPLETED: ${feature.name}\n\n${summary}`,
    commitHash,
  });
}

export function logUsage(
  progress: ProgressLog,
  sessionId: string,
  featureId: string | undefined,
  usage: TokenUsage
): Promise<RotationResult | undefined> {
  const lines = [
    `Token usage${usage.model ? ` (${usage.model})` : ''}:`,
    `  input: ${usage.inputTokens}`,
    `  output: ${usage.outputTokens}`,
  ];
  if (usage.cacheReadTokens) lines.push(`  cache read: ${usage.cacheReadTokens}`);
  if (usage.cacheWriteTokens) lines.push(`  cache write: ${usage.cacheWriteTokens}`);
  lines.push(`  total: ${usage.inputTokens + usage.outputTokens}`);

  return progress.appendEntry({
    sessionId,
    featureId,
    action: 'usage_recorded',
    summary: lines.join('\n'),
  });
}
