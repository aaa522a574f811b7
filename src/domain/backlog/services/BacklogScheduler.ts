import type {
  Backlog,
  BacklogSummary,
  DanglingDependency,
  Feature,
} from '../entities/Feature.js';
import { FeatureNotFoundError } from '../errors.js';

/**
 * Backlog Scheduler
 * Selection logic and lifecycle transitions over an in-memory Backlog.
 * Selection functions never mutate; the mark* functions mutate in place.
 */

function completedIds(backlog: Backlog): Set<string> {
  return new Set(
    backlog.features.filter(f => f.status === 'completed').map(f => f.id)
  );
}

function isEligible(feature: Feature, completed: Set<string>): boolean {
  return (
    feature.status === 'pending' &&
    feature.dependsOn.every(dep => completed.has(dep))
  );
}

/**
 * Highest priority wins; on equal priority the earlier feature is kept,
 * so callers must pass candidates in insertion order.
 */
function highestPriority(candidates: Feature[]): Feature | undefined {
  let best: Feature | undefined;
  for (const feature of candidates) {
    if (!best || feature.priority > best.priority) {
      best = feature;
    }
  }
  return best;
}

/**
 * Pending features whose dependencies are all completed, in insertion order
 */
export function getEligibleFeatures(backlog: Backlog): Feature[] {
  const completed = completedIds(backlog);
  return backlog.features.filter(f => isEligible(f, completed));
}

/**
 * Pick the next feature to work on.
 *
 * In-progress work always takes precedence over starting new work, even when
 * a pending feature has a higher priority. Returns undefined both when the
 * backlog is complete and when all remaining work is blocked; use
 * {@link isComplete} to tell the two apart.
 */
export function getNextFeature(backlog: Backlog): Feature | undefined {
  const inProgress = backlog.features.filter(f => f.status === 'in-progress');
  if (inProgress.length > 0) {
    return highestPriority(inProgress);
  }
  return highestPriority(getEligibleFeatures(backlog));
}

/**
 * True when every feature is completed (an empty backlog is complete)
 */
export function isComplete(backlog: Backlog): boolean {
  return backlog.features.every(f => f.status === 'completed');
}

export function findFeature(backlog: Backlog, featureId: string): Feature {
  const feature = backlog.features.find(f => f.id === featureId);
  if (!feature) {
    throw new FeatureNotFoundError(featureId);
  }
  return feature;
}

/**
 * Move a feature to in-progress and count the session.
 * A completed feature is left untouched.
 */
export function markFeatureStarted(
  backlog: Backlog,
  featureId: string,
  now: Date = new Date()
): Feature {
  const feature = findFeature(backlog, featureId);
  if (feature.status === 'completed') {
    return feature;
  }

  const timestamp = now.toISOString();
  feature.status = 'in-progress';
  if (!feature.startedAt) {
    feature.startedAt = timestamp;
  }
  feature.sessionsSpent += 1;
  backlog.lastUpdated = timestamp;
  return feature;
}

export function markFeatureCompleted(
  backlog: Backlog,
  featureId: string,
  note?: string,
  now: Date = new Date()
): Feature {
  const feature = findFeature(backlog, featureId);
  const timestamp = now.toISOString();

  feature.status = 'completed';
  feature.completedAt = timestamp;
  if (note) {
    feature.implementationNotes.push(note);
  }
  backlog.lastUpdated = timestamp;
  return feature;
}

export function addImplementationNote(
  backlog: Backlog,
  featureId: string,
  note: string,
  now: Date = new Date()
): Feature {
  const feature = findFeature(backlog, featureId);
  feature.implementationNotes.push(note);
  backlog.lastUpdated = now.toISOString();
  return feature;
}

/**
 * Dependency ids that cannot be satisfied. Features carrying them are never
 * eligible; the scheduler skips them rather than failing.
 */
export function findDanglingDependencies(backlog: Backlog): DanglingDependency[] {
  const known = new Set(backlog.features.map(f => f.id));
  const dangling: DanglingDependency[] = [];

  for (const feature of backlog.features) {
    for (const dep of feature.dependsOn) {
      if (dep === feature.id) {
        dangling.push({ featureId: feature.id, missingId: dep, reason: 'selfDependency' });
      } else if (!known.has(dep)) {
        dangling.push({ featureId: feature.id, missingId: dep, reason: 'missing' });
      }
    }
  }

  return dangling;
}

export function summarizeBacklog(backlog: Backlog): BacklogSummary {
  const completed = completedIds(backlog);
  const summary: BacklogSummary = {
    projectName: backlog.projectName,
    total: backlog.features.length,
    pending: 0,
    inProgress: 0,
    completed: completed.size,
    blocked: 0,
    eligible: 0,
    complete: isComplete(backlog),
  };

  for (const feature of backlog.features) {
    if (feature.status === 'in-progress') {
      summary.inProgress += 1;
    } else if (feature.status === 'pending') {
      summary.pending += 1;
      if (isEligible(feature, completed)) {
        summary.eligible += 1;
      } else {
        summary.blocked += 1;
      }
    }
  }

  return summary;
}
