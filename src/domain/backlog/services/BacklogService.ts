import type {
  Backlog,
  BacklogSummary,
  DanglingDependency,
  Feature,
  QualityGates,
} from '../entities/Feature.js';
import type { BacklogRepository } from '../repositories/BacklogRepository.js';
import type { ProgressLog } from '../../progress/ProgressLog.js';
import {
  logFeatureCompleted,
  logHandoff,
  logSessionStart,
  logUsage,
} from '../../progress/sessionLogging.js';
import type { TokenUsage } from '../../progress/sessionLogging.js';
import {
  addImplementationNote,
  findDanglingDependencies,
  findFeature,
  getNextFeature,
  isComplete,
  markFeatureCompleted,
  markFeatureStarted,
  summarizeBacklog,
} from './BacklogScheduler.js';
import { resolveQualityGates } from './qualityGates.js';
import { SerialQueue } from '../../shared/SerialQueue.js';

export interface CompleteFeatureParams {
  summary: string;
  commitHash?: string;
  note?: string;
}

export interface HandoffParams {
  featureId?: string;
  summary: string;
  filesChanged?: string[];
  commitHash?: string;
  nextSteps?: string;
}

export interface BacklogServiceOptions {
  defaultQualityGates?: QualityGates;
}

/**
 * Backlog Service
 * Drives a feature through its lifecycle: every transition is persisted
 * through the repository and recorded in the progress log.
 * Load-modify-save sequences run one at a time, so overlapping requests
 * never overwrite each other's changes.
 */
export class BacklogService {
  private defaultQualityGates?: QualityGates;
  private readonly mutations = new SerialQueue();

  constructor(
    private backlogRepository: BacklogRepository,
    private progress: ProgressLog,
    options: BacklogServiceOptions = {}
  ) {
    this.defaultQualityGates = options.defaultQualityGates;
  }

  getBacklog(): Promise<Backlog> {
    return this.backlogRepository.loadBacklog();
  }

  async getNextFeature(): Promise<Feature | undefined> {
    return getNextFeature(await this.getBacklog());
  }

  async getFeature(featureId: string): Promise<Feature> {
    return findFeature(await this.getBacklog(), featureId);
  }

  async getSummary(): Promise<BacklogSummary> {
    return summarizeBacklog(await this.getBacklog());
  }

  async isComplete(): Promise<boolean> {
    return isComplete(await this.getBacklog());
  }

  /**
   * Quality gates that apply to a feature once harness defaults are merged in
   */
  async getResolvedQualityGates(featureId: string): Promise<QualityGates | undefined> {
    return resolveQualityGates(await this.getFeature(featureId), this.defaultQualityGates);
  }

  /**
   * Dependency problems in the stored backlog
   */
  async validate(): Promise<DanglingDependency[]> {
    return findDanglingDependencies(await this.getBacklog());
  }

  /**
   * Create the progress log for the backlog's project if it does not exist yet
   */
  async initializeProgress(): Promise<void> {
    const backlog = await this.getBacklog();
    await this.progress.initialize(backlog.projectName);
  }

  /**
   * Start (or resume) a feature. A completed feature is returned unchanged
   * with `started: false` and nothing is persisted or logged.
   */
  startFeature(featureId: string, sessionId: string): Promise<{ feature: Feature; started: boolean }> {
    return this.mutations.run(async () => {
      const backlog = await this.getBacklog();
      const current = findFeature(backlog, featureId);
      if (current.status === 'completed') {
        return { feature: current, started: false };
      }

      const feature = markFeatureStarted(backlog, featureId);
      await this.backlogRepository.saveBacklog(backlog);
      await logSessionStart(this.progress, sessionId, feature);

      return { feature, started: true };
    });
  }

  completeFeature(featureId: string, sessionId: string, params: CompleteFeatureParams): Promise<Feature> {
    return this.mutations.run(async () => {
      const backlog = await this.getBacklog();
      const feature = markFeatureCompleted(backlog, featureId, params.note);
      await this.backlogRepository.saveBacklog(backlog);
      await logFeatureCompleted(this.progress, sessionId, feature, params.summary, params.commitHash);
      return feature;
    });
  }

  addNote(featureId: string, note: string): Promise<Feature> {
    return this.mutations.run(async () => {
      const backlog = await this.getBacklog();
      const feature = addImplementationNote(backlog, featureId, note);
      await this.backlogRepository.saveBacklog(backlog);
      return feature;
    });
  }

  /**
   * Replace the stored backlog wholesale, in turn with other mutations
   */
  replaceBacklog(backlog: Backlog): Promise<void> {
    return this.mutations.run(() => this.backlogRepository.saveBacklog(backlog));
  }

  async recordHandoff(sessionId: string, params: HandoffParams): Promise<void> {
    if (params.featureId) {
      await this.getFeature(params.featureId);
    }

    await logHandoff(
      this.progress,
      sessionId,
      params.featureId,
      params.summary,
      params.filesChanged ?? [],
      params.commitHash,
      params.nextSteps
    );
  }

  async recordUsage(sessionId: string, featureId: string | undefined, usage: TokenUsage): Promise<void> {
    await logUsage(this.progress, sessionId, featureId, usage);
  }
}
