import type { Backlog } from '../../src/domain/backlog/entities/Feature.js';
import type { BacklogRepository } from '../../src/domain/backlog/repositories/BacklogRepository.js';
import { BacklogLoadError } from '../../src/domain/backlog/errors.js';

/**
 * In-memory backlog store. Loads hand out deep copies so tests can tell
 * persisted state from in-flight mutations.
 */
export class MockBacklogRepository implements BacklogRepository {
  saveCount = 0;

  constructor(private backlog?: Backlog) {}

  async exists(): Promise<boolean> {
    return this.backlog !== undefined;
  }

  async loadBacklog(): Promise<Backlog> {
    if (!this.backlog) {
      throw new BacklogLoadError('Backlog file not found: memory');
    }
    return structuredClone(this.backlog);
  }

  async saveBacklog(backlog: Backlog): Promise<void> {
    this.saveCount += 1;
    this.backlog = structuredClone(backlog);
  }

  // ── Test helpers ──

  stored(): Backlog | undefined {
    return this.backlog;
  }
}
