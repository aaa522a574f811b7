import type { Backlog } from '../entities/Feature.js';

/**
 * Backlog Repository interface
 * Defines the contract for loading and persisting a project's Backlog
 */
export interface BacklogRepository {
  /**
   * Whether a stored backlog is available to load
   */
  exists(): Promise<boolean>;

  /**
   * Load the Backlog from persistent storage
   * @throws BacklogLoadError when missing or invalid
   */
  loadBacklog(): Promise<Backlog>;

  /**
   * Persist the whole Backlog, replacing what was stored
   */
  saveBacklog(backlog: Backlog): Promise<void>;
}
