import fetch from 'node-fetch';
import type { Backlog } from '../../domain/backlog/entities/Feature.js';
import type { BacklogRepository } from '../../domain/backlog/repositories/BacklogRepository.js';
import { BacklogLoadError } from '../../domain/backlog/errors.js';
import { parseBacklog } from './backlogSchema.js';

/**
 * Remote server-based implementation of the BacklogRepository
 * Reads and replaces the backlog through the harness REST API
 */
export class RemoteBacklogRepository implements BacklogRepository {
  private apiUrl: string;
  private apiKey?: string;

  /**
   * Creates a new RemoteBacklogRepository instance
   * @param apiUrl Base URL of the REST API (e.g., 'http://localhost:4007')
   * @param apiKey Optional API key for authentication
   */
  constructor(apiUrl: string, apiKey?: string) {
    if (!apiUrl) {
      throw new Error('API URL is required for remote repository configuration');
    }

    this.apiUrl = apiUrl.replace(/\/+$/, '');
    this.apiKey = apiKey;
  }

  /**
   * Creates headers for API requests
   */
  private getHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };

    if (this.apiKey) {
      headers['Authorization'] = `Bearer ${this.apiKey}`;
    }

    return headers;
  }

  async exists(): Promise<boolean> {
    const response = await fetch(`${this.apiUrl}/backlog/raw`, {
      method: 'GET',
      headers: this.getHeaders(),
    });

    if (response.status === 404) {
      return false;
    }
    if (!response.ok) {
      throw new Error(`Failed to check remote backlog: ${response.status} ${response.statusText}`);
    }
    return true;
  }

  async loadBacklog(): Promise<Backlog> {
    const url = `${this.apiUrl}/backlog/raw`;
    const response = await fetch(url, {
      method: 'GET',
      headers: this.getHeaders(),
    });

    if (!response.ok) {
      throw new BacklogLoadError(`Failed to load backlog from ${url}: ${response.status} ${response.statusText}`);
    }

    const data = await response.json();
    return parseBacklog(data, url);
  }

  async saveBacklog(backlog: Backlog): Promise<void> {
    const response = await fetch(`${this.apiUrl}/backlog`, {
      method: 'PUT',
      headers: this.getHeaders(),
      body: JSON.stringify(backlog),
    });

    if (!response.ok) {
      throw new Error(`Failed to save backlog: ${response.status} ${response.statusText}`);
    }
  }
}
