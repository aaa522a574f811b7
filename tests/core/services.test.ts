import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { createHarnessServices, loadProjectHarnessConfig } from '../../src/core/services.js';
import { DEFAULT_HARNESS_CONFIG } from '../../src/infrastructure/harnessConfigLoader.js';
import { FileBacklogRepository } from '../../src/infrastructure/persistence/FileBacklogRepository.js';
import { RemoteBacklogRepository } from '../../src/infrastructure/persistence/RemoteBacklogRepository.js';

describe('core services', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'services-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should wire a file backlog and progress log inside the project', () => {
    const services = createHarnessServices({
      storageMode: 'local',
      projectPath: dir,
      harness: { ...DEFAULT_HARNESS_CONFIG, progressFile: 'notes.log', backlogFile: 'todo.json' },
    });

    expect(services.backlogRepository).toBeInstanceOf(FileBacklogRepository);
    expect(services.progress.progressFile).toBe(path.join(dir, 'notes.log'));
  });

  it('should use the remote repository in remote mode', () => {
    const services = createHarnessServices({
      storageMode: 'remote',
      projectPath: dir,
      remoteApiUrl: 'http://localhost:4007',
      harness: DEFAULT_HARNESS_CONFIG,
    });

    expect(services.backlogRepository).toBeInstanceOf(RemoteBacklogRepository);
  });

  it('should pick up harness.config.json from the project', async () => {
    await fs.writeFile(path.join(dir, 'harness.config.json'), JSON.stringify({ progressKeepEntries: 12 }));

    expect(loadProjectHarnessConfig(dir, undefined, {}).progressKeepEntries).toBe(12);
  });

  it('should use defaults when the project has no config file', () => {
    expect(loadProjectHarnessConfig(dir, undefined, {})).toEqual(DEFAULT_HARNESS_CONFIG);
  });

  it('should fail when an explicit config path is missing', () => {
    const missing = path.join(dir, 'missing.json');

    expect(() => loadProjectHarnessConfig(dir, missing, {})).toThrow(`Configuration file not found: ${missing}`);
  });
});
