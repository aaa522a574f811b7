import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { DEFAULT_HARNESS_CONFIG, loadHarnessConfig } from '../../src/infrastructure/harnessConfigLoader.js';

describe('loadHarnessConfig', () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'harness-config-'));
    configPath = path.join(dir, 'harness.config.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should fall back to defaults', () => {
    const result = loadHarnessConfig({ env: {} });

    expect(result.success).toBe(true);
    expect(result.config).toEqual({
      progressRotationThresholdKb: 50,
      progressKeepEntries: 100,
      progressFile: 'agent-progress.txt',
      backlogFile: 'feature-list.json',
    });
    expect(result.config).toEqual(DEFAULT_HARNESS_CONFIG);
  });

  it('should read the config file and fill quality gate defaults', async () => {
    await fs.writeFile(configPath, JSON.stringify({
      progressKeepEntries: 10,
      defaultQualityGates: { requireTests: true, lintCommand: 'npm run lint' },
    }));

    const result = loadHarnessConfig({ configPath, env: {} });

    expect(result.config?.progressKeepEntries).toBe(10);
    expect(result.config?.progressRotationThresholdKb).toBe(50);
    expect(result.config?.defaultQualityGates).toEqual({
      requireTests: true,
      lintCommand: 'npm run lint',
      securityChecklist: [],
      customValidators: [],
    });
  });

  it('should let environment variables override the file', async () => {
    await fs.writeFile(configPath, JSON.stringify({ progressKeepEntries: 10, progressFile: 'from-file.txt' }));

    const result = loadHarnessConfig({
      configPath,
      env: { HARNESS_PROGRESS_KEEP_ENTRIES: '7', HARNESS_PROGRESS_ROTATION_KB: '2', HARNESS_BACKLOG_FILE: 'todo.json' },
    });

    expect(result.config).toEqual({
      progressRotationThresholdKb: 2,
      progressKeepEntries: 7,
      progressFile: 'from-file.txt',
      backlogFile: 'todo.json',
    });
  });

  it('should ignore empty environment variables', () => {
    const result = loadHarnessConfig({ env: { HARNESS_PROGRESS_FILE: '' } });

    expect(result.config?.progressFile).toBe('agent-progress.txt');
  });

  it('should fail when an explicit config file is missing', () => {
    const result = loadHarnessConfig({ configPath, env: {} });

    expect(result).toEqual({ success: false, error: `Configuration file not found: ${configPath}` });
  });

  it('should reject unknown keys in the config file', async () => {
    await fs.writeFile(configPath, JSON.stringify({ progressKeepEntries: 10, retries: 3 }));

    const result = loadHarnessConfig({ configPath, env: {} });

    expect(result.success).toBe(false);
    expect(result.error).toMatch(/^Invalid configuration format: /);
    expect(result.error).toContain("'retries'");
  });

  it('should reject non-positive integers', async () => {
    await fs.writeFile(configPath, JSON.stringify({ progressRotationThresholdKb: 0 }));

    const result = loadHarnessConfig({ configPath, env: {} });

    expect(result.success).toBe(false);
    expect(result.error).toMatch(/^Invalid configuration format: progressRotationThresholdKb: /);
  });

  it('should reject a malformed environment override', () => {
    const result = loadHarnessConfig({ env: { HARNESS_PROGRESS_KEEP_ENTRIES: 'lots' } });

    expect(result.success).toBe(false);
    expect(result.error).toMatch(/^Invalid environment configuration: progressKeepEntries: /);
  });

  it('should report unreadable JSON', async () => {
    await fs.writeFile(configPath, '{ broken');

    const result = loadHarnessConfig({ configPath, env: {} });

    expect(result.success).toBe(false);
    expect(result.error).toMatch(/^Failed to load configuration: /);
  });
});
