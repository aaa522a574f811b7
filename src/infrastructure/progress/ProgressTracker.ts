import * as fs from 'fs/promises';
import * as path from 'path';
import type { ProgressEntry } from '../../domain/backlog/entities/Feature.js';
import type { ProgressLog, ProgressStats, RotationResult } from '../../domain/progress/ProgressLog.js';
import { ProgressLedgerError } from '../../domain/backlog/errors.js';
import {
  DEFAULT_KEEP_ENTRIES,
  DEFAULT_PROGRESS_FILE,
  DEFAULT_ROTATION_THRESHOLD_KB,
} from '../../types/HarnessConfigTypes.js';
import {
  TRUNCATION_MARKER,
  formatCompactTimestamp,
  formatEntry,
  formatHeader,
  formatRotationMarker,
  splitLedger,
  stripRotationMarkers,
} from './entryFormat.js';
import { errorCode } from '../storage/fileUtils.js';
import { SerialQueue } from '../../domain/shared/SerialQueue.js';

const ARCHIVE_DIR_NAME = 'progress-archive';

export interface ProgressTrackerOptions {
  fileName?: string;
  rotationThresholdKb?: number;
  keepEntries?: number;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * File-backed progress ledger.
 *
 * The live file is plain text so the next agent session can read it as
 * context. Entries are only ever appended; once the file grows past the
 * rotation threshold, older entries move to an immutable archive file and
 * the live file keeps the most recent `keepEntries` entries.
 */
export class ProgressTracker implements ProgressLog {
  readonly progressFile: string;
  readonly archiveDir: string;
  private readonly rotationThresholdKb: number;
  private readonly keepEntries: number;
  private readonly archivePattern: RegExp;
  private readonly archiveBase: string;
  private readonly archiveExt: string;
  private readonly writes = new SerialQueue();

  /**
   * @param projectRoot Directory the live progress file lives in (required)
   */
  constructor(projectRoot: string, options: ProgressTrackerOptions = {}) {
    if (!projectRoot) {
      throw new Error('Project root is required for the progress log');
    }

    const fileName = options.fileName ?? DEFAULT_PROGRESS_FILE;
    this.rotationThresholdKb = options.rotationThresholdKb ?? DEFAULT_ROTATION_THRESHOLD_KB;
    this.keepEntries = options.keepEntries ?? DEFAULT_KEEP_ENTRIES;

    if (!(this.rotationThresholdKb > 0)) {
      throw new RangeError(`rotationThresholdKb must be positive, got ${this.rotationThresholdKb}`);
    }
    if (!Number.isInteger(this.keepEntries) || this.keepEntries < 0) {
      throw new RangeError(`keepEntries must be a non-negative integer, got ${this.keepEntries}`);
    }

    this.progressFile = path.join(projectRoot, fileName);
    this.archiveDir = path.join(path.dirname(this.progressFile), ARCHIVE_DIR_NAME);

    const parsed = path.parse(fileName);
    this.archiveBase = parsed.name;
    this.archiveExt = parsed.ext;
    this.archivePattern = new RegExp(
      `^${escapeRegExp(parsed.name)}\\.(\\d{4,})\\.\\d{8}-\\d{6}${escapeRegExp(parsed.ext)}$`
    );
  }

  /**
   * Create the live file with a header. Existing content is never touched,
   * so this is safe to call on every startup.
   */
  initialize(projectName: string): Promise<void> {
    return this.writes.run(() => this.createLiveFile(projectName));
  }

  /**
   * Append an entry and, once the file passes the threshold, rotate.
   * Writes are serialized per tracker, so the append and its rotation
   * never interleave with another caller's.
   */
  appendEntry(entry: ProgressEntry): Promise<RotationResult | undefined> {
    return this.writes.run(() => this.appendAndRotate(entry));
  }

  private async createLiveFile(projectName: string): Promise<void> {
    try {
      await fs.writeFile(this.progressFile, formatHeader(projectName, new Date()), {
        encoding: 'utf-8',
        flag: 'wx',
      });
    } catch (error) {
      if (errorCode(error) === 'EEXIST') {
        return;
      }
      throw new ProgressLedgerError(`Failed to initialize progress log at ${this.progressFile}`, error);
    }
  }

  private async appendAndRotate(entry: ProgressEntry): Promise<RotationResult | undefined> {
    try {
      await fs.appendFile(this.progressFile, formatEntry(entry), 'utf-8');
    } catch (error) {
      throw new ProgressLedgerError(`Failed to append progress entry to ${this.progressFile}`, error);
    }

    if (await this.exceedsThreshold()) {
      return this.rotateNow(new Date());
    }
    return undefined;
  }

  async readProgress(): Promise<string> {
    try {
      return await fs.readFile(this.progressFile, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return '';
      }
      throw new ProgressLedgerError(`Failed to read progress log ${this.progressFile}`, error);
    }
  }

  /**
   * Last `lines` lines of the live file. A truncation marker is prepended
   * only when earlier lines were dropped.
   */
  async readRecent(lines: number = 50): Promise<string> {
    if (!Number.isInteger(lines) || lines < 1) {
      throw new RangeError(`lines must be a positive integer, got ${lines}`);
    }

    const content = await this.readProgress();
    if (!content) {
      return '';
    }

    const allLines = content.trim().split('\n');
    if (allLines.length <= lines) {
      return content;
    }

    return [`${TRUNCATION_MARKER}\n`, ...allLines.slice(-lines)].join('\n');
  }

  /**
   * Archive files created by rotation, oldest first
   */
  async getArchiveFiles(): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.archiveDir);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return [];
      }
      throw new ProgressLedgerError(`Failed to list progress archives in ${this.archiveDir}`, error);
    }

    return names
      .map(name => ({ name, match: this.archivePattern.exec(name) }))
      .filter((item): item is { name: string; match: RegExpExecArray } => item.match !== null)
      .sort((a, b) => Number(a.match[1]) - Number(b.match[1]))
      .map(item => path.join(this.archiveDir, item.name));
  }

  async getStats(): Promise<ProgressStats> {
    const content = await this.readProgress();
    const archives = await this.getArchiveFiles();

    return {
      fileSizeKb: Math.round((Buffer.byteLength(content, 'utf-8') / 1024) * 100) / 100,
      totalLines: content.trim() ? content.trim().split('\n').length : 0,
      entries: splitLedger(content).entries.length,
      archives: archives.length,
    };
  }

  /**
   * Move all but the newest `keepEntries` entries into a new archive file.
   *
   * The archive is written first; the live file is then replaced through a
   * temp file and rename. If the archive write fails the live file is
   * untouched, and if the live rewrite fails the new archive is removed, so
   * every entry ends up in exactly one file.
   */
  rotate(now: Date = new Date()): Promise<RotationResult | undefined> {
    return this.writes.run(() => this.rotateNow(now));
  }

  private async rotateNow(now: Date): Promise<RotationResult | undefined> {
    const { preamble, entries } = splitLedger(await this.readProgress());
    if (entries.length <= this.keepEntries) {
      return undefined;
    }

    const cut = entries.length - this.keepEntries;
    const archived = entries.slice(0, cut);
    const retained = entries.slice(cut);

    const archiveName = await this.nextArchiveName(now);
    const archivePath = path.join(this.archiveDir, archiveName);

    try {
      await fs.mkdir(this.archiveDir, { recursive: true });
      await fs.writeFile(archivePath, archived.join(''), { encoding: 'utf-8', flag: 'wx' });
    } catch (error) {
      throw new ProgressLedgerError(`Failed to write progress archive ${archivePath}`, error);
    }

    const archiveRef = path.join(ARCHIVE_DIR_NAME, archiveName);
    const header = stripRotationMarkers(preamble);
    const head = header.trim() ? header + '\n\n' : '';
    const rewritten = head + formatRotationMarker(archiveRef, archived.length, now) + '\n\n' + retained.join('');
    const tempFile = `${this.progressFile}.tmp`;

    try {
      await fs.writeFile(tempFile, rewritten, 'utf-8');
      await fs.rename(tempFile, this.progressFile);
    } catch (error) {
      const cleanup = await Promise.allSettled([
        fs.rm(archivePath, { force: true }),
        fs.rm(tempFile, { force: true }),
      ]);
      for (const result of cleanup) {
        if (result.status === 'rejected') {
          console.error('Failed to clean up after aborted rotation:', result.reason);
        }
      }
      throw new ProgressLedgerError(`Failed to rewrite progress log ${this.progressFile} during rotation`, error);
    }

    return {
      archivePath,
      archivedEntries: archived.length,
      retainedEntries: retained.length,
    };
  }

  private async exceedsThreshold(): Promise<boolean> {
    try {
      const { size } = await fs.stat(this.progressFile);
      return size / 1024 > this.rotationThresholdKb;
    } catch (error) {
      throw new ProgressLedgerError(`Failed to stat progress log ${this.progressFile}`, error);
    }
  }

  private async nextArchiveName(now: Date): Promise<string> {
    let highest = 0;
    for (const file of await this.getArchiveFiles()) {
      const match = this.archivePattern.exec(path.basename(file));
      if (match) {
        highest = Math.max(highest, Number(match[1]));
      }
    }

    const sequence = String(highest + 1).padStart(4, '0');
    return `${this.archiveBase}.${sequence}.${formatCompactTimestamp(now)}${this.archiveExt}`;
  }
}
