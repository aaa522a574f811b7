import type { ProgressEntry } from '../../domain/backlog/entities/Feature.js';

/**
 * Plain-text layout of the progress ledger.
 *
 * A ledger is a preamble (header plus rotation markers) followed by entry
 * blocks. Every block starts with ENTRY_SEPARATOR on a line of its own and no
 * other line may equal it, so splitting at separators and joining the pieces
 * reproduces the file exactly.
 */

export const ENTRY_SEPARATOR = '='.repeat(60);
export const TRUNCATION_MARKER = '[... earlier progress truncated ...]';
export const ROTATION_MARKER_PREFIX = '[rotated: ';

const SEPARATOR_LINE = new RegExp(`^${ENTRY_SEPARATOR}$`, 'gm');

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as "YYYY-MM-DD HH:MM:SS"
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Local time as "YYYYMMDD-HHMMSS", safe inside file names
 */
export function formatCompactTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Indent any line that would read as an entry boundary, so free text
 * (summaries, project names) can never split a block
 */
export function escapeSeparatorLines(text: string): string {
  return text
    .split('\n')
    .map(line => (line === ENTRY_SEPARATOR ? ` ${line}` : line))
    .join('\n');
}

export function formatHeader(projectName: string, createdAt: Date): string {
  return [
    `# Progress Log - ${escapeSeparatorLines(projectName)}`,
    '# This file tracks agent progress across sessions.',
    "# Each session reads this file to understand what's been done.",
    '#',
    `# Created: ${formatTimestamp(createdAt)}`,
    '',
    '',
  ].join('\n');
}

export function formatEntry(entry: ProgressEntry, now: Date = new Date()): string {
  const lines = [
    `[${formatTimestamp(entry.timestamp ?? now)}] Session: ${entry.sessionId}`,
    `Action: ${entry.action}`,
  ];

  if (entry.featureId) {
    lines.push(`Feature: ${entry.featureId}`);
  }

  lines.push('Summary:', entry.summary);

  if (entry.filesChanged && entry.filesChanged.length > 0) {
    lines.push(`Files changed: ${entry.filesChanged.join(', ')}`);
  }

  if (entry.commitHash) {
    lines.push(`Commit: ${entry.commitHash}`);
  }

  return `${ENTRY_SEPARATOR}\n${escapeSeparatorLines(lines.join('\n'))}\n\n`;
}

export function formatRotationMarker(archiveRef: string, archivedCount: number, rotatedAt: Date): string {
  return `${ROTATION_MARKER_PREFIX}${formatTimestamp(rotatedAt)}] ${archivedCount} earlier entries archived to: ${archiveRef}`;
}

/**
 * The preamble with earlier rotation markers removed, so only the newest
 * marker follows the header after a rotation
 */
export function stripRotationMarkers(preamble: string): string {
  return preamble
    .split('\n')
    .filter(line => !line.startsWith(ROTATION_MARKER_PREFIX))
    .join('\n')
    .replace(/\n+$/, '');
}

export interface LedgerParts {
  preamble: string;
  entries: string[];
}

export function splitLedger(content: string): LedgerParts {
  const starts: number[] = [];
  const pattern = new RegExp(SEPARATOR_LINE.source, SEPARATOR_LINE.flags);
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(content)) !== null) {
    starts.push(match.index);
  }

  if (starts.length === 0) {
    return { preamble: content, entries: [] };
  }

  const entries = starts.map((start, i) => content.slice(start, starts[i + 1] ?? content.length));
  return { preamble: content.slice(0, starts[0]), entries };
}
