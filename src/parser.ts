import { Cell, MARKERS } from './types';
import { detectLanguage } from './magic';
import { getLogger } from './logger';

const log = getLogger('parser');

/**
 * Parse Databricks notebook source into cells
 */
export function parseNotebook(content: string): Cell[] {
  const lines = content.replace(/\r\n/g, '\n').split('\n');
  const hasDatabricksHeader = lines[0] === MARKERS.DATABRICKS_HEADER;
  const startIndex = hasDatabricksHeader ? skipHeader(lines) : 0;

  const segments = splitOnDelimiter(lines, startIndex);

  const cells = segments
    .map(segment => segment.join('\n').trim())
    // Empty interior cells are dropped; the first cell is always kept
    .filter((source, i) => i === 0 || source !== '')
    .map((source, index): Cell => ({
      index,
      content: source,
      language: detectLanguage(source),
    }));

  log.debug('parsed %d cells (header: %s)', cells.length, hasDatabricksHeader);
  return cells;
}

/**
 * Index of the first line after the header, its blank lines, and the
 * delimiter that separates it from the first cell
 */
function skipHeader(lines: string[]): number {
  let i = 1;
  while (i < lines.length && lines[i]?.trim() === '') {
    i++;
  }
  if (lines[i] === MARKERS.DATABRICKS_CELL) {
    i++;
  }
  return i;
}

/**
 * Group lines into raw cell segments separated by the delimiter line
 */
function splitOnDelimiter(lines: string[], startIndex: number): string[][] {
  const segments: string[][] = [];
  let currentCellLines: string[] = [];

  for (let i = startIndex; i < lines.length; i++) {
    const line = lines[i] ?? '';
    if (line === MARKERS.DATABRICKS_CELL) {
      segments.push(currentCellLines);
      currentCellLines = [];
    } else {
      currentCellLines.push(line);
    }
  }

  // Don't forget the last cell
  segments.push(currentCellLines);
  return segments;
}

/**
 * Whether `content` has a line that would split it into two cells
 */
export function containsDelimiter(content: string): boolean {
  return content.split(/\r?\n/).some(line => line === MARKERS.DATABRICKS_CELL);
}

/**
 * Serialize cells back to Databricks notebook source
 */
export function serializeNotebook(cells: readonly Cell[], includeHeader: boolean = true): string {
  const lines: string[] = [];

  if (includeHeader) {
    lines.push(MARKERS.DATABRICKS_HEADER);
    // Without the separator, the delimiter after an empty first cell would
    // be read as the header separator and the empty cell lost
    if (cells.length > 1 && cells[0]?.content === '') {
      lines.push('');
      lines.push(MARKERS.DATABRICKS_CELL);
      lines.push('');
    }
  }

  cells.forEach((cell, i) => {
    if (i > 0) {
      lines.push('');
      lines.push(MARKERS.DATABRICKS_CELL);
      lines.push('');
    }
    lines.push(cell.content);
  });

  return lines.join('\n');
}
