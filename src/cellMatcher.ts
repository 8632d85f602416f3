/**
 * Cell Matcher - Pure functions for matching cells between two versions of a notebook
 *
 * Cells are matched on their exact content, so a cell that moved keeps its
 * identity while edited cells show up as unmatched (new) plus deleted (old).
 */

import { Cell } from './types';

/**
 * Result of matching one new cell against the old cells
 */
export interface CellMatchResult {
  /** Index of the new cell */
  newIndex: number;
  /** Index of the matched old cell, or null if no old cell has the same content */
  oldIndex: number | null;
}

export interface MatchStats {
  /** Total number of new cells */
  totalNew: number;
  /** Number of new cells that matched old content */
  matched: number;
  /** Number of new cells without matches */
  unmatched: number;
  /** Number of old cells that weren't matched (deleted or edited) */
  deleted: number;
}

export interface NotebookDiff {
  matches: CellMatchResult[];
  stats: MatchStats;
}

/**
 * Match new cells to old cells by content.
 *
 * Duplicates are matched in order and each old cell is used at most once.
 *
 * @example
 * ```ts
 * const oldCells = parseNotebook('print("hello")\n# COMMAND ----------\nx = 1');
 * const newCells = parseNotebook('x = 1\n# COMMAND ----------\ny = 2');
 * matchCellsByContent(oldCells, newCells);
 * // [{ newIndex: 0, oldIndex: 1 }, { newIndex: 1, oldIndex: null }]
 * ```
 */
export function matchCellsByContent(
  oldCells: readonly Cell[],
  newCells: readonly Cell[]
): CellMatchResult[] {
  // Queue of unused old indices per content, in notebook order
  const unusedByContent = new Map<string, number[]>();
  for (const cell of oldCells) {
    const queue = unusedByContent.get(cell.content);
    if (queue) {
      queue.push(cell.index);
    } else {
      unusedByContent.set(cell.content, [cell.index]);
    }
  }

  return newCells.map((cell): CellMatchResult => ({
    newIndex: cell.index,
    oldIndex: unusedByContent.get(cell.content)?.shift() ?? null,
  }));
}

/**
 * Compute statistics from match results
 */
export function computeMatchStats(
  results: readonly CellMatchResult[],
  oldCellCount: number
): MatchStats {
  const matched = results.filter(r => r.oldIndex !== null).length;

  return {
    totalNew: results.length,
    matched,
    unmatched: results.length - matched,
    deleted: oldCellCount - matched,
  };
}

export function diffNotebooks(oldCells: readonly Cell[], newCells: readonly Cell[]): NotebookDiff {
  const matches = matchCellsByContent(oldCells, newCells);
  return { matches, stats: computeMatchStats(matches, oldCells.length) };
}
