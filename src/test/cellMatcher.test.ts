import { describe, it, expect } from 'vitest';
import { computeMatchStats, diffNotebooks, matchCellsByContent } from '../cellMatcher';
import { parseNotebook } from '../parser';
import { Cell } from '../types';

function cells(...contents: string[]): Cell[] {
  return contents.map((content, index) => ({ index, content, language: null }));
}

describe('matchCellsByContent', () => {
  it('matches_identical_cells_returns_correct_indices', () => {
    const result = matchCellsByContent(cells('print("hello")', 'x = 1'), cells('print("hello")', 'x = 1'));

    expect(result).toEqual([
      { newIndex: 0, oldIndex: 0 },
      { newIndex: 1, oldIndex: 1 },
    ]);
  });

  it('matches_reordered_cells_returns_correct_mapping', () => {
    const result = matchCellsByContent(cells('print("hello")', 'x = 1'), cells('x = 1', 'print("hello")'));

    expect(result).toEqual([
      { newIndex: 0, oldIndex: 1 },
      { newIndex: 1, oldIndex: 0 },
    ]);
  });

  it('handles_new_cells_without_match_returns_null', () => {
    const result = matchCellsByContent(cells('x = 1'), cells('x = 1', 'y = 2'));

    expect(result).toEqual([
      { newIndex: 0, oldIndex: 0 },
      { newIndex: 1, oldIndex: null },
    ]);
  });

  it('handles_duplicates_matches_in_order_and_once', () => {
    const result = matchCellsByContent(cells('x', 'x'), cells('x', 'x', 'x'));

    expect(result).toEqual([
      { newIndex: 0, oldIndex: 0 },
      { newIndex: 1, oldIndex: 1 },
      { newIndex: 2, oldIndex: null },
    ]);
  });

  it('handles_empty_old_cells_returns_all_unmatched', () => {
    expect(matchCellsByContent([], cells('a'))).toEqual([{ newIndex: 0, oldIndex: null }]);
  });
});

describe('computeMatchStats', () => {
  it('computes_matched_unmatched_and_deleted_counts', () => {
    const results = matchCellsByContent(cells('a', 'b', 'c'), cells('b', 'd'));

    expect(computeMatchStats(results, 3)).toEqual({
      totalNew: 2,
      matched: 1,
      unmatched: 1,
      deleted: 2,
    });
  });
});

describe('diffNotebooks', () => {
  it('diff_parsed_notebooks_returns_matches_and_stats', () => {
    const oldCells = parseNotebook('print("hello")\n# COMMAND ----------\nx = 1');
    const newCells = parseNotebook('x = 1\n# COMMAND ----------\ny = 2');

    expect(diffNotebooks(oldCells, newCells)).toEqual({
      matches: [
        { newIndex: 0, oldIndex: 1 },
        { newIndex: 1, oldIndex: null },
      ],
      stats: { totalNew: 2, matched: 1, unmatched: 1, deleted: 1 },
    });
  });
});
