/**
 * Bounds-checked edits over a parsed notebook.
 *
 * Every operation leaves its input untouched and returns a new sequence
 * whose indices run 0..n-1.
 */

import { Cell, CellLanguage } from './types';
import { wrapMagic } from './magic';
import { IndexOutOfRangeError, MalformedInputError } from './errors';
import { containsDelimiter } from './parser';

function assertIndex(index: number, min: number, max: number): void {
  if (!Number.isInteger(index) || index < min || index > max) {
    throw new IndexOutOfRangeError(index, min, max);
  }
}

function reindex(cells: readonly Cell[]): Cell[] {
  return cells.map((cell, index) => (cell.index === index ? cell : { ...cell, index }));
}

function prepareContent(content: string, language: CellLanguage | undefined): string {
  const trimmed = content.trim();
  const prepared = language === undefined ? trimmed : wrapMagic(trimmed, language);
  if (containsDelimiter(prepared)) {
    throw new MalformedInputError('Cell content contains the cell delimiter line');
  }
  return prepared;
}

export function getCell(cells: readonly Cell[], index: number): Cell {
  assertIndex(index, 0, cells.length - 1);
  const cell = cells[index];
  if (cell === undefined) {
    throw new IndexOutOfRangeError(index, 0, cells.length - 1);
  }
  return cell;
}

/**
 * Replace a cell's content. With a language, the content is wrapped in
 * magic lines and the cell is tagged with it; otherwise the language is kept.
 * Content holding a `# COMMAND ----------` line is rejected.
 */
export function updateCell(
  cells: readonly Cell[],
  index: number,
  content: string,
  language?: CellLanguage
): Cell[] {
  const target = getCell(cells, index);
  const updated: Cell = {
    index,
    content: prepareContent(content, language),
    language: language ?? target.language,
  };
  return reindex(cells.map((cell, i) => (i === index ? updated : cell)));
}

/**
 * Insert a cell before `index`; `index === cells.length` appends.
 * Content holding a `# COMMAND ----------` line is rejected.
 */
export function insertCell(
  cells: readonly Cell[],
  index: number,
  content: string,
  language?: CellLanguage
): Cell[] {
  assertIndex(index, 0, cells.length);
  const inserted: Cell = {
    index,
    content: prepareContent(content, language),
    language: language ?? null,
  };
  return reindex([...cells.slice(0, index), inserted, ...cells.slice(index)]);
}

export function deleteCell(cells: readonly Cell[], index: number): Cell[] {
  assertIndex(index, 0, cells.length - 1);
  return reindex([...cells.slice(0, index), ...cells.slice(index + 1)]);
}
