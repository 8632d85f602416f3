/**
 * Converts between Databricks notebook source and .ipynb JSON format.
 *
 * Magic cells become Jupyter cells a kernel can run (markdown cells, or code
 * cells led by a %%cell magic); converting back produces exactly the cells
 * that parsing the serialized source would.
 */

import { z } from 'zod';
import { Cell, CellLanguage, isWrapLanguage } from './types';
import { detectLanguage, prefixMagic, stripMagic, unwrapMagic, wrapMagic } from './magic';
import { containsDelimiter, parseNotebook, serializeNotebook } from './parser';
import { formatIssues, readJson } from './jsonCodec';
import { MalformedInputError } from './errors';
import { getLogger } from './logger';

const log = getLogger('ipynb');

/**
 * Cell metadata for language tracking
 */
interface CellMetadata {
  // Our custom metadata for round-trip
  databricks_language?: string;
  [key: string]: unknown;
}

/**
 * Jupyter notebook cell structure
 */
export interface IpynbCell {
  cell_type: 'code' | 'markdown' | 'raw';
  source: string[];
  metadata: CellMetadata;
  execution_count?: number | null;
  outputs?: unknown[];
}

/**
 * Jupyter notebook structure (.ipynb format)
 */
export interface IpynbNotebook {
  cells: IpynbCell[];
  metadata: {
    kernelspec?: {
      display_name: string;
      language: string;
      name: string;
    };
    language_info?: {
      name: string;
    };
    [key: string]: unknown;
  };
  nbformat: number;
  nbformat_minor: number;
}

const IpynbCellSchema = z.object({
  cell_type: z.enum(['code', 'markdown', 'raw']),
  source: z.union([z.string(), z.array(z.string())]),
  metadata: z.record(z.unknown()).optional(),
});

const IpynbSchema = z.object({
  cells: z.array(IpynbCellSchema),
  nbformat: z.number().int().optional(),
});

type IpynbCellInput = z.infer<typeof IpynbCellSchema>;

/**
 * Jupyter cell magic used for each magic language on export
 */
const CELL_MAGIC_BY_LANGUAGE = new Map<CellLanguage, string>([
  ['sql', 'sql'],
  ['scala', 'scala'],
  ['r', 'R'],
  ['sh', 'sh'],
]);

/**
 * Languages recognized from a leading %%cell magic on import
 */
const LANGUAGE_BY_CELL_MAGIC = new Map<string, CellLanguage>([
  ['sql', 'sql'],
  ['scala', 'scala'],
  ['r', 'r'],
  ['sh', 'sh'],
  ['bash', 'sh'],
  ['python', 'python'],
]);

const CELL_MAGIC_REGEX = /^%%(\w+)\s*$/;
const LINE_MAGIC_REGEX = /^%[a-zA-Z_]/;

/**
 * Convert parsed cells to a Jupyter notebook
 */
export function cellsToIpynb(cells: readonly Cell[]): IpynbNotebook {
  return {
    cells: cells.map(toIpynbCell),
    metadata: {
      kernelspec: {
        display_name: 'Python 3',
        language: 'python',
        name: 'python3',
      },
      language_info: {
        name: 'python',
      },
    },
    nbformat: 4,
    nbformat_minor: 5,
  };
}

function toIpynbCell(cell: Cell): IpynbCell {
  const metadata: CellMetadata = cell.language === null ? {} : { databricks_language: cell.language };

  if (cell.language === 'md') {
    return {
      cell_type: 'markdown',
      source: splitIntoLines(unwrapMagic(cell.content)),
      metadata,
    };
  }

  return {
    cell_type: 'code',
    source: splitIntoLines(toCodeSource(cell)),
    metadata,
    execution_count: null,
    outputs: [],
  };
}

/**
 * Source of a code cell as a kernel would run it: MAGIC prefixes removed and
 * a bare `%sql` style directive turned into the matching `%%sql` cell magic
 */
function toCodeSource(cell: Cell): string {
  if (cell.language === null) {
    return cell.content;
  }

  const lines = stripMagic(cell.content).split('\n');
  if (lines[0]?.trim() === `%${cell.language}`) {
    const cellMagic = CELL_MAGIC_BY_LANGUAGE.get(cell.language);
    if (cellMagic !== undefined) {
      lines[0] = `%%${cellMagic}`;
    } else if (cell.language === 'python') {
      lines.shift();
    }
  }

  return trimBlankLines(lines.join('\n'));
}

/**
 * Convert a Jupyter notebook to cells
 */
export function ipynbToCells(value: unknown): Cell[] {
  const result = IpynbSchema.safeParse(value);
  if (!result.success) {
    throw new MalformedInputError('Invalid Jupyter notebook', formatIssues(result.error));
  }

  const contents = result.data.cells.map((cell, position) => {
    const content = toCellContent(cell);
    if (containsDelimiter(content)) {
      throw new MalformedInputError('Invalid Jupyter notebook', [
        `cells[${position}].source: contains the cell delimiter line`,
      ]);
    }
    return content;
  });

  // Same rule as the splitter: empty cells after the first are dropped
  const cells = contents
    .filter((content, i) => i === 0 || content !== '')
    .map((content, index): Cell => ({ index, content, language: detectLanguage(content) }));

  log.debug('converted %d Jupyter cells', cells.length);
  return cells;
}

function toCellContent(cell: IpynbCellInput): string {
  const source = joinLines(cell.source).trim();

  if (cell.cell_type === 'markdown') {
    return wrapMagic(source, 'md');
  }

  const lines = source.split('\n');
  const firstLine = lines[0]?.trim() ?? '';

  // Double-percent cell magic (%%sql)
  const cellMagic = CELL_MAGIC_REGEX.exec(firstLine);
  if (cellMagic) {
    const language = LANGUAGE_BY_CELL_MAGIC.get((cellMagic[1] ?? '').toLowerCase());
    if (language !== undefined) {
      const body = lines.slice(1).join('\n').trim();
      return wrapMagic(body, language);
    }
    return source;
  }

  // Line magics (%pip, %run, %restart_python) keep their line behind the MAGIC prefix
  if (LINE_MAGIC_REGEX.test(firstLine)) {
    return prefixMagic(source);
  }

  // Use stored language if the magic was removed in the notebook
  const storedLanguage = cell.metadata?.['databricks_language'];
  if (typeof storedLanguage === 'string' && storedLanguage !== 'md' && isWrapLanguage(storedLanguage)) {
    return wrapMagic(source, storedLanguage);
  }

  return source;
}

/**
 * Convert Databricks notebook source to .ipynb JSON text
 */
export function sourceToIpynb(content: string): string {
  return JSON.stringify(cellsToIpynb(parseNotebook(content)), null, 1);
}

/**
 * Convert .ipynb JSON text back to Databricks notebook source
 */
export function ipynbToSource(ipynbContent: string, includeHeader: boolean = true): string {
  return serializeNotebook(ipynbToCells(readJson(ipynbContent, 'Jupyter notebook')), includeHeader);
}

/**
 * Split content into lines, preserving newlines as ipynb expects
 */
function splitIntoLines(content: string): string[] {
  if (!content) {
    return [];
  }

  const lines = content.split('\n');
  // Add newline to all lines except the last
  return lines.map((line, i) => (i < lines.length - 1 ? `${line}\n` : line));
}

/**
 * Join ipynb lines array back into string
 */
function joinLines(lines: string | string[]): string {
  if (typeof lines === 'string') {
    return lines;
  }
  return lines.join('');
}

function trimBlankLines(content: string): string {
  return content.replace(/^(?:[ \t]*\n)+/, '').trimEnd();
}
