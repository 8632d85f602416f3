/**
 * Languages that a `# MAGIC %<lang>` directive on a cell's first line can select
 */
export const DETECTABLE_LANGUAGES = [
  'python',
  'sql',
  'scala',
  'r',
  'md',
  'sh',
  'run',
  'pip',
  'fs',
] as const;

/**
 * Languages whose content is stored line-by-line behind the MAGIC prefix.
 *
 * Python is detectable but never wrapped: it is assumed to be the notebook's
 * default language and is written out as plain source.
 */
export const WRAP_LANGUAGES = ['md', 'sql', 'scala', 'r', 'sh', 'fs', 'run', 'pip'] as const;

/**
 * A recognized cell language
 */
export type CellLanguage = (typeof DETECTABLE_LANGUAGES)[number];

/**
 * A language rendered with per-line magic prefixes
 */
export type WrapLanguage = (typeof WRAP_LANGUAGES)[number];

const detectableSet: ReadonlySet<string> = new Set(DETECTABLE_LANGUAGES);
const wrapSet: ReadonlySet<string> = new Set(WRAP_LANGUAGES);

export function isCellLanguage(value: string): value is CellLanguage {
  return detectableSet.has(value);
}

export function isWrapLanguage(value: string): value is WrapLanguage {
  return wrapSet.has(value);
}

/**
 * A single cell of a notebook
 */
export interface Cell {
  /** Zero-based position in the notebook */
  readonly index: number;
  /** Cell text, trimmed, including any `# MAGIC` prefixes */
  readonly content: string;
  /** Language selected by a magic directive, or null to inherit the notebook default */
  readonly language: CellLanguage | null;
}

/**
 * Constants for cell markers and magic commands
 */
export const MARKERS = {
  /** Databricks notebook header */
  DATABRICKS_HEADER: '# Databricks notebook source',
  /** Databricks cell delimiter */
  DATABRICKS_CELL: '# COMMAND ----------',
  /** Databricks MAGIC prefix */
  MAGIC_PREFIX: '# MAGIC ',
  /** MAGIC marker used for empty lines (no trailing space) */
  MAGIC_MARKER: '# MAGIC',
} as const;

/**
 * One cell of the JSON representation
 */
export interface NotebookJsonCell {
  index: number;
  content: string;
  language: CellLanguage | null;
}

/**
 * JSON representation of a notebook
 */
export interface NotebookJson {
  format: string;
  cells: NotebookJsonCell[];
}
