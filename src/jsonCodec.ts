import { z } from 'zod';
import { Cell, DETECTABLE_LANGUAGES, NotebookJson } from './types';
import { JSON_FORMAT } from './constants';
import { MalformedInputError } from './errors';
import { containsDelimiter } from './parser';

const NotebookJsonCellSchema = z.object({
  index: z.number().int().nonnegative().optional(),
  content: z.string(),
  language: z.enum(DETECTABLE_LANGUAGES).nullable().optional(),
});

const NotebookJsonSchema = z.object({
  format: z.string().optional(),
  cells: z.array(NotebookJsonCellSchema),
});

export type NotebookJsonInput = z.infer<typeof NotebookJsonSchema>;

/**
 * Render issues as `path: message`, the path in `cells[0].index` form
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path
      .map((segment, i) => (typeof segment === 'number' ? `[${segment}]` : i === 0 ? segment : `.${segment}`))
      .join('');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Encode cells as the JSON representation
 */
export function toJSON(cells: readonly Cell[]): NotebookJson {
  return {
    format: JSON_FORMAT,
    cells: cells.map(cell => ({
      index: cell.index,
      content: cell.content,
      language: cell.language,
    })),
  };
}

/**
 * Decode the JSON representation.
 *
 * The stored language is trusted as-is; detection is not re-run.
 */
export function fromJSON(value: unknown): Cell[] {
  const result = NotebookJsonSchema.safeParse(value);
  if (!result.success) {
    throw new MalformedInputError('Invalid notebook JSON', formatIssues(result.error));
  }

  return result.data.cells.map((entry, position): Cell => {
    if (entry.index !== undefined && entry.index !== position) {
      throw new MalformedInputError('Invalid notebook JSON', [
        `cells[${position}].index: expected ${position}, got ${entry.index}`,
      ]);
    }
    const content = entry.content.trim();
    if (containsDelimiter(content)) {
      throw new MalformedInputError('Invalid notebook JSON', [
        `cells[${position}].content: contains the cell delimiter line`,
      ]);
    }
    return {
      index: position,
      content,
      language: entry.language ?? null,
    };
  });
}

/**
 * JSON.parse, with syntax errors reported as MalformedInputError
 */
export function readJson(text: string, label: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MalformedInputError(`${label} is not valid JSON: ${message}`);
  }
}

/**
 * Parse JSON text, then decode it with {@link fromJSON}
 */
export function parseNotebookJson(text: string): Cell[] {
  return fromJSON(readJson(text, 'Notebook JSON'));
}
