import { CellLanguage, MARKERS, isCellLanguage, isWrapLanguage } from './types';

/**
 * Detect the language selected by a `# MAGIC %<lang>` directive.
 *
 * Only the first line is examined: a directive further down a cell does not
 * change its language. Unknown directives and plain code return null.
 */
export function detectLanguage(content: string): CellLanguage | null {
  const firstLine = content.split('\n', 1)[0] ?? '';
  if (!firstLine.startsWith(MARKERS.MAGIC_PREFIX)) {
    return null;
  }

  const directive = firstLine.slice(MARKERS.MAGIC_PREFIX.length);
  if (!directive.startsWith('%')) {
    return null;
  }

  const token = directive.slice(1).split(/\s/, 1)[0] ?? '';
  return isCellLanguage(token) ? token : null;
}

/**
 * Put the MAGIC prefix in front of every line; empty lines get the bare marker
 */
export function prefixMagic(content: string): string {
  return content
    .split('\n')
    .map(line => (line === '' ? MARKERS.MAGIC_MARKER : `${MARKERS.MAGIC_PREFIX}${line}`))
    .join('\n');
}

/**
 * Remove the MAGIC prefix from every line that carries it
 */
export function stripMagic(content: string): string {
  return content
    .split('\n')
    .map(line => {
      if (line.startsWith(MARKERS.MAGIC_PREFIX)) {
        return line.slice(MARKERS.MAGIC_PREFIX.length);
      }
      if (line === MARKERS.MAGIC_MARKER) {
        return '';
      }
      return line;
    })
    .join('\n');
}

/**
 * Render content as a magic cell of the given language.
 * Languages outside the wrap set (python included) are returned unchanged.
 */
export function wrapMagic(content: string, language: CellLanguage): string {
  if (!isWrapLanguage(language)) {
    return content;
  }
  return `${MARKERS.MAGIC_PREFIX}%${language}\n${prefixMagic(content)}`;
}

/**
 * Inverse of {@link wrapMagic}: strip prefixes and the leading `%<lang>` line
 */
export function unwrapMagic(content: string): string {
  const lines = stripMagic(content).split('\n');
  if (lines[0]?.startsWith('%')) {
    lines.shift();
  }
  return lines.join('\n').trim();
}
