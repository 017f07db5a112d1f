import type { LocalizationConventions } from '../plugins/types.js';
import { DEFAULT_CONVENTIONS, localizationCallPattern } from './conventions.js';
import { hasPlaceholders, stripPlaceholders } from './template.js';

const MIN_LENGTH = 3;
const MAX_LENGTH = 120;
// How far around a literal to look for an existing localization call
const MARKER_WINDOW = 8;

const CODE_TOKEN = /^[A-Za-z0-9._/@:-]+$/;
const LETTER = /\p{L}/u;

/**
 * Whether the line containing `index` is an import statement
 */
export function isImportLine(content: string, index: number): boolean {
  const lineStart = content.lastIndexOf('\n', index - 1) + 1;
  let lineEnd = content.indexOf('\n', index);
  if (lineEnd < 0) {
    lineEnd = content.length;
  }
  return content.slice(lineStart, lineEnd).trimStart().startsWith('import ');
}

/**
 * Whether a localization call sits within a few characters of the literal
 */
export function isAlreadyLocalized(
  content: string,
  start: number,
  length: number,
  conventions: LocalizationConventions = DEFAULT_CONVENTIONS
): boolean {
  const window = content.slice(
    Math.max(0, start - MARKER_WINDOW),
    Math.min(content.length, start + length + MARKER_WINDOW)
  );
  return localizationCallPattern(conventions).test(window);
}

/**
 * Decide whether a literal is user-visible text
 *
 * @param literal - Literal text without its delimiters
 * @param start - Offset of the literal's opening delimiter in `content`
 * @param content - Full file content
 */
export function isUserVisibleText(
  literal: string,
  start: number,
  content: string,
  conventions: LocalizationConventions = DEFAULT_CONVENTIONS
): boolean {
  const trimmed = literal.trim();

  if (trimmed.length < MIN_LENGTH || trimmed.length > MAX_LENGTH) {
    return false;
  }
  if (!LETTER.test(trimmed)) {
    return false;
  }
  // Bare identifiers, paths, event names
  if (!/\s/.test(trimmed) && CODE_TOKEN.test(trimmed)) {
    return false;
  }
  if (trimmed.startsWith('http') || trimmed.startsWith('@')) {
    return false;
  }
  if (isImportLine(content, start)) {
    return false;
  }
  return !isAlreadyLocalized(content, start, trimmed.length, conventions);
}

/**
 * Decide whether a template literal body should be localized as a template.
 * Bodies without any placeholder are never template candidates.
 */
export function isTranslatableTemplate(
  body: string,
  start: number,
  content: string,
  conventions: LocalizationConventions = DEFAULT_CONVENTIONS
): boolean {
  if (!hasPlaceholders(body)) {
    return false;
  }
  return isUserVisibleText(stripPlaceholders(body), start, content, conventions);
}
