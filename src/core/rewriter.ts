import type {
  LocalizationConventions,
  PlainReplacement,
  TemplateLocalization
} from '../plugins/types.js';
import { DEFAULT_CONVENTIONS, escapeRegExp } from './conventions.js';
import { matchingParen, placeholderExpressions } from './template.js';

// Lookbehind span used to detect an occurrence that is already wrapped
const WRAP_LOOKBEHIND = 16;

const IMPORT_STATEMENT = /^import(?!\s*\()\b[^;]*?(?:\bfrom\s*)?(['"])[^'"\n]+\1[ \t]*;?/gm;

interface Edit {
  start: number;
  end: number;
  text: string;
}

function isWrapped(content: string, offset: number, conventions: LocalizationConventions): boolean {
  const before = content.slice(Math.max(0, offset - WRAP_LOOKBEHIND), offset);
  return new RegExp(`${escapeRegExp(conventions.callName)}\\s*\\(\\s*$`).test(before);
}

function wrapLiteral(replacement: PlainReplacement, conventions: LocalizationConventions): string {
  const { quote, raw, key } = replacement;
  return `${conventions.callName}(${quote}${raw}${quote}, { id: '${key}' })`;
}

/**
 * Self-invoking wrapper binding each placeholder expression before returning the tagged call
 */
export function wrapTemplate(
  template: Pick<TemplateLocalization, 'codeTemplate' | 'expressions' | 'key' | 'indent'>,
  conventions: LocalizationConventions = DEFAULT_CONVENTIONS
): string {
  const { indent } = template;
  const lines = ['(() => {'];
  template.expressions.forEach((expression, index) => {
    lines.push(`${indent}    const placeholder${index} = ${expression};`);
  });
  lines.push(
    `${indent}    return ${conventions.callName}(${conventions.tagName}\`${template.codeTemplate}\`, { id: '${template.key}' });`,
    `${indent}})()`
  );
  return lines.join('\n');
}

/**
 * Apply edits from last to first. An edit overlapping one already applied is dropped.
 */
function applyEdits(content: string, edits: Edit[]): string {
  let updated = content;
  let limit = content.length;
  for (const edit of [...edits].sort((a, b) => b.start - a.start)) {
    if (edit.end > limit) {
      continue;
    }
    updated = updated.slice(0, edit.start) + edit.text + updated.slice(edit.end);
    limit = edit.start;
  }
  return updated;
}

interface ImportMatch {
  start: number;
  end: number;
  names: string[];
  defaultBinding?: string;
}

/**
 * Find a value import of the helper module, whatever its form
 */
function findLocalizationImport(content: string, conventions: LocalizationConventions): ImportMatch | null {
  const source = escapeRegExp(conventions.importSource);
  const pattern = new RegExp(`^import\\s+(?!type\\b)([^;'"]*?)\\s*from\\s*(['"])${source}\\2[ \\t]*;?`, 'm');
  const match = pattern.exec(content);
  if (!match) {
    return null;
  }

  const clause = match[1];
  const named = /\{([^}]*)\}/.exec(clause);
  const names = (named ? named[1] : '')
    .split(',')
    .map(name => name.trim())
    .filter(Boolean);
  // `* as ns` cannot share a statement with named specifiers; it is replaced
  const defaultBinding = clause
    .replace(/\{[^}]*\}/, '')
    .split(',')
    .map(part => part.trim())
    .find(part => part !== '' && !part.startsWith('*'));

  return { start: match.index, end: match.index + match[0].length, names, defaultBinding };
}

/**
 * Ensure one import of the localization helpers exists. An existing import
 * from the helper module is rewritten in place: its named specifiers and
 * default binding are kept and the missing helpers are added.
 */
export function ensureLocalizationImport(
  content: string,
  needsTemplateSupport: boolean,
  conventions: LocalizationConventions = DEFAULT_CONVENTIONS
): string {
  const required = needsTemplateSupport
    ? [conventions.callName, conventions.tagName, conventions.subscribeName]
    : [conventions.callName, conventions.subscribeName];
  const render = (names: string[], defaultBinding?: string) =>
    `import ${defaultBinding ? `${defaultBinding}, ` : ''}{ ${names.join(', ')} } from '${conventions.importSource}';`;

  const existing = findLocalizationImport(content, conventions);
  if (existing) {
    const missing = required.filter(name => !existing.names.includes(name));
    if (missing.length === 0) {
      return content;
    }
    const statement = render([...existing.names, ...missing], existing.defaultBinding);
    return content.slice(0, existing.start) + statement + content.slice(existing.end);
  }

  const statement = render(required);
  let insertAt = -1;
  for (const match of content.matchAll(IMPORT_STATEMENT)) {
    insertAt = (match.index ?? 0) + match[0].length;
  }
  if (insertAt < 0) {
    return `${statement}\n${content}`;
  }
  return `${content.slice(0, insertAt)}\n${statement}${content.slice(insertAt)}`;
}

interface ConstructorMatch {
  /** Offset of the `constructor` keyword */
  start: number;
  /** Offset just past the body's opening brace */
  bodyStart: number;
}

function findConstructor(content: string): ConstructorMatch | null {
  for (const match of content.matchAll(/\bconstructor\s*\(/g)) {
    const start = match.index ?? 0;
    const close = matchingParen(content, start + match[0].length - 1);
    if (close < 0) {
      continue;
    }
    const brace = /^\s*\{/.exec(content.slice(close + 1));
    if (brace) {
      return { start, bodyStart: close + 1 + brace[0].length };
    }
  }
  return null;
}

/**
 * Offset just past a `super(...)` call opening the body at `offset`, or `offset` itself
 */
function skipSuperCall(content: string, offset: number): number {
  const head = /^\s*super\s*\(/.exec(content.slice(offset));
  if (!head) {
    return offset;
  }
  const close = matchingParen(content, offset + head[0].length - 1);
  if (close < 0) {
    return offset;
  }
  const semicolon = (/^[ \t]*;?/.exec(content.slice(close + 1)) ?? [''])[0];
  return close + 1 + semicolon.length;
}

/**
 * Ensure the first constructor registers the instance for locale changes.
 * The call goes after a leading super(...) call, otherwise first in the block.
 * Without a constructor nothing is inserted.
 */
export function ensureLocaleUpdates(
  content: string,
  conventions: LocalizationConventions = DEFAULT_CONVENTIONS
): string {
  const subscribe = `${conventions.subscribeName}(this)`;
  if (content.includes(subscribe)) {
    return content;
  }

  const ctor = findConstructor(content);
  if (!ctor) {
    return content;
  }

  const insertAt = skipSuperCall(content, ctor.bodyStart);

  // Indent like the next statement; in an empty body, one level deeper than the constructor
  const next = /\n([ \t]*)(\S)/.exec(content.slice(insertAt));
  let indent: string;
  if (next && next[2] !== '}') {
    indent = next[1];
  } else {
    const lineStart = content.lastIndexOf('\n', ctor.start) + 1;
    const ctorIndent = (/^[ \t]*/.exec(content.slice(lineStart, ctor.start)) ?? [''])[0];
    indent = ctorIndent ? ctorIndent.repeat(2) : '    ';
  }

  return `${content.slice(0, insertAt)}\n${indent}${subscribe};${content.slice(insertAt)}`;
}

/**
 * Rewrite a source file so the given literals route through the localization helpers.
 *
 * Every replacement names the offsets of the occurrence it rewrites; an
 * occurrence whose text no longer matches is skipped. A plain literal inside
 * a rewritten template's placeholder is wrapped within the bound
 * `placeholderN` expression. The import and subscription fixups only run
 * when the file is localized, before or after this pass.
 */
export function rewriteSource(
  content: string,
  replacements: PlainReplacement[],
  templates: TemplateLocalization[],
  conventions: LocalizationConventions = DEFAULT_CONVENTIONS
): string {
  const plain = replacements.filter(
    replacement =>
      content.slice(replacement.start, replacement.end) === replacement.quote + replacement.raw + replacement.quote &&
      !isWrapped(content, replacement.start, conventions)
  );
  const matchedTemplates = templates.filter(template => content.slice(template.start, template.end) === template.literal);

  const edits: Edit[] = [];
  const nested = new Set<PlainReplacement>();

  for (const template of matchedTemplates) {
    const inner = plain.filter(replacement => replacement.start > template.start && replacement.end < template.end);
    inner.forEach(replacement => nested.add(replacement));
    const literal = applyEdits(
      template.literal,
      inner.map(replacement => ({
        start: replacement.start - template.start,
        end: replacement.end - template.start,
        text: wrapLiteral(replacement, conventions)
      }))
    );
    edits.push({
      start: template.start,
      end: template.end,
      text: wrapTemplate({ ...template, expressions: placeholderExpressions(literal.slice(1, -1)) }, conventions)
    });
  }

  for (const replacement of plain) {
    if (!nested.has(replacement)) {
      edits.push({ start: replacement.start, end: replacement.end, text: wrapLiteral(replacement, conventions) });
    }
  }

  const updated = applyEdits(content, edits);
  const call = new RegExp(`\\b${escapeRegExp(conventions.callName)}\\s*\\(`);
  if (updated === content && !call.test(content)) {
    return content;
  }

  const tagUsed = new RegExp(`\\b${escapeRegExp(conventions.tagName)}\``).test(updated);
  const withImport = ensureLocalizationImport(updated, matchedTemplates.length > 0 || tagUsed, conventions);
  return ensureLocaleUpdates(withImport, conventions);
}
