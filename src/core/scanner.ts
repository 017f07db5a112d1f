import * as parser from '@babel/parser';
import type { ParserPlugin } from '@babel/parser';
import * as traverseModule from '@babel/traverse';
import type { Visitor } from '@babel/traverse';
import type { Node } from '@babel/types';
import type { SourceSpan } from '../plugins/types.js';

type Traverse = (parent: Node, opts: Visitor) => void;

// @babel/traverse is CommonJS; depending on the loader the function sits one or two `default`s deep
function resolveTraverse(mod: unknown): Traverse {
  let candidate: unknown = mod;
  while (typeof candidate === 'object' && candidate !== null && 'default' in candidate) {
    candidate = candidate.default;
  }
  if (typeof candidate !== 'function') {
    throw new Error('Unable to load @babel/traverse');
  }
  return candidate as Traverse;
}

const traverse = resolveTraverse(traverseModule);

/**
 * Custom error class for parse errors with location information
 */
export class ParseError extends Error {
  file?: string;
  line?: number;
  column?: number;

  constructor(message: string, file?: string, line?: number, column?: number) {
    super(message);
    this.name = 'ParseError';
    this.file = file;
    this.line = line;
    this.column = column;
  }
}

function locationOf(error: unknown): { line?: number; column?: number } {
  if (typeof error !== 'object' || error === null || !('loc' in error)) {
    return {};
  }
  const { loc } = error;
  if (typeof loc === 'object' && loc !== null && 'line' in loc && 'column' in loc) {
    const { line, column } = loc;
    if (typeof line === 'number' && typeof column === 'number') {
      return { line, column };
    }
  }
  return {};
}

/**
 * Parser plugins for a file, chosen by extension
 */
function pluginsFor(file: string): ParserPlugin[] {
  const plugins: ParserPlugin[] = ['decorators-legacy'];
  if (/\.m?tsx?$/.test(file) || /\.cts$/.test(file)) {
    plugins.push('typescript');
    if (file.endsWith('.tsx')) {
      plugins.push('jsx');
    }
  } else {
    plugins.push('jsx');
  }
  return plugins;
}

/**
 * Parse a source file into an AST. Throws ParseError on any syntax error.
 */
export function parseSource(code: string, file = 'source.js'): Node {
  try {
    const ast = parser.parse(code, {
      sourceType: 'unambiguous',
      plugins: pluginsFor(file),
      errorRecovery: true
    });
    const [first] = ast.errors ?? [];
    if (first) {
      throw new ParseError(`${first.code}: ${first.reasonCode}`, file);
    }
    return ast;
  } catch (error) {
    if (error instanceof ParseError) {
      throw error;
    }
    const { line, column } = locationOf(error);
    throw new ParseError(error instanceof Error ? error.message : String(error), file, line, column);
  }
}

function span(content: string, start: number, end: number): SourceSpan | null {
  const quote = content[start];
  if (quote !== "'" && quote !== '"' && quote !== '`') {
    return null;
  }
  return { raw: content.slice(start + 1, end - 1), quote, start, end };
}

/**
 * Collect string literals and untagged template literals from the AST
 */
export function scanWithParser(content: string, file?: string): SourceSpan[] {
  const ast = parseSource(content, file);
  const spans: SourceSpan[] = [];

  traverse(ast, {
    StringLiteral(path) {
      const { start, end } = path.node;
      if (typeof start !== 'number' || typeof end !== 'number') {
        return;
      }
      const found = span(content, start, end);
      if (found) {
        spans.push(found);
      }
    },
    TemplateLiteral(path) {
      // html`...`, css`...` and the localization tag itself are markup, not text
      if (path.parentPath?.isTaggedTemplateExpression()) {
        return;
      }
      const { start, end } = path.node;
      if (typeof start !== 'number' || typeof end !== 'number') {
        return;
      }
      const found = span(content, start, end);
      if (found) {
        spans.push(found);
      }
    }
  });

  return spans.sort((a, b) => a.start - b.start);
}

const STRING_LITERAL = /(['"])((?:\\.|(?!\1)[^\\\n])*)\1/g;
const TEMPLATE_LITERAL = /`((?:\\[\s\S]|[^`\\])*)`/g;

/**
 * Regex-based scanning fallback. Quote characters inside template literals,
 * tagged or not, are not taken as string literals.
 */
export function scanWithRegex(content: string): SourceSpan[] {
  const templates: SourceSpan[] = [];
  const ranges: Array<[number, number]> = [];

  for (const match of content.matchAll(TEMPLATE_LITERAL)) {
    const start = match.index ?? 0;
    const end = start + match[0].length;
    ranges.push([start, end]);
    // Tagged templates are markup
    if (start > 0 && /[\w$]/.test(content[start - 1])) {
      continue;
    }
    templates.push({ raw: match[1], quote: '`', start, end });
  }

  const strings: SourceSpan[] = [];
  for (const match of content.matchAll(STRING_LITERAL)) {
    const start = match.index ?? 0;
    const end = start + match[0].length;
    if (ranges.some(([from, to]) => start < to && end > from)) {
      continue;
    }
    strings.push({ raw: match[2], quote: match[1] === '"' ? '"' : "'", start, end });
  }

  return [...strings, ...templates].sort((a, b) => a.start - b.start);
}

/**
 * Find literal spans in a file, falling back to regex scanning when the file does not parse
 */
export function scanLiterals(content: string, file?: string): SourceSpan[] {
  try {
    return scanWithParser(content, file);
  } catch (error) {
    if (error instanceof ParseError) {
      return scanWithRegex(content);
    }
    throw error;
  }
}
