/**
 * Template literal normalization.
 *
 * A template body is split into static text and `${...}` placeholders. The
 * splitter balances braces and skips quoted strings and nested template
 * literals inside a placeholder, so `${fn({ a: '}' })}` is one placeholder.
 */

export interface TemplatePart {
  kind: 'text' | 'placeholder';
  /** Static text, or the trimmed placeholder expression */
  value: string;
}

/**
 * Skip a quoted string starting at `index` (the opening quote). Returns the index past the closing quote.
 */
function skipQuoted(body: string, index: number): number {
  const quote = body[index];
  let i = index + 1;
  while (i < body.length && body[i] !== quote) {
    i += body[i] === '\\' ? 2 : 1;
  }
  return i + 1;
}

/**
 * Skip a `${...}` expression whose `{` is at `index`. Returns the index of the matching `}`.
 */
function skipExpression(body: string, index: number): number {
  let depth = 0;
  let i = index;
  while (i < body.length) {
    const ch = body[i];
    if (ch === "'" || ch === '"') {
      i = skipQuoted(body, i);
      continue;
    }
    if (ch === '`') {
      i = skipNestedTemplate(body, i);
      continue;
    }
    if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
    i++;
  }
  return body.length;
}

/**
 * Skip a nested template literal starting at its opening backtick
 */
function skipNestedTemplate(body: string, index: number): number {
  let i = index + 1;
  while (i < body.length && body[i] !== '`') {
    if (body[i] === '\\') {
      i += 2;
    } else if (body[i] === '$' && body[i + 1] === '{') {
      i = skipExpression(body, i + 1) + 1;
    } else {
      i++;
    }
  }
  return i + 1;
}

/**
 * Index of the `)` matching the `(` at `index`, or -1 when it is never closed.
 * Quoted strings and template literals in between are skipped.
 */
export function matchingParen(source: string, index: number): number {
  let depth = 0;
  let i = index;
  while (i < source.length) {
    const ch = source[i];
    if (ch === "'" || ch === '"') {
      i = skipQuoted(source, i);
      continue;
    }
    if (ch === '`') {
      i = skipNestedTemplate(source, i);
      continue;
    }
    if (ch === '(') {
      depth++;
    } else if (ch === ')') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
    i++;
  }
  return -1;
}

/**
 * Split a template body (the text between the backticks) into text and placeholder parts
 */
export function splitTemplate(body: string): TemplatePart[] {
  const parts: TemplatePart[] = [];
  let text = '';
  let i = 0;

  while (i < body.length) {
    const ch = body[i];
    if (ch === '\\') {
      text += body.slice(i, i + 2);
      i += 2;
      continue;
    }
    if (ch === '$' && body[i + 1] === '{') {
      const close = skipExpression(body, i + 1);
      if (text) {
        parts.push({ kind: 'text', value: text });
        text = '';
      }
      parts.push({ kind: 'placeholder', value: body.slice(i + 2, close).trim() });
      i = close + 1;
      continue;
    }
    text += ch;
    i++;
  }

  if (text) {
    parts.push({ kind: 'text', value: text });
  }
  return parts;
}

/**
 * Whether the body has at least one `${...}` placeholder
 */
export function hasPlaceholders(body: string): boolean {
  return splitTemplate(body).some(part => part.kind === 'placeholder');
}

/**
 * Placeholder expressions in left-to-right order
 */
export function placeholderExpressions(body: string): string[] {
  return splitTemplate(body)
    .filter(part => part.kind === 'placeholder')
    .map(part => part.value);
}

function renderParts(body: string, placeholder: (index: number) => string): string {
  let index = 0;
  return splitTemplate(body)
    .map(part => (part.kind === 'text' ? part.value : placeholder(index++)))
    .join('');
}

/**
 * Numbered form used for resource storage: `Hello ${name}` → `Hello {0}`
 */
export function toNumberedForm(body: string): string {
  return renderParts(body, index => `{${index}}`);
}

/**
 * Code form used in rewritten sources: `Hello ${name}` → `Hello ${placeholder0}`
 */
export function toCodeForm(body: string): string {
  return renderParts(body, index => '${placeholder' + index + '}');
}

/**
 * Replace every placeholder by a single space and trim. Used to classify and key templates.
 */
export function stripPlaceholders(body: string): string {
  return renderParts(body, () => ' ').trim();
}

/**
 * Leading whitespace of the line containing `index`, up to `index`
 */
export function determineIndent(content: string, index: number): string {
  const lineStart = content.lastIndexOf('\n', index - 1) + 1;
  const match = /^[ \t]*/.exec(content.slice(lineStart, index));
  return match ? match[0] : '';
}
