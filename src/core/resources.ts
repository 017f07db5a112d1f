import fs from 'fs/promises';
import path from 'path';
import type {
  Coverage,
  LocalizationConventions,
  ResourceEntry,
  ResourceMap
} from '../plugins/types.js';
import { DEFAULT_CONVENTIONS, escapeRegExp } from './conventions.js';

/** Value substituted when an entry could not be translated */
export const TRANSLATION_ERROR = '<translation error>';

const SIMPLE_ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  b: '\b',
  f: '\f',
  v: '\v',
  '0': '\0',
  '\n': ''
};

/**
 * Unescape a string that may contain escape sequences
 */
export function unescapeString(str: string): string {
  return str.replace(/\\(u\{[0-9a-fA-F]+\}|u[0-9a-fA-F]{4}|x[0-9a-fA-F]{2}|[\s\S])/g, (_match: string, seq: string) => {
    if (seq.length > 1) {
      const hex = seq.startsWith('u{') ? seq.slice(2, -1) : seq.slice(1);
      return String.fromCodePoint(parseInt(hex, 16));
    }
    return SIMPLE_ESCAPES[seq] ?? seq;
  });
}

/**
 * Escape a value for a single-quoted string literal
 */
export function escapeSingleQuotes(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "\\'")
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r');
}

/**
 * Escape a value for a template literal body
 */
export function escapeBackticks(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/`/g, '\\`')
    .replace(/\$\{/g, '\\${');
}

export function entry(value: string, isTemplate = false): ResourceEntry {
  return { value, isTemplate };
}

export function entriesEqual(a: ResourceEntry, b: ResourceEntry): boolean {
  return a.value === b.value && a.isTemplate === b.isTemplate;
}

/**
 * Build a map from plain key → text pairs
 */
export function fromRecord(record: Record<string, string>): ResourceMap {
  return new Map(Object.entries(record).map(([key, value]) => [key, entry(value)]));
}

/**
 * Parse the key/value pairs of a resource module.
 *
 * Two shapes are recognised: `'key': 'text'` and `'key': str\`template\``.
 * Template placeholders `${n}` are read back as `{n}`. A key matched by both
 * shapes keeps the template.
 */
export function parseResources(
  content: string,
  conventions: LocalizationConventions = DEFAULT_CONVENTIONS
): ResourceMap {
  const resources: ResourceMap = new Map();
  const plain = /(['"])([^'"\\\n]+)\1\s*:\s*(['"])((?:\\.|(?!\3)[^\\\n])*)\3/g;
  const tagged = new RegExp(
    `(['"])([^'"\\\\\\n]+)\\1\\s*:\\s*${escapeRegExp(conventions.tagName)}\`((?:\\\\[\\s\\S]|[^\`\\\\])*)\``,
    'g'
  );

  for (const match of content.matchAll(plain)) {
    resources.set(match[2], entry(unescapeString(match[4])));
  }

  for (const match of content.matchAll(tagged)) {
    const numbered = match[3].replace(/\\[\s\S]|\$\{(\d+)\}/g, (token: string, index: string | undefined) =>
      index === undefined ? token : `{${index}}`
    );
    resources.set(match[2], entry(unescapeString(numbered), true));
  }

  return resources;
}

/**
 * Merge newly extracted entries into an existing map. Existing entries win.
 */
export function mergeResources(existing: ResourceMap, extracted: ResourceMap): ResourceMap {
  const merged: ResourceMap = new Map(existing);

  for (const [key, value] of extracted) {
    if (!merged.has(key)) {
      merged.set(key, value);
    }
  }

  return merged;
}

/**
 * Entries of `variant` that are new or differ from `base`
 */
export function diffResources(base: ResourceMap, variant: ResourceMap): ResourceMap {
  const diff: ResourceMap = new Map();

  for (const [key, value] of variant) {
    const baseValue = base.get(key);
    if (!baseValue || !entriesEqual(baseValue, value)) {
      diff.set(key, value);
    }
  }

  return diff;
}

/**
 * Sort keys lexicographically (code unit order)
 */
export function sortKeys(resources: ResourceMap): ResourceMap {
  const keys = [...resources.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  const sorted: ResourceMap = new Map();

  for (const key of keys) {
    const value = resources.get(key);
    if (value) {
      sorted.set(key, value);
    }
  }

  return sorted;
}

/**
 * Serialize a map into a resource module. An empty map serializes to ''.
 */
export function serializeResources(
  resources: ResourceMap,
  conventions: LocalizationConventions = DEFAULT_CONVENTIONS
): string {
  if (resources.size === 0) {
    return '';
  }

  const sorted = sortKeys(resources);
  const needsTag = [...sorted.values()].some(value => value.isTemplate);
  const lines: string[] = [];

  if (needsTag) {
    lines.push(`import { ${conventions.tagName} } from '${conventions.resourceTagSource}';`, '');
  }

  lines.push('export const templates = {');
  for (const [key, value] of sorted) {
    const rendered = value.isTemplate
      ? `${conventions.tagName}\`${escapeBackticks(value.value).replace(/\{(\d+)\}/g, (_token: string, index: string) => '${' + index + '}')}\``
      : `'${escapeSingleQuotes(value.value)}'`;
    lines.push(`    '${key}': ${rendered},`);
  }
  lines.push('};', '');

  return lines.join('\n');
}

/**
 * Read a resource file. A missing file reads as an empty map.
 */
export async function readResourceFile(
  filePath: string,
  conventions: LocalizationConventions = DEFAULT_CONVENTIONS
): Promise<ResourceMap> {
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    return parseResources(content, conventions);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return new Map(); // File doesn't exist, nothing to merge
    }
    throw error;
  }
}

/**
 * Write a resource file. Empty maps are not written.
 * @returns whether a file was written
 */
export async function writeResourceFile(
  filePath: string,
  resources: ResourceMap,
  conventions: LocalizationConventions = DEFAULT_CONVENTIONS
): Promise<boolean> {
  const content = serializeResources(resources, conventions);
  if (!content) {
    return false;
  }

  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, 'utf-8');
  return true;
}

function isTranslated(value: ResourceEntry | undefined): boolean {
  return value !== undefined && value.value.trim() !== '' && value.value !== TRANSLATION_ERROR;
}

/**
 * Keys of `source` with no usable translation in `target`
 */
export function findMissing(source: ResourceMap, target: ResourceMap): string[] {
  return [...source.keys()].filter(key => !isTranslated(target.get(key)));
}

/**
 * Keys of `target` that no longer exist in `source`
 */
export function findUnused(source: ResourceMap, target: ResourceMap): string[] {
  return [...target.keys()].filter(key => !source.has(key));
}

/**
 * Get translation coverage statistics
 */
export function getCoverage(source: ResourceMap, target: ResourceMap): Coverage {
  const total = source.size;
  const translated = total - findMissing(source, target).length;

  return {
    total,
    translated,
    missing: total - translated,
    percentage: total > 0 ? Math.round((translated / total) * 100) : 100
  };
}
